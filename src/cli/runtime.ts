/**
 * Builds the configuration and provider pair a command runs with.
 */

import { loadConfig } from '../config/index.js';
import { OnnxEmbeddingProvider } from '../embedding/onnx.js';
import { selectCorpusProvider } from '../knowledge/mitre-attack/select.js';
import type { CorrelationProviders } from '../matching/pipeline.js';
import type { CorrelatorConfig } from '../types/config.js';
import { setLogLevel } from '../utils/logger.js';

export interface RuntimeOptions {
  offline?: boolean;
  data?: string;
  verbose?: boolean;
}

export interface Runtime {
  config: CorrelatorConfig;
  providers: CorrelationProviders;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const base = loadConfig();
  const config: CorrelatorConfig = options.data
    ? { ...base, attack: { ...base.attack, dataPath: options.data } }
    : base;

  setLogLevel(options.verbose ? 'debug' : config.logging.level);

  return {
    config,
    providers: {
      embedding: OnnxEmbeddingProvider.fromConfig(config.embedding),
      corpus: selectCorpusProvider(config.attack, { offline: options.offline }),
    },
  };
}
