import type { AttackSourceConfig } from '../../types/config.js';
import { FileCorpusProvider } from './file.js';
import { defaultSnapshotPath } from './loader.js';
import type { TechniqueCorpusProvider } from './provider.js';
import { RemoteStixCorpusProvider } from './remote.js';

/**
 * Pick the corpus provider: a local file when offline or when a data path
 * is configured, the live STIX feed otherwise.
 */
export function selectCorpusProvider(
  config: AttackSourceConfig,
  options: { offline?: boolean } = {},
): TechniqueCorpusProvider {
  if (config.dataPath) {
    return new FileCorpusProvider(config.dataPath);
  }
  if (options.offline) {
    return new FileCorpusProvider(defaultSnapshotPath(config.dataDir));
  }
  return new RemoteStixCorpusProvider({ url: config.stixUrl });
}
