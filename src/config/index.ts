/**
 * Environment-driven configuration.
 *
 * The CLI loads `.env` through `dotenv/config` before anything reads
 * `process.env`; this module only validates and shapes the values.
 */

import { resolve } from 'node:path';
import { z } from 'zod';

import { DEFAULT_HUB_URL } from '../embedding/model-files.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_TOP_K } from '../matching/pipeline.js';
import type { CorrelatorConfig } from '../types/config.js';

export const DEFAULT_STIX_URL =
  'https://raw.githubusercontent.com/mitre-attack/attack-stix-data/master/enterprise-attack/enterprise-attack.json';

export const DEFAULT_EMBEDDING_MODEL = 'Xenova/all-MiniLM-L6-v2';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const emptyToUndefined = (v: unknown) => (v === '' ? undefined : v);

const EnvSchema = z.object({
  ATTACK_STIX_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_STIX_URL)),
  ATTACK_DATA_DIR: z.preprocess(emptyToUndefined, z.string().default('./data/mitre-attack')),
  ATTACK_DATA_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  EMBEDDING_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULT_EMBEDDING_MODEL)),
  EMBEDDING_CACHE_DIR: z.preprocess(emptyToUndefined, z.string().default('./data/models')),
  EMBEDDING_HUB_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_HUB_URL)),
  EMBEDDING_BATCH_SIZE: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().max(1024).default(32),
  ),
  EMBEDDING_OFFLINE: z.preprocess(emptyToUndefined, booleanString.default('false')),
  TOP_K: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(DEFAULT_TOP_K)),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ),
});

export type RawEnv = Record<string, string | undefined>;

/**
 * Build the configuration from an environment map (defaults to
 * `process.env`). Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: RawEnv = process.env): CorrelatorConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;

  return {
    attack: {
      stixUrl: e.ATTACK_STIX_URL,
      dataDir: resolve(e.ATTACK_DATA_DIR),
      ...(e.ATTACK_DATA_PATH ? { dataPath: resolve(e.ATTACK_DATA_PATH) } : {}),
    },
    embedding: {
      model: e.EMBEDDING_MODEL,
      cacheDir: resolve(e.EMBEDDING_CACHE_DIR),
      hubUrl: e.EMBEDDING_HUB_URL,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      offline: e.EMBEDDING_OFFLINE,
    },
    matching: {
      topK: e.TOP_K,
    },
    logging: {
      level: e.LOG_LEVEL,
    },
  };
}
