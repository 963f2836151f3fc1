/**
 * Configuration types for attack-correlator.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface CorrelatorConfig {
  attack: AttackSourceConfig;
  embedding: EmbeddingConfig;
  matching: MatchingConfig;
  logging: LogConfig;
}

export interface AttackSourceConfig {
  stixUrl: string;
  dataDir: string;
  /** Explicit snapshot or bundle path; switches matching to the file provider. */
  dataPath?: string;
}

export interface EmbeddingConfig {
  /** Hugging Face repository holding `onnx/model.onnx` and `tokenizer.json`. */
  model: string;
  cacheDir: string;
  hubUrl: string;
  batchSize: number;
  /** Only use models already present in the cache. */
  offline: boolean;
}

export interface MatchingConfig {
  topK: number;
}

export interface LogConfig {
  level: LogLevel;
}
