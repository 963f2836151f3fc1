/**
 * attack-correlator: library entry point.
 */

export * from './matching/index.js';
export * from './embedding/index.js';
export * from './knowledge/mitre-attack/index.js';
export * from './reporting/index.js';
export * from './errors.js';
export { loadConfig, DEFAULT_STIX_URL, DEFAULT_EMBEDDING_MODEL } from './config/index.js';
export { createLogger, setLogLevel, getLogLevel, type Logger } from './utils/logger.js';
export { withRetry, HttpStatusError, type RetryOptions } from './utils/retry.js';
export type * from './types/index.js';
