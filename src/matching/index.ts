/**
 * Matching module: similarity ranking, the correlation pipeline and the
 * background runner.
 */

export { cosineSimilarity, rankCandidates } from './ranker.js';

export {
  correlate,
  assertQuery,
  STAGE_PROGRESS,
  DEFAULT_TOP_K,
  type CorrelationProviders,
  type CorrelateOptions,
  type ProgressCallback,
} from './pipeline.js';

export {
  CorrelationRunner,
  DEFAULT_MAX_QUEUED,
  type RunnerMode,
  type RunnerOptions,
  type RunnerEvent,
  type RunnerEventMap,
  type TaskHandle,
} from './runner.js';
