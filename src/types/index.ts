/**
 * Shared type exports.
 */

export type {
  RawTechnique,
  TechniqueRecord,
  EmbeddingVector,
  RankCandidate,
  ScoredMatch,
  PipelineStage,
  CorrelationResult,
} from './technique.js';

export type {
  LogLevel,
  CorrelatorConfig,
  AttackSourceConfig,
  EmbeddingConfig,
  MatchingConfig,
  LogConfig,
} from './config.js';
