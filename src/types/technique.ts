/**
 * Technique, embedding and match types shared by the correlation pipeline.
 */

/**
 * A technique as it comes out of a corpus provider. Every field may be
 * missing; normalization fills in placeholders.
 */
export interface RawTechnique {
  id?: string;                   // e.g., "T1566.001"
  name?: string;                 // e.g., "Spearphishing Attachment"
  description?: string;
  tactics?: string[];            // e.g., ["initial-access"]
  platforms?: string[];
  isSubtechnique?: boolean;
  url?: string;
}

/**
 * A normalized technique used for one ranking request.
 */
export interface TechniqueRecord {
  id: string;
  name: string;
  description: string;
  tactics: string[];
  url?: string;
}

/** Fixed-length sentence embedding. */
export type EmbeddingVector = ArrayLike<number>;

export interface RankCandidate {
  record: TechniqueRecord;
  vector: EmbeddingVector;
}

export interface ScoredMatch {
  record: TechniqueRecord;
  similarity: number;            // [-1, 1]
}

export type PipelineStage = 'query-encoded' | 'corpus-fetched' | 'ranked';

export interface CorrelationResult {
  query: string;
  matches: ScoredMatch[];
  /** Formatted result blocks, ready for display. */
  text: string;
  candidateCount: number;
  durationMs: number;
  model: string;
  source: string;
}
