/**
 * Embedding provider contract.
 *
 * Implementations turn text into fixed-length vectors. The pipeline only
 * relies on this interface, so tests inject deterministic fakes.
 */

import type { EmbeddingVector } from '../types/technique.js';

export interface EmbeddingProvider {
  /** Model identifier, reported in results. */
  readonly model: string;

  encode(text: string): Promise<EmbeddingVector>;

  /** Encode many texts; the result is index-aligned with the input. */
  encodeBatch(texts: readonly string[]): Promise<EmbeddingVector[]>;
}
