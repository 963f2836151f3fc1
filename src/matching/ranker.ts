/**
 * Cosine-similarity ranking of technique candidates against a query.
 */

import { DimensionMismatchError } from '../errors.js';
import type { EmbeddingVector, RankCandidate, ScoredMatch } from '../types/technique.js';

/**
 * dot(a, b) / (‖a‖ · ‖b‖). A zero-norm vector on either side scores 0.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let sumSqA = 0;
  let sumSqB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    sumSqA += a[i] * a[i];
    sumSqB += b[i] * b[i];
  }

  if (sumSqA === 0 || sumSqB === 0) {
    return 0;
  }

  // Rounding can push normalized vectors a hair past ±1.
  return Math.max(-1, Math.min(1, dot / Math.sqrt(sumSqA * sumSqB)));
}

/**
 * Score every candidate and return the best `k`, highest first. Ties keep
 * their input order. Returns all candidates when there are fewer than `k`.
 */
export function rankCandidates(
  queryVector: EmbeddingVector,
  candidates: readonly RankCandidate[],
  k: number,
): ScoredMatch[] {
  if (!Number.isInteger(k) || k < 0) {
    throw new RangeError(`k must be a non-negative integer, got ${k}`);
  }

  const scored = candidates.map((candidate, index) => ({
    index,
    match: {
      record: candidate.record,
      similarity: cosineSimilarity(queryVector, candidate.vector),
    },
  }));

  // Ties fall back to input order.
  scored.sort((x, y) => y.match.similarity - x.match.similarity || x.index - y.index);

  return scored.slice(0, k).map((s) => s.match);
}
