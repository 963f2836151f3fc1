/**
 * The correlation pipeline: encode query → fetch + encode techniques → rank.
 *
 * Progress milestones are 20 (query encoded), 50 (corpus fetched) and 100
 * (ranked). A failure at any stage rejects without partial results and
 * without further progress.
 */

import type { EmbeddingProvider } from '../embedding/provider.js';
import { EmptyInputError, EncodingError, FetchError, TaskCancelledError } from '../errors.js';
import { normalizeTechnique } from '../knowledge/mitre-attack/provider.js';
import type { TechniqueCorpusProvider } from '../knowledge/mitre-attack/provider.js';
import { formatMatches } from '../reporting/text-formatter.js';
import type { CorrelationResult, PipelineStage } from '../types/technique.js';
import { createLogger } from '../utils/logger.js';
import { HttpStatusError } from '../utils/retry.js';
import { rankCandidates } from './ranker.js';

const logger = createLogger('pipeline');

export const DEFAULT_TOP_K = 3;

export const STAGE_PROGRESS: Record<PipelineStage, number> = {
  'query-encoded': 20,
  'corpus-fetched': 50,
  ranked: 100,
};

export interface CorrelationProviders {
  embedding: EmbeddingProvider;
  corpus: TechniqueCorpusProvider;
}

export type ProgressCallback = (percent: number, stage: PipelineStage) => void;

export interface CorrelateOptions {
  topK?: number;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

/**
 * Throws EmptyInputError for blank or whitespace-only text.
 */
export function assertQuery(query: string): void {
  if (query.trim().length === 0) {
    throw new EmptyInputError();
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw reason instanceof TaskCancelledError ? reason : new TaskCancelledError();
}

export async function correlate(
  query: string,
  providers: CorrelationProviders,
  options: CorrelateOptions = {},
): Promise<CorrelationResult> {
  assertQuery(query);

  const topK = options.topK ?? DEFAULT_TOP_K;
  const { embedding, corpus } = providers;
  const { signal } = options;
  const startTime = Date.now();

  const report = (stage: PipelineStage): void => {
    logger.debug(`${stage} (${STAGE_PROGRESS[stage]}%)`);
    options.onProgress?.(STAGE_PROGRESS[stage], stage);
  };

  throwIfAborted(signal);

  // --- Encode query ---
  let queryVector;
  try {
    queryVector = await embedding.encode(query);
  } catch (err) {
    throw new EncodingError('Error encoding sentence', err);
  }
  throwIfAborted(signal);
  report('query-encoded');

  // --- Fetch techniques ---
  let rawTechniques;
  try {
    rawTechniques = await corpus.fetchAllTechniques();
  } catch (err) {
    throw new FetchError(
      'Error fetching techniques from MITRE ATT&CK database',
      err,
      err instanceof HttpStatusError ? err.statusCode : undefined,
    );
  }
  throwIfAborted(signal);
  report('corpus-fetched');

  const records = rawTechniques.map(normalizeTechnique);

  // --- Encode technique descriptions ---
  let vectors;
  try {
    vectors = await embedding.encodeBatch(records.map((r) => r.description));
  } catch (err) {
    throw new EncodingError('Error encoding technique descriptions', err);
  }
  if (vectors.length !== records.length) {
    throw new EncodingError(
      'Error encoding technique descriptions',
      new Error(`expected ${records.length} vectors, got ${vectors.length}`),
    );
  }
  throwIfAborted(signal);

  // --- Rank ---
  const matches = rankCandidates(
    queryVector,
    records.map((record, i) => ({ record, vector: vectors[i] })),
    topK,
  );

  const result: CorrelationResult = {
    query,
    matches,
    text: formatMatches(matches),
    candidateCount: records.length,
    durationMs: Date.now() - startTime,
    model: embedding.model,
    source: corpus.source,
  };

  report('ranked');
  return result;
}
