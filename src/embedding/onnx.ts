/**
 * Sentence embeddings with ONNX Runtime.
 *
 * Runs a BERT-style sentence-transformers export (all-MiniLM-L6-v2 by
 * default): WordPiece tokens in, `last_hidden_state` out, then mean pooling
 * over the attention mask and L2 normalization. Inference executes in
 * onnxruntime's own threads, so the event loop stays free while a batch is
 * being encoded.
 */

import { readFile } from 'node:fs/promises';
import * as ort from 'onnxruntime-node';

import type { EmbeddingConfig } from '../types/config.js';
import type { EmbeddingVector } from '../types/technique.js';
import { createLogger } from '../utils/logger.js';
import { ensureModelFiles, type ModelFileOptions } from './model-files.js';
import type { EmbeddingProvider } from './provider.js';
import { WordPieceTokenizer } from './tokenizer.js';

const logger = createLogger('embedding');

const HIDDEN_STATE_OUTPUT = 'last_hidden_state';

export interface OnnxProviderOptions extends Partial<ModelFileOptions> {
  model: string;
  batchSize?: number;
  maxLength?: number;
}

interface LoadedModel {
  session: ort.InferenceSession;
  tokenizer: WordPieceTokenizer;
}

export class OnnxEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly batchSize: number;
  private readonly maxLength?: number;
  private readonly files: ModelFileOptions;
  private loaded: Promise<LoadedModel> | null = null;

  constructor(options: OnnxProviderOptions) {
    this.model = options.model;
    this.batchSize = options.batchSize ?? 32;
    this.maxLength = options.maxLength;
    this.files = {
      cacheDir: options.cacheDir ?? './data/models',
      ...(options.hubUrl !== undefined ? { hubUrl: options.hubUrl } : {}),
      offline: options.offline ?? false,
      ...(options.fetchImpl !== undefined ? { fetchImpl: options.fetchImpl } : {}),
      ...(options.retry !== undefined ? { retry: options.retry } : {}),
    };
  }

  static fromConfig(config: EmbeddingConfig): OnnxEmbeddingProvider {
    return new OnnxEmbeddingProvider(config);
  }

  async encode(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.run([text]);
    if (!vector) {
      throw new Error('Embedding model returned no vector');
    }
    return vector;
  }

  async encodeBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    const vectors: EmbeddingVector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const chunk = texts.slice(i, i + this.batchSize);
      vectors.push(...(await this.run(chunk)));
      logger.debug(`Encoded ${Math.min(i + this.batchSize, texts.length)}/${texts.length} texts`);
    }
    return vectors;
  }

  /**
   * Fetch the model files (when not cached) and load the session. Also
   * used by `sync --model` to fill an offline cache.
   */
  prepare(): Promise<void> {
    return this.load().then(() => undefined);
  }

  private async run(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];
    const { session, tokenizer } = await this.load();

    const batch = buildBatch(
      texts.map((t) => tokenizer.encode(t)),
      tokenizer.padId,
    );
    const feeds: Record<string, ort.Tensor> = {};
    for (const name of session.inputNames) {
      const values = batch.inputs[name];
      if (!values) {
        throw new Error(`Model ${this.model} expects unsupported input "${name}"`);
      }
      feeds[name] = new ort.Tensor(
        'int64',
        BigInt64Array.from(values, (v) => BigInt(v)),
        [batch.rows, batch.columns],
      );
    }

    const outputs = await session.run(feeds);
    const hidden = outputs[HIDDEN_STATE_OUTPUT] ?? outputs[session.outputNames[0] ?? ''];
    if (!hidden || !(hidden.data instanceof Float32Array)) {
      throw new Error(`Model ${this.model} returned no float32 ${HIDDEN_STATE_OUTPUT}`);
    }

    return meanPool(hidden.data, hidden.dims, batch.attentionMask).map(l2Normalize);
  }

  /**
   * Load once; concurrent callers share the same promise. A failed load is
   * forgotten so the next call can try again.
   */
  private load(): Promise<LoadedModel> {
    if (!this.loaded) {
      logger.debug(`Loading embedding model ${this.model}`);
      this.loaded = this.loadModel().then(
        (model) => model,
        (err: unknown) => {
          this.loaded = null;
          throw err;
        },
      );
    }
    return this.loaded;
  }

  private async loadModel(): Promise<LoadedModel> {
    const files = await ensureModelFiles(this.model, this.files);
    const tokenizer = WordPieceTokenizer.fromJson(
      JSON.parse(await readFile(files.tokenizerPath, 'utf-8')),
      this.maxLength,
    );
    const session = await ort.InferenceSession.create(files.modelPath, {
      executionProviders: ['cpu'],
      graphOptimizationLevel: 'all',
    });
    return { session, tokenizer };
  }
}

// ---------------------------------------------------------------------------
// Tensor helpers
// ---------------------------------------------------------------------------

export interface TokenBatch {
  rows: number;
  columns: number;
  attentionMask: number[];
  /** Model inputs by name, each row-major and `rows * columns` long. */
  inputs: Record<string, number[]>;
}

/**
 * Right-pad token sequences to the longest one.
 */
export function buildBatch(sequences: readonly (readonly number[])[], padId: number): TokenBatch {
  const rows = sequences.length;
  const columns = Math.max(0, ...sequences.map((s) => s.length));
  const inputIds: number[] = [];
  const attentionMask: number[] = [];

  for (const sequence of sequences) {
    for (let c = 0; c < columns; c++) {
      const present = c < sequence.length;
      inputIds.push(present ? (sequence[c] ?? padId) : padId);
      attentionMask.push(present ? 1 : 0);
    }
  }

  return {
    rows,
    columns,
    attentionMask,
    inputs: {
      input_ids: inputIds,
      attention_mask: attentionMask,
      token_type_ids: new Array<number>(rows * columns).fill(0),
    },
  };
}

/**
 * Average the hidden states of each row over its unmasked tokens.
 * `dims` is `[rows, tokens, hidden]`.
 */
export function meanPool(
  hidden: ArrayLike<number>,
  dims: readonly number[],
  mask: readonly number[],
): number[][] {
  const [rows = 0, tokens = 0, size = 0] = dims;
  if (dims.length !== 3 || hidden.length !== rows * tokens * size || mask.length !== rows * tokens) {
    throw new Error(`Unexpected hidden state shape [${dims.join(', ')}]`);
  }

  const pooled: number[][] = [];
  for (let r = 0; r < rows; r++) {
    const sum = new Array<number>(size).fill(0);
    let count = 0;
    for (let t = 0; t < tokens; t++) {
      if (mask[r * tokens + t] === 0) continue;
      count++;
      const offset = (r * tokens + t) * size;
      for (let h = 0; h < size; h++) {
        sum[h] += hidden[offset + h];
      }
    }
    pooled.push(sum.map((v) => v / Math.max(count, 1e-9)));
  }
  return pooled;
}

export function l2Normalize(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((acc, v) => acc + v * v, 0));
  return norm === 0 ? [...vector] : vector.map((v) => v / norm);
}
