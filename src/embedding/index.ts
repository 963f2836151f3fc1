/**
 * Embedding module: text to vector.
 */

export type { EmbeddingProvider } from './provider.js';

export {
  OnnxEmbeddingProvider,
  buildBatch,
  l2Normalize,
  meanPool,
  type OnnxProviderOptions,
  type TokenBatch,
} from './onnx.js';
export {
  DEFAULT_HUB_URL,
  ensureModelFiles,
  modelFileUrl,
  type ModelFileOptions,
  type ModelFiles,
} from './model-files.js';
export { WordPieceTokenizer, type TokenizerSettings } from './tokenizer.js';
