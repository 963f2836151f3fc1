/**
 * Locate, and on first use download, the ONNX model and tokenizer of a
 * Hugging Face model repository.
 *
 * Layout under the cache directory:
 *   <cacheDir>/<owner>/<model>/onnx/model.onnx
 *   <cacheDir>/<owner>/<model>/tokenizer.json
 */

import { access, mkdir, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { createLogger } from '../utils/logger.js';
import { HttpStatusError, parseRetryAfter, withRetry, type RetryOptions } from '../utils/retry.js';

const logger = createLogger('model-files');

export const DEFAULT_HUB_URL = 'https://huggingface.co';
export const MODEL_FILE = 'onnx/model.onnx';
export const TOKENIZER_FILE = 'tokenizer.json';

export interface ModelFileOptions {
  cacheDir: string;
  hubUrl?: string;
  /** Never download; fail when a file is not cached. */
  offline?: boolean;
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

export interface ModelFiles {
  modelPath: string;
  tokenizerPath: string;
}

export function modelDirectory(cacheDir: string, model: string): string {
  return join(cacheDir, ...model.split('/'));
}

export function modelFileUrl(hubUrl: string, model: string, file: string): string {
  return `${hubUrl.replace(/\/+$/, '')}/${model}/resolve/main/${file}`;
}

function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

async function downloadFile(url: string, path: string, options: ModelFileOptions): Promise<void> {
  const fetchImpl = options.fetchImpl ?? fetch;

  const body = await withRetry(
    async () => {
      const response = await fetchImpl(url);
      if (!response.ok) {
        throw new HttpStatusError(
          `Failed to download ${url}: ${response.status} ${response.statusText}`,
          response.status,
          parseRetryAfter(response.headers.get('retry-after')),
        );
      }
      return new Uint8Array(await response.arrayBuffer());
    },
    {
      onRetry: (error, attempt, delayMs) =>
        logger.warn(`Download attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`),
      ...options.retry,
    },
  );

  // Only complete files ever sit at the final path.
  const partial = `${path}.partial`;
  await mkdir(dirname(path), { recursive: true });
  await writeFile(partial, body);
  await rename(partial, path);
  logger.info(`Saved ${path} (${body.byteLength} bytes)`);
}

/**
 * Paths of the model files, downloading whichever are missing.
 */
export async function ensureModelFiles(model: string, options: ModelFileOptions): Promise<ModelFiles> {
  const dir = modelDirectory(options.cacheDir, model);
  const files: ModelFiles = {
    modelPath: join(dir, ...MODEL_FILE.split('/')),
    tokenizerPath: join(dir, TOKENIZER_FILE),
  };

  const wanted = [
    [MODEL_FILE, files.modelPath],
    [TOKENIZER_FILE, files.tokenizerPath],
  ] as const;

  for (const [file, path] of wanted) {
    if (await fileExists(path)) continue;

    if (options.offline) {
      throw new Error(
        `${file} for ${model} is not in ${options.cacheDir}; run once with EMBEDDING_OFFLINE=false to download it`,
      );
    }

    const url = modelFileUrl(options.hubUrl ?? DEFAULT_HUB_URL, model, file);
    logger.info(`Downloading ${url}`);
    await downloadFile(url, path, options);
  }

  return files;
}
