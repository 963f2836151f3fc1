/**
 * Download the Enterprise ATT&CK bundle and store it for offline matching.
 *
 * Outputs (under the data directory):
 *   enterprise-attack.json          – raw STIX bundle
 *   enterprise-attack-parsed.json   – parsed snapshot read by the file provider
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { withRetry, type RetryOptions } from '../../utils/retry.js';
import { createLogger } from '../../utils/logger.js';
import { RAW_BUNDLE_FILE, SNAPSHOT_FILE } from './loader.js';
import { fetchStixBundle } from './remote.js';
import { parseStixBundle, type AttackMetadata } from './stix.js';

const logger = createLogger('attack-download');

export interface DownloadOptions {
  retry?: RetryOptions;
  fetchImpl?: typeof fetch;
}

export interface DownloadResult {
  rawPath: string;
  snapshotPath: string;
  objectCount: number;
  metadata: AttackMetadata;
}

export async function downloadAttackData(
  url: string,
  dataDir: string,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  logger.info(`Downloading Enterprise ATT&CK STIX bundle from ${url}`);

  const { bundle, rawText } = await withRetry(
    () => fetchStixBundle(url, options.fetchImpl),
    {
      onRetry: (error, attempt, delayMs) =>
        logger.warn(`Download attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`),
      ...options.retry,
    },
  );

  await mkdir(dataDir, { recursive: true });

  const rawPath = join(dataDir, RAW_BUNDLE_FILE);
  await writeFile(rawPath, rawText, 'utf-8');

  const parsed = parseStixBundle(bundle);
  const snapshotPath = join(dataDir, SNAPSHOT_FILE);
  await writeFile(snapshotPath, JSON.stringify(parsed, null, 2), 'utf-8');

  logger.info(
    `Techniques: ${parsed.metadata.techniqueCount} ` +
      `(+${parsed.metadata.subtechniqueCount} subtechniques), ` +
      `Tactics: ${parsed.metadata.tacticCount}`,
  );

  return {
    rawPath,
    snapshotPath,
    objectCount: bundle.objects.length,
    metadata: parsed.metadata,
  };
}
