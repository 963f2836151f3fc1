/**
 * Fetches the live Enterprise ATT&CK STIX bundle over HTTP.
 */

import type { RawTechnique } from '../../types/technique.js';
import { createLogger } from '../../utils/logger.js';
import { HttpStatusError, parseRetryAfter } from '../../utils/retry.js';
import { toRawTechnique, type TechniqueCorpusProvider } from './provider.js';
import { extractTechniques, validateStixBundle, type StixBundle } from './stix.js';

const logger = createLogger('attack-remote');

export interface RemoteStixOptions {
  url: string;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

export class RemoteStixCorpusProvider implements TechniqueCorpusProvider {
  readonly source: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RemoteStixOptions) {
    this.source = options.url;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchAllTechniques(): Promise<RawTechnique[]> {
    const { bundle } = await fetchStixBundle(this.source, this.fetchImpl);
    const techniques = extractTechniques(bundle);
    logger.debug(`Fetched ${techniques.length} techniques from ${this.source}`);
    return techniques.map(toRawTechnique);
  }
}

/**
 * Download and validate a STIX bundle. Non-2xx responses throw
 * HttpStatusError; malformed bodies throw a ZodError or SyntaxError.
 */
export async function fetchStixBundle(
  url: string,
  fetchImpl: typeof fetch = fetch,
): Promise<{ bundle: StixBundle; rawText: string }> {
  const response = await fetchImpl(url);

  if (!response.ok) {
    throw new HttpStatusError(
      `Failed to download ATT&CK data: ${response.status} ${response.statusText}`,
      response.status,
      parseRetryAfter(response.headers.get('retry-after')),
    );
  }

  const rawText = await response.text();
  const bundle = validateStixBundle(JSON.parse(rawText));
  return { bundle, rawText };
}
