/**
 * Serves techniques from a local snapshot or STIX bundle for offline use.
 */

import type { RawTechnique } from '../../types/technique.js';
import { loadAttackData } from './loader.js';
import { toRawTechnique, type TechniqueCorpusProvider } from './provider.js';

export class FileCorpusProvider implements TechniqueCorpusProvider {
  constructor(public readonly source: string) {}

  /** Re-reads the file on every call; nothing is cached between requests. */
  async fetchAllTechniques(): Promise<RawTechnique[]> {
    const data = await loadAttackData(this.source);
    return Object.values(data.techniques).map(toRawTechnique);
  }
}
