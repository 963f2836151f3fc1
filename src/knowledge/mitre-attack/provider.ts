/**
 * Technique corpus provider contract and record normalization.
 */

import type { RawTechnique, TechniqueRecord } from '../../types/technique.js';
import type { ParsedTechniqueEntry } from './stix.js';

export interface TechniqueCorpusProvider {
  /** Human-readable origin (URL or file path), reported in results. */
  readonly source: string;

  /** Every technique in the corpus, in corpus order. */
  fetchAllTechniques(): Promise<RawTechnique[]>;
}

export const MISSING_ID = 'No ID';
export const MISSING_NAME = 'No Name';
export const MISSING_DESCRIPTION = 'No Description';

/**
 * Fill in placeholders for absent fields. Present values, empty strings
 * included, are kept as they are.
 */
export function normalizeTechnique(raw: RawTechnique): TechniqueRecord {
  return {
    id: raw.id ?? MISSING_ID,
    name: raw.name ?? MISSING_NAME,
    description: raw.description ?? MISSING_DESCRIPTION,
    tactics: raw.tactics ? [...raw.tactics] : [],
    ...(raw.url ? { url: raw.url } : {}),
  };
}

export function formatTactics(tactics: readonly string[]): string {
  return tactics.join(', ');
}

export function toRawTechnique(entry: ParsedTechniqueEntry): RawTechnique {
  return {
    id: entry.id,
    name: entry.name,
    description: entry.description,
    tactics: entry.tactics,
    platforms: entry.platforms,
    isSubtechnique: entry.isSubtechnique,
    url: entry.url,
  };
}
