/**
 * Plain-text result blocks:
 *
 *   ID: T1566.001
 *   Name: Spearphishing Attachment
 *   Tactic: initial-access
 *   Similarity: 0.8100
 *
 * Blocks are separated by a blank line.
 */

import { formatTactics } from '../knowledge/mitre-attack/provider.js';
import type { ScoredMatch } from '../types/technique.js';

export const BLOCK_SEPARATOR = '\n\n';

export function formatMatch(match: ScoredMatch): string {
  return [
    `ID: ${match.record.id}`,
    `Name: ${match.record.name}`,
    `Tactic: ${formatTactics(match.record.tactics)}`,
    `Similarity: ${match.similarity.toFixed(4)}`,
  ].join('\n');
}

export function formatMatches(matches: readonly ScoredMatch[]): string {
  return matches.map(formatMatch).join(BLOCK_SEPARATOR);
}
