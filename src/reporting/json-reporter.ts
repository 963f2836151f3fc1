/**
 * Machine-readable JSON report for a correlation result.
 */

import type { CorrelationResult } from '../types/technique.js';

export interface CorrelationReport {
  metadata: {
    generatedAt: string;
    version: string;
    model: string;
    source: string;
    candidateCount: number;
    durationMs: number;
  };
  query: string;
  matches: Array<{
    id: string;
    name: string;
    tactics: string[];
    url?: string;
    similarity: number;
  }>;
}

export function buildCorrelationReport(
  result: CorrelationResult,
  version: string,
  now: Date = new Date(),
): CorrelationReport {
  return {
    metadata: {
      generatedAt: now.toISOString(),
      version,
      model: result.model,
      source: result.source,
      candidateCount: result.candidateCount,
      durationMs: result.durationMs,
    },
    query: result.query,
    matches: result.matches.map((m) => ({
      id: m.record.id,
      name: m.record.name,
      tactics: [...m.record.tactics],
      ...(m.record.url ? { url: m.record.url } : {}),
      similarity: Math.round(m.similarity * 10000) / 10000,
    })),
  };
}

/**
 * Pretty-printed with 2-space indentation.
 */
export function generateJsonReport(report: CorrelationReport): string {
  return JSON.stringify(report, null, 2);
}
