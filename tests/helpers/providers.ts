/**
 * In-process stand-ins for the embedding model and the ATT&CK feed.
 */

import type { EmbeddingProvider } from '@/embedding/provider.js';
import type { TechniqueCorpusProvider } from '@/knowledge/mitre-attack/provider.js';
import type { EmbeddingVector, RawTechnique } from '@/types/technique.js';

/**
 * Looks texts up in a table; unknown texts encode to `fallback`.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-model';
  encodeCalls: string[] = [];
  batchCalls: string[][] = [];

  constructor(
    private readonly table: Record<string, number[]>,
    private readonly fallback: number[] = [0, 0],
  ) {}

  async encode(text: string): Promise<EmbeddingVector> {
    this.encodeCalls.push(text);
    return this.table[text] ?? this.fallback;
  }

  async encodeBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    this.batchCalls.push([...texts]);
    return texts.map((t) => this.table[t] ?? this.fallback);
  }
}

export class FakeCorpusProvider implements TechniqueCorpusProvider {
  readonly source = 'fake://attack';
  calls = 0;

  constructor(private readonly techniques: RawTechnique[]) {}

  async fetchAllTechniques(): Promise<RawTechnique[]> {
    this.calls++;
    return this.techniques;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Corpus whose fetch waits until the test releases it.
 */
export class GatedCorpusProvider implements TechniqueCorpusProvider {
  readonly source = 'gated://attack';
  readonly gates: Deferred<RawTechnique[]>[] = [];

  fetchAllTechniques(): Promise<RawTechnique[]> {
    const gate = deferred<RawTechnique[]>();
    this.gates.push(gate);
    return gate.promise;
  }
}

export const PHISHING_QUERY = 'phishing email with malicious attachment';

/** Unit vector at cosine `similarity` from [1, 0]. */
export function vectorAt(similarity: number): number[] {
  return [similarity, Math.sqrt(1 - similarity * similarity)];
}

export const SAMPLE_TECHNIQUES: RawTechnique[] = [
  {
    id: 'T1566.001',
    name: 'Spearphishing Attachment',
    description: 'Adversaries may send spearphishing emails with a malicious attachment.',
    tactics: ['initial-access'],
    url: 'https://attack.mitre.org/techniques/T1566/001',
  },
  {
    id: 'T1059.001',
    name: 'PowerShell',
    description: 'Adversaries may abuse PowerShell commands and scripts for execution.',
    tactics: ['execution'],
  },
];

export function sampleEmbeddings(): FakeEmbeddingProvider {
  return new FakeEmbeddingProvider({
    [PHISHING_QUERY]: [1, 0],
    [SAMPLE_TECHNIQUES[0].description ?? '']: vectorAt(0.81),
    [SAMPLE_TECHNIQUES[1].description ?? '']: vectorAt(0.34),
  });
}
