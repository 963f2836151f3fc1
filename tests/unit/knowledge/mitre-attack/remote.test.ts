import { describe, it, expect, vi } from 'vitest';
import { normalizeTechnique } from '@/knowledge/mitre-attack/provider.js';
import { fetchStixBundle, RemoteStixCorpusProvider } from '@/knowledge/mitre-attack/remote.js';
import { HttpStatusError } from '@/utils/retry.js';
import { createBundle } from '../../../helpers/stix.js';

const BUNDLE_URL = 'https://example.test/enterprise-attack.json';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('fetchStixBundle', () => {
  it('should return the validated bundle and the raw text', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(createBundle()));

    const { bundle, rawText } = await fetchStixBundle(BUNDLE_URL, fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith(BUNDLE_URL);
    expect(bundle.objects).toHaveLength(10);
    expect(JSON.parse(rawText)).toEqual(createBundle());
  });

  it('should throw HttpStatusError with Retry-After on non-2xx responses', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('slow down', {
        status: 429,
        statusText: 'Too Many Requests',
        headers: { 'Retry-After': '7' },
      }),
    );

    const error = await fetchStixBundle(BUNDLE_URL, fetchImpl).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({
      message: 'Failed to download ATT&CK data: 429 Too Many Requests',
      statusCode: 429,
      retryAfterMs: 7000,
    });
  });

  it('should reject a body that is not a STIX bundle', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ type: 'report' }));
    await expect(fetchStixBundle(BUNDLE_URL, fetchImpl)).rejects.toThrow();
  });
});

describe('RemoteStixCorpusProvider', () => {
  it('should expose the BUNDLE_URL as its source', () => {
    expect(new RemoteStixCorpusProvider({ url: BUNDLE_URL }).source).toBe(BUNDLE_URL);
  });

  it('should return raw techniques from the live bundle', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(createBundle()));
    const provider = new RemoteStixCorpusProvider({ url: BUNDLE_URL, fetchImpl });

    const techniques = await provider.fetchAllTechniques();

    expect(techniques.map((t) => t.id)).toEqual(['T1566', 'T1566.001', 'T1078', undefined]);
    expect(techniques[1]).toEqual({
      id: 'T1566.001',
      name: 'Spearphishing Attachment',
      description: 'Adversaries may send spearphishing emails with a malicious attachment.',
      tactics: ['initial-access'],
      platforms: [],
      isSubtechnique: true,
      url: 'https://attack.mitre.org/techniques/T1566/001',
    });
  });

  it('should keep techniques without an ATT&CK ID under the placeholder', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(createBundle()));
    const provider = new RemoteStixCorpusProvider({ url: BUNDLE_URL, fetchImpl });

    const records = (await provider.fetchAllTechniques()).map(normalizeTechnique);

    expect(records[3]).toEqual({
      id: 'No ID',
      name: 'No ATT&CK reference',
      description: 'No Description',
      tactics: [],
    });
  });

  it('should fall back to the global fetch', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(createBundle()));
    vi.stubGlobal('fetch', fetchMock);
    try {
      const techniques = await new RemoteStixCorpusProvider({ url: BUNDLE_URL }).fetchAllTechniques();
      expect(techniques).toHaveLength(4);
      expect(fetchMock).toHaveBeenCalledWith(BUNDLE_URL);
    } finally {
      vi.unstubAllGlobals();
    }
  });

  it('should propagate network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const provider = new RemoteStixCorpusProvider({ url: BUNDLE_URL, fetchImpl });
    await expect(provider.fetchAllTechniques()).rejects.toThrow('fetch failed');
  });
});
