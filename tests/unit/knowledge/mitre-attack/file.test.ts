import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileCorpusProvider } from '@/knowledge/mitre-attack/file.js';
import { parseStixBundle } from '@/knowledge/mitre-attack/stix.js';
import { createBundle } from '../../../helpers/stix.js';

describe('FileCorpusProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'attack-file-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should serve techniques from a snapshot', async () => {
    const path = join(dir, 'snapshot.json');
    await writeFile(path, JSON.stringify(parseStixBundle(createBundle())), 'utf-8');

    const provider = new FileCorpusProvider(path);
    const techniques = await provider.fetchAllTechniques();

    expect(provider.source).toBe(path);
    expect(techniques.map((t) => [t.id, t.name])).toEqual([
      ['T1566', 'Phishing'],
      ['T1566.001', 'Spearphishing Attachment'],
      ['T1078', 'Valid Accounts'],
      [undefined, 'No ATT&CK reference'],
    ]);
  });

  it('should serve techniques from a raw bundle', async () => {
    const path = join(dir, 'bundle.json');
    await writeFile(path, JSON.stringify(createBundle()), 'utf-8');

    const techniques = await new FileCorpusProvider(path).fetchAllTechniques();

    expect(techniques[2].tactics).toEqual(['defense-evasion', 'persistence']);
  });

  it('should pick up changes to the file between calls', async () => {
    const path = join(dir, 'snapshot.json');
    const data = parseStixBundle(createBundle());
    await writeFile(path, JSON.stringify(data), 'utf-8');
    const provider = new FileCorpusProvider(path);

    expect(await provider.fetchAllTechniques()).toHaveLength(4);

    delete data.techniques['attack-pattern--0003'];
    await writeFile(path, JSON.stringify(data), 'utf-8');

    expect(await provider.fetchAllTechniques()).toHaveLength(3);
  });

  it('should reject when the file does not exist', async () => {
    await expect(new FileCorpusProvider(join(dir, 'none.json')).fetchAllTechniques()).rejects.toThrow(
      /ENOENT/,
    );
  });
});
