import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  extractTechniques,
  parseStixBundle,
  validateStixBundle,
} from '@/knowledge/mitre-attack/stix.js';
import { createBundle } from '../../../helpers/stix.js';

describe('validateStixBundle', () => {
  it('should accept a bundle and keep unknown properties', () => {
    const bundle = validateStixBundle({ ...createBundle(), spec_version: '2.1' });
    expect(bundle.objects).toHaveLength(10);
    expect(bundle.spec_version).toBe('2.1');
  });

  it('should reject JSON that is not a bundle', () => {
    expect(() => validateStixBundle({ type: 'report', id: 'x', objects: [] })).toThrow(ZodError);
    expect(() => validateStixBundle({ type: 'bundle', id: 'x' })).toThrow(ZodError);
    expect(() => validateStixBundle(null)).toThrow(ZodError);
  });
});

describe('extractTechniques', () => {
  it('should keep active attack-patterns in bundle order', () => {
    const ids = extractTechniques(createBundle()).map((t) => t.id);
    expect(ids).toEqual(['T1566', 'T1566.001', 'T1078', undefined]);
  });

  it('should keep an attack-pattern without an ATT&CK reference', () => {
    const orphan = extractTechniques(createBundle())[3];
    expect(orphan).toEqual({
      stixId: 'attack-pattern--0006',
      name: 'No ATT&CK reference',
      tactics: [],
      platforms: [],
      isSubtechnique: false,
      url: '',
    });
    expect('id' in orphan).toBe(false);
  });

  it('should read tactics from the mitre-attack kill chain only', () => {
    const [, spearphishing, validAccounts] = extractTechniques(createBundle());
    expect(spearphishing.tactics).toEqual(['initial-access']);
    expect(validAccounts.tactics).toEqual(['defense-evasion', 'persistence']);
  });

  it('should take the URL from the mitre-attack reference', () => {
    const [phishing, spearphishing, validAccounts] = extractTechniques(createBundle());
    expect(phishing.url).toBe('https://attack.mitre.org/techniques/T1566');
    expect(spearphishing.url).toBe('https://attack.mitre.org/techniques/T1566/001');
    expect(validAccounts.url).toBe('');
  });

  it('should mark subtechniques with their parent', () => {
    const [phishing, spearphishing] = extractTechniques(createBundle());
    expect(phishing.isSubtechnique).toBe(false);
    expect(phishing.parentId).toBeUndefined();
    expect(spearphishing.isSubtechnique).toBe(true);
    expect(spearphishing.parentId).toBe('T1566');
  });

  it('should leave missing text fields absent', () => {
    const bundle = validateStixBundle({
      type: 'bundle',
      id: 'bundle--x',
      objects: [
        {
          type: 'attack-pattern',
          id: 'attack-pattern--x',
          external_references: [{ source_name: 'mitre-attack', external_id: 'T0001' }],
        },
      ],
    });

    expect(extractTechniques(bundle)).toEqual([
      {
        stixId: 'attack-pattern--x',
        id: 'T0001',
        tactics: [],
        platforms: [],
        isSubtechnique: false,
        url: '',
      },
    ]);
  });
});

describe('parseStixBundle', () => {
  it('should index techniques by STIX object id', () => {
    const data = parseStixBundle(createBundle());
    expect(Object.keys(data.techniques)).toEqual([
      'attack-pattern--0001',
      'attack-pattern--0002',
      'attack-pattern--0003',
      'attack-pattern--0006',
    ]);
    expect(data.techniques['attack-pattern--0001'].platforms).toEqual(['Windows', 'Linux']);
    expect(data.techniques['attack-pattern--0006'].id).toBeUndefined();
  });

  it('should link tactics to their techniques', () => {
    const data = parseStixBundle(createBundle());
    expect(data.tactics['TA0001']).toEqual({
      id: 'TA0001',
      name: 'Initial Access',
      shortName: 'initial-access',
      techniques: ['T1566', 'T1566.001'],
    });
    expect(data.tactics['TA0003'].techniques).toEqual(['T1078']);
  });

  it('should summarize the bundle', () => {
    expect(parseStixBundle(createBundle()).metadata).toEqual({
      version: '15.1',
      lastModified: '2024-04-23T00:00:00.000Z',
      techniqueCount: 3,
      subtechniqueCount: 1,
      tacticCount: 2,
    });
  });

  it('should report an unknown version when there is no collection object', () => {
    const bundle = createBundle();
    bundle.objects = bundle.objects.filter((o) => o.type !== 'x-mitre-collection');
    expect(parseStixBundle(bundle).metadata.version).toBe('unknown');
  });
});
