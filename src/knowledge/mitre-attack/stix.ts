/**
 * Parse the Enterprise ATT&CK STIX 2.1 bundle into technique entries.
 *
 * Only the handful of fields the correlator needs are validated; every
 * other property on a STIX object passes through untouched.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const ExternalReferenceSchema = z
  .object({
    source_name: z.string().optional(),
    external_id: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const KillChainPhaseSchema = z
  .object({
    kill_chain_name: z.string(),
    phase_name: z.string(),
  })
  .passthrough();

export const StixObjectSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    modified: z.string().optional(),
    revoked: z.boolean().optional(),
    external_references: z.array(ExternalReferenceSchema).optional(),
    kill_chain_phases: z.array(KillChainPhaseSchema).optional(),
    x_mitre_platforms: z.array(z.string()).optional(),
    x_mitre_is_subtechnique: z.boolean().optional(),
    x_mitre_deprecated: z.boolean().optional(),
    x_mitre_shortname: z.string().optional(),
    x_mitre_version: z.string().optional(),
  })
  .passthrough();

export const StixBundleSchema = z
  .object({
    type: z.literal('bundle'),
    id: z.string(),
    objects: z.array(StixObjectSchema),
  })
  .passthrough();

export type StixObject = z.infer<typeof StixObjectSchema>;
export type StixBundle = z.infer<typeof StixBundleSchema>;

// ---------------------------------------------------------------------------
// Parsed shapes
// ---------------------------------------------------------------------------

export interface ParsedTechniqueEntry {
  stixId: string;                // e.g., "attack-pattern--a62a8db3-..."
  id?: string;                   // ATT&CK ID; absent when the object has no mitre-attack reference
  name?: string;
  description?: string;
  tactics: string[];
  platforms: string[];
  isSubtechnique: boolean;
  parentId?: string;
  url: string;
}

export interface ParsedTacticEntry {
  id: string;
  name: string;
  shortName: string;
  techniques: string[];
}

export interface AttackMetadata {
  version: string;
  lastModified: string;
  techniqueCount: number;
  subtechniqueCount: number;
  tacticCount: number;
}

export interface ParsedAttackData {
  /** Keyed by STIX object id. */
  techniques: Record<string, ParsedTechniqueEntry>;
  tactics: Record<string, ParsedTacticEntry>;
  metadata: AttackMetadata;
}

const ATTACK_SOURCE = 'mitre-attack';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function attackReference(obj: StixObject) {
  return obj.external_references?.find((ref) => ref.source_name === ATTACK_SOURCE);
}

function isActive(obj: StixObject): boolean {
  return obj.revoked !== true && obj.x_mitre_deprecated !== true;
}

/**
 * Validate an unknown JSON value as a STIX bundle. Throws a ZodError when
 * the shape is wrong.
 */
export function validateStixBundle(value: unknown): StixBundle {
  return StixBundleSchema.parse(value);
}

/**
 * Techniques in bundle order, revoked and deprecated ones skipped. Fields
 * the object lacks stay absent; normalization fills in placeholders.
 */
export function extractTechniques(bundle: StixBundle): ParsedTechniqueEntry[] {
  const techniques: ParsedTechniqueEntry[] = [];

  for (const obj of bundle.objects) {
    if (obj.type !== 'attack-pattern' || !isActive(obj)) continue;

    const ref = attackReference(obj);
    const attackId = ref?.external_id;

    const tactics =
      obj.kill_chain_phases
        ?.filter((kc) => kc.kill_chain_name === ATTACK_SOURCE)
        .map((kc) => kc.phase_name) ?? [];

    const isSubtechnique = obj.x_mitre_is_subtechnique === true;

    techniques.push({
      stixId: obj.id,
      ...(attackId !== undefined ? { id: attackId } : {}),
      ...(obj.name !== undefined ? { name: obj.name } : {}),
      ...(obj.description !== undefined ? { description: obj.description } : {}),
      tactics,
      platforms: obj.x_mitre_platforms ?? [],
      isSubtechnique,
      ...(isSubtechnique && attackId ? { parentId: attackId.split('.')[0] } : {}),
      url: ref?.url ?? '',
    });
  }

  return techniques;
}

/**
 * Build the indexed snapshot persisted by `sync`.
 */
export function parseStixBundle(bundle: StixBundle): ParsedAttackData {
  const techniques: Record<string, ParsedTechniqueEntry> = {};
  for (const technique of extractTechniques(bundle)) {
    techniques[technique.stixId] = technique;
  }

  const tactics: Record<string, ParsedTacticEntry> = {};
  for (const obj of bundle.objects) {
    if (obj.type !== 'x-mitre-tactic' || !isActive(obj)) continue;

    const attackId = attackReference(obj)?.external_id;
    if (!attackId) continue;

    const shortName = obj.x_mitre_shortname ?? '';
    tactics[attackId] = {
      id: attackId,
      name: obj.name ?? '',
      shortName,
      techniques: Object.values(techniques).flatMap((t) =>
        t.id !== undefined && t.tactics.includes(shortName) ? [t.id] : [],
      ),
    };
  }

  let lastModified = '';
  for (const obj of bundle.objects) {
    if (obj.modified && obj.modified > lastModified) {
      lastModified = obj.modified;
    }
  }

  const entries = Object.values(techniques);
  const collection = bundle.objects.find((o) => o.type === 'x-mitre-collection');

  return {
    techniques,
    tactics,
    metadata: {
      version: collection?.x_mitre_version ?? 'unknown',
      lastModified,
      techniqueCount: entries.filter((t) => !t.isSubtechnique).length,
      subtechniqueCount: entries.filter((t) => t.isSubtechnique).length,
      tacticCount: Object.keys(tactics).length,
    },
  };
}
