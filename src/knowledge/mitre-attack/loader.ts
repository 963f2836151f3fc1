/**
 * Reads ATT&CK data from disk: either the snapshot written by `sync` or a
 * raw STIX bundle downloaded by other means.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { parseStixBundle, validateStixBundle, type ParsedAttackData } from './stix.js';

export const SNAPSHOT_FILE = 'enterprise-attack-parsed.json';
export const RAW_BUNDLE_FILE = 'enterprise-attack.json';

const TechniqueEntrySchema = z.object({
  stixId: z.string(),
  id: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  tactics: z.array(z.string()),
  platforms: z.array(z.string()).default([]),
  isSubtechnique: z.boolean().default(false),
  parentId: z.string().optional(),
  url: z.string().default(''),
});

const TacticEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  shortName: z.string(),
  techniques: z.array(z.string()),
});

const SnapshotSchema = z.object({
  techniques: z.record(TechniqueEntrySchema),
  tactics: z.record(TacticEntrySchema).default({}),
  metadata: z.object({
    version: z.string(),
    lastModified: z.string(),
    techniqueCount: z.number(),
    subtechniqueCount: z.number(),
    tacticCount: z.number(),
  }),
});

export function defaultSnapshotPath(dataDir: string): string {
  return join(dataDir, SNAPSHOT_FILE);
}

function isBundle(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'type' in value && value.type === 'bundle';
}

/**
 * Interpret already-parsed JSON as ATT&CK data.
 */
export function toAttackData(json: unknown): ParsedAttackData {
  if (isBundle(json)) {
    return parseStixBundle(validateStixBundle(json));
  }
  return SnapshotSchema.parse(json);
}

/**
 * Load ATT&CK data from a snapshot or STIX bundle file.
 */
export async function loadAttackData(path: string): Promise<ParsedAttackData> {
  const raw = await readFile(path, 'utf-8');
  return toAttackData(JSON.parse(raw));
}
