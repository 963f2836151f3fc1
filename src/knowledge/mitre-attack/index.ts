/**
 * MITRE ATT&CK technique corpus.
 */

export {
  normalizeTechnique,
  formatTactics,
  toRawTechnique,
  MISSING_ID,
  MISSING_NAME,
  MISSING_DESCRIPTION,
  type TechniqueCorpusProvider,
} from './provider.js';

export {
  parseStixBundle,
  extractTechniques,
  validateStixBundle,
  type StixBundle,
  type StixObject,
  type ParsedAttackData,
  type ParsedTechniqueEntry,
  type ParsedTacticEntry,
  type AttackMetadata,
} from './stix.js';

export {
  loadAttackData,
  toAttackData,
  defaultSnapshotPath,
  SNAPSHOT_FILE,
  RAW_BUNDLE_FILE,
} from './loader.js';

export { RemoteStixCorpusProvider, fetchStixBundle, type RemoteStixOptions } from './remote.js';
export { FileCorpusProvider } from './file.js';
export { downloadAttackData, type DownloadOptions, type DownloadResult } from './download.js';
export { selectCorpusProvider } from './select.js';
