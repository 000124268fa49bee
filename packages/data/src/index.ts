// @morphochart/data - Resource tables, bundled language profiles, vocabulary sources and the bulk loader

// Resource tables
export {
  type TableRow,
  readRows,
  parseNumberField,
  parseMorphemeTable,
  parseG2PTable,
  parsePronunciationTable
} from './tables.js';

// Vocabulary sources
export {
  type VocabularyEntry,
  type VocabularySource,
  createVocabulary,
  parseVocabulary,
  topEntries
} from './vocabulary.js';

// Bulk loading
export {
  type BulkLoadOptions,
  type BulkDiagnostic,
  type BulkLoadReport,
  addCommon,
  addStates,
  addWords
} from './bulk.js';

// Bundled profiles
export {
  type BundledLanguage,
  RESOURCES_DIR,
  bundledLanguages,
  loadBundledProfile,
  loadBundledVocabulary,
  resetBundledProfiles
} from './bundled.js';
