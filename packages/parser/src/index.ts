// @morphochart/parser - Morpheme segmentation and IPA transcription over language profiles

export {
  type MorphemeRole,
  type MorphemeEntry,
  type G2PRule,
  type LanguageResources,
  type LanguageProfile,
  type IndexedMorpheme,
  type CompiledRule,
  MORPHEME_ROLES,
  DEFAULT_MIN_STEM_LENGTH,
  compareMorphemes,
  compileRule,
  createLanguageProfile
} from './language.js';

export { segmentWord, segmentMorphemes } from './segmentation.js';
export { transcribeWord, transcribeIpa, applyG2PRules, splitPronunciation } from './transcription.js';
export { type WordAnalysis, type RecordMetadata, analyzeWord, parseRecord } from './analysis.js';

export {
  type ParseResult,
  type ParseSource,
  clearParserCache,
  setParserCacheCapacity,
  getParserCacheCapacity,
  getCacheStats,
  resetCacheStats
} from './cache.js';

export { time, setProfiling, isProfilingEnabled } from './profile.js';
export { initializeParser, getAppliedConfig, resetInitialization } from './init.js';
