// @morphochart/core - Symbols, the state automaton, its query facade and shared utilities

// Configuration and debug logging
export {
  type MorphochartConfig,
  type LoadConfigOptions,
  DEFAULT_CACHE_SIZE,
  getConfigFromEnv,
  loadConfig,
  setDebug,
  isDebugEnabled,
  dp,
  DEBUG
} from './config.js';

// Errors
export { MorphochartError, InvalidInputError, NoSuchPathError } from './errors.js';

// Symbols
export {
  type ChartSymbol,
  type SymbolMetadata,
  makeSymbol,
  symbolsFromKeys,
  symbolLabel,
  sameSymbol,
  sameSequence,
  sequenceKeys,
  formatSequence,
  compareKeys
} from './symbols.js';

// Character utilities
export {
  IPA_TIE_BARS,
  IPA_MODIFIERS,
  IPA_STRESS_MARKS,
  isIpaDiacritic,
  cleanWord,
  cleanIpa,
  splitIpa,
  ipaClusterCount
} from './characters.js';

// Automaton
export {
  type AutomatonOptions,
  Automaton,
  ROOT_STATE,
  createAutomaton,
  insert,
  transitionsFrom,
  isAccepting,
  pathFor,
  mergeAutomaton
} from './automaton.js';

// Query/export facade
export {
  type ChartState,
  type ChartTransition,
  type ChartData,
  type ChartStats,
  categorizePartOfSpeech,
  reachableStates,
  outgoingTransitions,
  recordsAt,
  destinations,
  stateCategories,
  highlightPath,
  exportChart,
  chartStats
} from './query.js';

// Shared types
export type * from './types.js';
export { CHART_CATEGORIES } from './types.js';
