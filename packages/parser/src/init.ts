// Applies configuration to the parser: debug logging, profiling and the
// segmentation cache capacity.

import { getConfigFromEnv, setDebug } from '@morphochart/core';
import type { MorphochartConfig } from '@morphochart/core';
import { setParserCacheCapacity } from './cache.js';
import { setProfiling } from './profile.js';

let appliedConfig: MorphochartConfig | null = null;

/**
 * Apply `config` (read from the environment when omitted). Calling it again
 * with a new configuration replaces the previous one.
 */
export function initializeParser(config: MorphochartConfig = getConfigFromEnv()): MorphochartConfig {
  setDebug(config.debug);
  setProfiling(config.profile);
  setParserCacheCapacity(config.cacheSize);
  appliedConfig = { ...config };
  return appliedConfig;
}

export function getAppliedConfig(): MorphochartConfig | null {
  return appliedConfig;
}

/**
 * Reset initialization state (primarily for testing)
 */
export function resetInitialization(): void {
  appliedConfig = null;
}
