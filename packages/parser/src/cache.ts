import { LRUCache } from 'lru-cache';
import { DEFAULT_CACHE_SIZE } from '@morphochart/core';
import type { ChartSymbol } from '@morphochart/core';
import type { LanguageProfile } from './language.js';

export type ParseSource = 'dictionary' | 'rules' | 'opaque';

export interface ParseResult {
  readonly symbols: readonly ChartSymbol[];
  readonly source: ParseSource;
}

// One LRU per profile, so profiles that share a language code never collide
let capacity = DEFAULT_CACHE_SIZE;
let profileCaches = new WeakMap<LanguageProfile, LRUCache<string, ParseResult>>();
let cacheHits = 0;
let cacheMisses = 0;

/**
 * Clear every cached segmentation and transcription. Useful for tests or
 * after a profile's resources change.
 */
export function clearParserCache(): void {
  profileCaches = new WeakMap();
  cacheHits = 0;
  cacheMisses = 0;
}

/**
 * Set the per-profile capacity. Existing caches are dropped.
 */
export function setParserCacheCapacity(size: number): void {
  if (Number.isFinite(size) && size > 0) {
    capacity = Math.floor(size);
    profileCaches = new WeakMap();
  }
}

export function getParserCacheCapacity(): number {
  return capacity;
}

export function getCacheStats(): { hits: number; misses: number } {
  return { hits: cacheHits, misses: cacheMisses };
}

export function resetCacheStats(): void {
  cacheHits = 0;
  cacheMisses = 0;
}

/**
 * Return the cached result for (`profile`, `key`) or compute and store it.
 */
export function cachedParse(profile: LanguageProfile, key: string, compute: () => ParseResult): ParseResult {
  let cache = profileCaches.get(profile);
  if (!cache) {
    cache = new LRUCache({ max: capacity });
    profileCaches.set(profile, cache);
  }

  const cached = cache.get(key);
  if (cached) {
    cacheHits++;
    return cached;
  }

  cacheMisses++;
  const result = compute();
  cache.set(key, result);
  return result;
}
