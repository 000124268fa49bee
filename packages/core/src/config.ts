// morphochart/config - Environment configuration and debug logging

import { config as loadDotenv } from 'dotenv';
import { InvalidInputError } from './errors.js';

export interface MorphochartConfig {
  debug: boolean;
  profile: boolean;
  cacheSize: number;
}

export interface LoadConfigOptions {
  /** Path of a .env file to load before reading the environment */
  path?: string;
  /** Target environment; defaults to process.env */
  env?: Record<string, string>;
}

export const DEFAULT_CACHE_SIZE = 500;

type EnvLike = Readonly<Record<string, string | undefined>>;

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function getConfigFromEnv(env: EnvLike = process.env): MorphochartConfig {
  const rawCacheSize = env.MORPHOCHART_CACHE_SIZE;
  let cacheSize = DEFAULT_CACHE_SIZE;

  if (rawCacheSize !== undefined && rawCacheSize.trim() !== '') {
    const parsed = Number(rawCacheSize);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new InvalidInputError(`Invalid MORPHOCHART_CACHE_SIZE: ${rawCacheSize}`, rawCacheSize);
    }
    cacheSize = parsed;
  }

  return {
    debug: parseFlag(env.MORPHOCHART_DEBUG),
    profile: parseFlag(env.MORPHOCHART_PROFILE),
    cacheSize
  };
}

/**
 * Load a .env file (dotenv never overrides variables that are already set)
 * and read the configuration from the resulting environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): MorphochartConfig {
  const result = options.env
    ? loadDotenv({ path: options.path, processEnv: options.env })
    : loadDotenv({ path: options.path });

  if (options.path && result.error) {
    throw new InvalidInputError(`Cannot load env file ${options.path}: ${result.error.message}`, options.path);
  }

  return getConfigFromEnv(options.env ?? process.env);
}

// Debug logging
export let DEBUG = false;

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function isDebugEnabled(): boolean {
  return DEBUG;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}
