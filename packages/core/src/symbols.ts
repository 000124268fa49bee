// morphochart/symbols - The morpheme/phoneme unit that labels transitions

import { InvalidInputError } from './errors.js';

/**
 * A morpheme or phoneme. Two symbols with the same `key` are the same
 * transition label, whatever their metadata.
 */
export interface ChartSymbol {
  readonly key: string;
  /** Display form, e.g. the surface allomorph; falls back to the key */
  readonly label?: string;
  readonly gloss?: string;
  readonly frequency?: number;
}

export interface SymbolMetadata {
  label?: string;
  gloss?: string;
  frequency?: number;
}

export function makeSymbol(key: string, metadata: SymbolMetadata = {}): ChartSymbol {
  if (typeof key !== 'string' || key.length === 0) {
    throw new InvalidInputError('Symbol key must be a non-empty string', key);
  }
  if (metadata.frequency !== undefined && !Number.isFinite(metadata.frequency)) {
    throw new InvalidInputError(`Invalid frequency for symbol "${key}": ${metadata.frequency}`, key);
  }

  const symbol: { -readonly [K in keyof ChartSymbol]: ChartSymbol[K] } = { key };
  if (metadata.label !== undefined && metadata.label !== key) symbol.label = metadata.label;
  if (metadata.gloss !== undefined) symbol.gloss = metadata.gloss;
  if (metadata.frequency !== undefined) symbol.frequency = metadata.frequency;
  return Object.freeze(symbol);
}

/** Build a frozen sequence of bare symbols from keys */
export function symbolsFromKeys(keys: Iterable<string>): readonly ChartSymbol[] {
  return Object.freeze(Array.from(keys, key => makeSymbol(key)));
}

export function symbolLabel(symbol: ChartSymbol): string {
  return symbol.label ?? symbol.key;
}

export function sameSymbol(a: ChartSymbol, b: ChartSymbol): boolean {
  return a.key === b.key;
}

export function sequenceKeys(symbols: readonly ChartSymbol[]): string[] {
  return symbols.map(symbol => symbol.key);
}

export function sameSequence(a: readonly ChartSymbol[], b: readonly ChartSymbol[]): boolean {
  return a.length === b.length && a.every((symbol, i) => symbol.key === b[i].key);
}

export function formatSequence(symbols: readonly ChartSymbol[], separator = ' + '): string {
  return symbols.map(symbolLabel).join(separator);
}

// Code-unit order, independent of the runtime locale
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
