// morphochart/parser/language - Language resources and their lookup indexes

import { InvalidInputError, cleanWord, compareKeys, ipaClusterCount } from '@morphochart/core';

export type MorphemeRole = 'prefix' | 'suffix' | 'root';

export const MORPHEME_ROLES: readonly MorphemeRole[] = ['prefix', 'suffix', 'root'];

export interface MorphemeEntry {
  /** Spelling as it appears in words; edge hyphens (un-, -able) are ignored */
  fragment: string;
  role: MorphemeRole;
  /** Identity of the morpheme; defaults to the fragment */
  key?: string;
  frequency?: number;
  gloss?: string;
}

/**
 * One grapheme-to-phoneme rule. `^` and `$` anchor the grapheme to the
 * start or end of the word. `phonemes` holds space-separated IPA phonemes
 * and may be empty for a silent grapheme.
 */
export interface G2PRule {
  grapheme: string;
  phonemes: string;
}

export interface LanguageResources {
  code: string;
  name?: string;
  morphemes?: readonly MorphemeEntry[];
  g2p?: readonly G2PRule[];
  pronunciations?: ReadonlyMap<string, string> | Readonly<Record<string, string>>;
  /** Shortest stem that affix peeling may leave behind (default 2) */
  minStemLength?: number;
}

export interface IndexedMorpheme {
  fragment: string;
  key: string;
  role: MorphemeRole;
  frequency: number;
  gloss?: string;
}

export interface CompiledRule {
  grapheme: string;
  anchorStart: boolean;
  anchorEnd: boolean;
  phonemes: readonly string[];
  order: number;
}

type MorphemeIndex = ReadonlyMap<string, readonly IndexedMorpheme[]>;

export interface LanguageProfile {
  readonly code: string;
  readonly name: string;
  readonly minStemLength: number;
  /** Every entry by fragment, best candidate first */
  readonly morphemes: MorphemeIndex;
  readonly prefixes: MorphemeIndex;
  readonly suffixes: MorphemeIndex;
  readonly roots: MorphemeIndex;
  readonly maxPrefixLength: number;
  readonly maxSuffixLength: number;
  readonly maxRootLength: number;
  /** Longest grapheme first, table order among equal lengths */
  readonly rules: readonly CompiledRule[];
  readonly pronunciations: ReadonlyMap<string, string>;
  /** Multi-character phonemes produced by the rules, e.g. diphthongs */
  readonly inventory: ReadonlySet<string>;
}

export const DEFAULT_MIN_STEM_LENGTH = 2;

/**
 * Ambiguity tie-break: higher frequency wins, then the smaller key.
 */
export function compareMorphemes(a: IndexedMorpheme, b: IndexedMorpheme): number {
  if (b.frequency !== a.frequency) return b.frequency - a.frequency;
  return compareKeys(a.key, b.key);
}

function indexMorpheme(entry: MorphemeEntry, position: number): IndexedMorpheme {
  const fragment = cleanWord(entry.fragment ?? '');
  if (!fragment) {
    throw new InvalidInputError(`Morpheme entry ${position + 1} has an empty fragment`, entry.fragment);
  }
  if (!MORPHEME_ROLES.includes(entry.role)) {
    throw new InvalidInputError(`Morpheme "${entry.fragment}" has unknown role: ${entry.role}`, entry.fragment);
  }
  const frequency = entry.frequency ?? 0;
  if (!Number.isFinite(frequency)) {
    throw new InvalidInputError(`Morpheme "${entry.fragment}" has invalid frequency: ${entry.frequency}`, entry.fragment);
  }

  const indexed: IndexedMorpheme = {
    fragment,
    key: entry.key?.trim() || fragment,
    role: entry.role,
    frequency
  };
  if (entry.gloss) indexed.gloss = entry.gloss;
  return indexed;
}

function buildIndex(entries: readonly IndexedMorpheme[]): { index: MorphemeIndex; maxLength: number } {
  const index = new Map<string, IndexedMorpheme[]>();
  let maxLength = 0;

  for (const entry of entries) {
    const bucket = index.get(entry.fragment) ?? [];
    // The same morpheme listed twice keeps its first row
    if (!bucket.some(existing => existing.key === entry.key && existing.role === entry.role)) {
      bucket.push(entry);
    }
    index.set(entry.fragment, bucket);
    maxLength = Math.max(maxLength, entry.fragment.length);
  }

  for (const bucket of index.values()) {
    bucket.sort(compareMorphemes);
  }

  return { index, maxLength };
}

export function compileRule(rule: G2PRule, order: number): CompiledRule {
  let grapheme = (rule.grapheme ?? '').trim();
  const anchorStart = grapheme.startsWith('^');
  if (anchorStart) grapheme = grapheme.slice(1);
  const anchorEnd = grapheme.endsWith('$');
  if (anchorEnd) grapheme = grapheme.slice(0, -1);
  grapheme = grapheme.normalize('NFC').toLowerCase();

  if (!grapheme) {
    throw new InvalidInputError(`Grapheme rule ${order + 1} has an empty pattern`, rule.grapheme);
  }

  const phonemes = (rule.phonemes ?? '').normalize('NFC').split(/\s+/).filter(Boolean);
  return { grapheme, anchorStart, anchorEnd, phonemes, order };
}

type PronunciationSource = NonNullable<LanguageResources['pronunciations']>;

function isPronunciationMap(source: PronunciationSource): source is ReadonlyMap<string, string> {
  return source instanceof Map;
}

function pronunciationEntries(source: LanguageResources['pronunciations']): Iterable<[string, string]> {
  if (!source) return [];
  if (isPronunciationMap(source)) return source.entries();
  return Object.entries(source);
}

export function createLanguageProfile(resources: LanguageResources): LanguageProfile {
  const code = resources.code?.trim();
  if (!code) {
    throw new InvalidInputError('Language resources need a language code');
  }

  const minStemLength = resources.minStemLength ?? DEFAULT_MIN_STEM_LENGTH;
  if (!Number.isInteger(minStemLength) || minStemLength < 1) {
    throw new InvalidInputError(`Invalid minimum stem length for ${code}: ${minStemLength}`);
  }

  const entries = (resources.morphemes ?? []).map(indexMorpheme);
  const all = buildIndex(entries);
  const prefixes = buildIndex(entries.filter(entry => entry.role === 'prefix'));
  const suffixes = buildIndex(entries.filter(entry => entry.role === 'suffix'));
  const roots = buildIndex(entries.filter(entry => entry.role === 'root'));

  const rules = (resources.g2p ?? [])
    .map(compileRule)
    .sort((a, b) => b.grapheme.length - a.grapheme.length || a.order - b.order);

  const inventory = new Set<string>();
  for (const rule of rules) {
    for (const phoneme of rule.phonemes) {
      if (ipaClusterCount(phoneme) > 1) inventory.add(phoneme);
    }
  }

  // Words that clean to the same spelling keep the first pronunciation
  const pronunciations = new Map<string, string>();
  for (const [word, ipa] of pronunciationEntries(resources.pronunciations)) {
    const cleaned = cleanWord(word);
    if (cleaned && ipa && !pronunciations.has(cleaned)) {
      pronunciations.set(cleaned, ipa);
    }
  }

  return {
    code,
    name: resources.name?.trim() || code,
    minStemLength,
    morphemes: all.index,
    prefixes: prefixes.index,
    suffixes: suffixes.index,
    roots: roots.index,
    maxPrefixLength: prefixes.maxLength,
    maxSuffixLength: suffixes.maxLength,
    maxRootLength: roots.maxLength,
    rules,
    pronunciations,
    inventory
  };
}
