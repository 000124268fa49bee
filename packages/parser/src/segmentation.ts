// morphochart/parser/segmentation - Morpheme segmentation
//
// Dictionary first: a word listed as a whole is one morpheme. Otherwise
// known prefixes and suffixes are peeled from both ends, longest first,
// until nothing more comes off or the remainder is a known root. The stem
// left over is a root, a compound of roots, or one opaque symbol.

import { InvalidInputError, cleanWord, dp, makeSymbol } from '@morphochart/core';
import type { ChartSymbol } from '@morphochart/core';
import { cachedParse } from './cache.js';
import type { ParseResult, ParseSource } from './cache.js';
import type { IndexedMorpheme, LanguageProfile } from './language.js';
import { time } from './profile.js';

interface Pick {
  surface: string;
  entry: IndexedMorpheme;
}

function toSymbol(pick: Pick): ChartSymbol {
  return makeSymbol(pick.entry.key, {
    label: pick.surface,
    gloss: pick.entry.gloss,
    frequency: pick.entry.frequency
  });
}

function best(index: ReadonlyMap<string, readonly IndexedMorpheme[]>, fragment: string): Pick | undefined {
  const entries = index.get(fragment);
  return entries && entries.length > 0 ? { surface: fragment, entry: entries[0] } : undefined;
}

function longestPrefix(stem: string, profile: LanguageProfile): Pick | undefined {
  const longest = Math.min(profile.maxPrefixLength, stem.length - profile.minStemLength);
  for (let length = longest; length > 0; length--) {
    const pick = best(profile.prefixes, stem.slice(0, length));
    if (pick) return pick;
  }
  return undefined;
}

function longestSuffix(stem: string, profile: LanguageProfile): Pick | undefined {
  const longest = Math.min(profile.maxSuffixLength, stem.length - profile.minStemLength);
  for (let length = longest; length > 0; length--) {
    const pick = best(profile.suffixes, stem.slice(stem.length - length));
    if (pick) return pick;
  }
  return undefined;
}

/**
 * Cover `stem` completely with roots, longest match first from the left.
 * Pieces shorter than the minimum stem length are not considered.
 */
function coverWithRoots(stem: string, profile: LanguageProfile): Pick[] | undefined {
  const pieces: Pick[] = [];
  let start = 0;

  while (start < stem.length) {
    let pick: Pick | undefined;
    const longest = Math.min(profile.maxRootLength, stem.length - start);
    for (let length = longest; length >= profile.minStemLength; length--) {
      pick = best(profile.roots, stem.slice(start, start + length));
      if (pick) break;
    }
    if (!pick) return undefined;
    pieces.push(pick);
    start += pick.surface.length;
  }

  return pieces;
}

function normalizeInput(word: string): string {
  if (typeof word !== 'string') {
    throw new InvalidInputError('Word must be a string');
  }
  const cleaned = cleanWord(word);
  if (!cleaned) {
    throw new InvalidInputError(`Cannot segment empty word: "${word}"`, word);
  }
  return cleaned;
}

function segmentCleaned(word: string, profile: LanguageProfile): ParseResult {
  const whole = best(profile.morphemes, word);
  if (whole) {
    return { symbols: Object.freeze([toSymbol(whole)]), source: 'dictionary' };
  }

  const front: Pick[] = [];
  const back: Pick[] = [];
  let stem = word;

  while (!profile.roots.has(stem)) {
    let peeled = false;

    const prefix = longestPrefix(stem, profile);
    if (prefix) {
      front.push(prefix);
      stem = stem.slice(prefix.surface.length);
      peeled = true;
      if (profile.roots.has(stem)) break;
    }

    const suffix = longestSuffix(stem, profile);
    if (suffix) {
      back.unshift(suffix);
      stem = stem.slice(0, stem.length - suffix.surface.length);
      peeled = true;
    }

    if (!peeled) break;
  }

  let middle: ChartSymbol[];
  let source: ParseSource = front.length + back.length > 0 ? 'rules' : 'opaque';
  const root = best(profile.roots, stem);
  const compound = root ? undefined : coverWithRoots(stem, profile);

  if (root) {
    middle = [toSymbol(root)];
  } else if (compound) {
    middle = compound.map(toSymbol);
    source = 'rules';
  } else {
    middle = [makeSymbol(stem)];
  }

  const symbols = [...front.map(toSymbol), ...middle, ...back.map(toSymbol)];
  dp('segment', word, '->', symbols.map(symbol => symbol.key).join(' + '), `(${source})`);
  return { symbols: Object.freeze(symbols), source };
}

/**
 * Segment `word` and report where the segmentation came from.
 * @throws InvalidInputError for an empty word
 */
export function segmentWord(word: string, profile: LanguageProfile): ParseResult {
  const cleaned = normalizeInput(word);
  return cachedParse(profile, `m:${cleaned}`, () => time(`segment ${cleaned}`, () => segmentCleaned(cleaned, profile)));
}

export function segmentMorphemes(word: string, profile: LanguageProfile): readonly ChartSymbol[] {
  return segmentWord(word, profile).symbols;
}
