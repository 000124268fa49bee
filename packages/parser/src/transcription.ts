// morphochart/parser/transcription - IPA transcription
//
// Pronunciation dictionary first; otherwise grapheme-to-phoneme rules are
// applied left to right, longest grapheme first.

import { InvalidInputError, cleanIpa, cleanWord, dp, makeSymbol, splitIpa } from '@morphochart/core';
import type { ChartSymbol } from '@morphochart/core';
import { cachedParse } from './cache.js';
import type { ParseResult } from './cache.js';
import type { CompiledRule, LanguageProfile } from './language.js';
import { time } from './profile.js';

const SILENT_MARKS = new Set(["'", '’', '-']);

function matchRule(word: string, position: number, profile: LanguageProfile): CompiledRule | undefined {
  for (const rule of profile.rules) {
    if (rule.anchorStart && position !== 0) continue;
    if (!word.startsWith(rule.grapheme, position)) continue;
    if (rule.anchorEnd && position + rule.grapheme.length !== word.length) continue;
    return rule;
  }
  return undefined;
}

/**
 * Phonemes for `word` from the rule table, or undefined when some letter
 * has no rule.
 */
export function applyG2PRules(word: string, profile: LanguageProfile): string[] | undefined {
  const phonemes: string[] = [];
  let position = 0;

  while (position < word.length) {
    // Apostrophes and hyphens are not pronounced
    if (SILENT_MARKS.has(word[position])) {
      position++;
      continue;
    }

    const rule = matchRule(word, position, profile);
    if (!rule) {
      dp('g2p: no rule for', JSON.stringify(word.slice(position)), 'in', word);
      return undefined;
    }
    phonemes.push(...rule.phonemes);
    position += rule.grapheme.length;
  }

  return phonemes;
}

/** Phonemes of a dictionary pronunciation, split against the profile inventory */
export function splitPronunciation(ipa: string, profile: LanguageProfile): string[] {
  return splitIpa(cleanIpa(ipa), profile.inventory);
}

function transcribeCleaned(word: string, profile: LanguageProfile): ParseResult {
  const listed = profile.pronunciations.get(word);
  if (listed !== undefined) {
    const phonemes = splitPronunciation(listed, profile);
    if (phonemes.length > 0) {
      return { symbols: Object.freeze(phonemes.map(phoneme => makeSymbol(phoneme))), source: 'dictionary' };
    }
  }

  const phonemes = applyG2PRules(word, profile);
  if (phonemes && phonemes.length > 0) {
    return { symbols: Object.freeze(phonemes.map(phoneme => makeSymbol(phoneme))), source: 'rules' };
  }

  return { symbols: Object.freeze([makeSymbol(word)]), source: 'opaque' };
}

/**
 * Transcribe `word` and report where the transcription came from.
 * @throws InvalidInputError for an empty word
 */
export function transcribeWord(word: string, profile: LanguageProfile): ParseResult {
  if (typeof word !== 'string') {
    throw new InvalidInputError('Word must be a string');
  }
  const cleaned = cleanWord(word);
  if (!cleaned) {
    throw new InvalidInputError(`Cannot transcribe empty word: "${word}"`, word);
  }
  return cachedParse(profile, `p:${cleaned}`, () => time(`transcribe ${cleaned}`, () => transcribeCleaned(cleaned, profile)));
}

export function transcribeIpa(word: string, profile: LanguageProfile): readonly ChartSymbol[] {
  return transcribeWord(word, profile).symbols;
}
