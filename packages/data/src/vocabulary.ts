/**
 * Vocabulary sources - ranked (word, frequency) lists the bulk loader pulls from
 */

import { InvalidInputError } from '@morphochart/core';
import { parseNumberField, readRows } from './tables.js';

export interface VocabularyEntry {
  word: string;
  frequency: number;
  partOfSpeech?: string;
}

/**
 * A ranked lexicon for one language. `entries()` yields the most frequent
 * word first.
 */
export interface VocabularySource {
  readonly language: string;
  entries(): Iterable<VocabularyEntry>;
}

/**
 * Rank `entries` by frequency, highest first. Equal frequencies keep their
 * input order.
 */
export function createVocabulary(language: string, entries: Iterable<VocabularyEntry>): VocabularySource {
  if (!language?.trim()) {
    throw new InvalidInputError('A vocabulary needs a language code');
  }

  const ranked = Array.from(entries, (entry, i) => {
    if (!Number.isFinite(entry.frequency)) {
      throw new InvalidInputError(`Vocabulary entry ${i + 1} ("${entry.word}") has invalid frequency: ${entry.frequency}`, entry.word);
    }
    return { ...entry };
  }).sort((a, b) => b.frequency - a.frequency);

  return {
    language: language.trim(),
    entries: () => ranked.values()
  };
}

/**
 * Parse a `word<TAB>frequency[<TAB>part of speech]` table with a header row.
 */
export function parseVocabulary(language: string, content: string): VocabularySource {
  const entries = readRows(content, 'vocabulary.tsv').map(({ line, fields }): VocabularyEntry => {
    const [word, frequency, partOfSpeech] = fields;
    const entry: VocabularyEntry = {
      word: word ?? '',
      frequency: parseNumberField(frequency, 'vocabulary.tsv', line, 'frequency')
    };
    if (partOfSpeech) entry.partOfSpeech = partOfSpeech;
    return entry;
  });
  return createVocabulary(language, entries);
}

/**
 * The first `n` entries of `source`.
 */
export function topEntries(source: VocabularySource, n: number): VocabularyEntry[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidInputError(`Invalid entry count: ${n}`, String(n));
  }

  const taken: VocabularyEntry[] = [];
  if (n === 0) return taken;

  for (const entry of source.entries()) {
    taken.push(entry);
    if (taken.length >= n) break;
  }
  return taken;
}
