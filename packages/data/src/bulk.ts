/**
 * Bulk loader - feeds the most common words of a vocabulary through the
 * parser into an automaton
 *
 * A word that fails to parse is skipped and reported; the load carries on.
 */

import { InvalidInputError, compareKeys, dp } from '@morphochart/core';
import type { Automaton, SequenceKind, WordRecord } from '@morphochart/core';
import { parseRecord } from '@morphochart/parser';
import type { LanguageProfile } from '@morphochart/parser';
import { topEntries } from './vocabulary.js';
import type { VocabularySource } from './vocabulary.js';

export interface BulkLoadOptions {
  /** Which sequence to chart: morpheme segmentation (default) or IPA */
  kind?: SequenceKind;
  /** Suppress console warnings for skipped words */
  silent?: boolean;
}

export interface BulkDiagnostic {
  word: string;
  /** 1-based position of the word in the loaded list */
  rank: number;
  reason: string;
}

export interface BulkLoadReport {
  inserted: WordRecord[];
  diagnostics: BulkDiagnostic[];
  statesAdded: number;
  transitionsAdded: number;
}

interface LoadItem {
  word: string;
  frequency?: number;
  partOfSpeech?: string;
}

function loadEntries(
  automaton: Automaton,
  profile: LanguageProfile,
  entries: readonly LoadItem[],
  options: BulkLoadOptions
): BulkLoadReport {
  const kind = options.kind ?? 'morphemes';
  const statesBefore = automaton.stateCount;
  const transitionsBefore = automaton.transitionCount;
  const report: BulkLoadReport = { inserted: [], diagnostics: [], statesAdded: 0, transitionsAdded: 0 };

  entries.forEach((entry, i) => {
    let record: WordRecord;
    try {
      record = parseRecord(entry.word, profile, kind, {
        frequency: entry.frequency,
        partOfSpeech: entry.partOfSpeech
      });
    } catch (error) {
      if (!(error instanceof InvalidInputError)) throw error;

      const diagnostic: BulkDiagnostic = { word: entry.word, rank: i + 1, reason: error.message };
      report.diagnostics.push(diagnostic);
      dp('Skipped vocabulary entry', diagnostic);
      if (!options.silent) {
        console.warn(`Skipping "${entry.word}" (rank ${diagnostic.rank}): ${error.message}`);
      }
      return;
    }

    automaton.insert(record.symbols, record);
    report.inserted.push(record);
  });

  report.statesAdded = automaton.stateCount - statesBefore;
  report.transitionsAdded = automaton.transitionCount - transitionsBefore;
  dp(`Loaded ${report.inserted.length} ${kind} sequences (${report.diagnostics.length} skipped), +${report.statesAdded} states`);
  return report;
}

/**
 * Insert the `topN` most frequent words of `source` into `automaton`.
 * @throws InvalidInputError when `source` is for another language than `profile`
 */
export function addCommon(
  automaton: Automaton,
  profile: LanguageProfile,
  source: VocabularySource,
  topN: number,
  options: BulkLoadOptions = {}
): BulkLoadReport {
  if (source.language !== profile.code) {
    throw new InvalidInputError(
      `Vocabulary is for "${source.language}" but the profile is for "${profile.code}"`,
      source.language
    );
  }
  return loadEntries(automaton, profile, topEntries(source, topN), options);
}

export const addStates = addCommon;

/**
 * Insert a plain list of words, in sorted order.
 */
export function addWords(
  automaton: Automaton,
  profile: LanguageProfile,
  words: Iterable<string>,
  options: BulkLoadOptions = {}
): BulkLoadReport {
  const entries = Array.from(words)
    .sort(compareKeys)
    .map((word): LoadItem => ({ word }));
  return loadEntries(automaton, profile, entries, options);
}
