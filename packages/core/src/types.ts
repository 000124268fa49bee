// morphochart/types - Shared automaton and record types

import type { ChartSymbol } from './symbols.js';

export type SequenceKind = 'morphemes' | 'phonemes';

export type StateId = number;

/**
 * The word (or pronunciation) a path was inserted for. Terminal states keep
 * a reference to it for labelling.
 */
export interface WordRecord {
  readonly surface: string;
  readonly language: string;
  readonly kind: SequenceKind;
  readonly symbols: readonly ChartSymbol[];
  readonly frequency?: number;
  readonly partOfSpeech?: string;
}

export interface Edge {
  readonly symbol: ChartSymbol;
  readonly target: StateId;
}

export interface Transition {
  readonly source: StateId;
  readonly symbol: ChartSymbol;
  readonly target: StateId;
}

export interface State {
  readonly id: StateId;
  /** Number of symbols consumed from the root */
  readonly depth: number;
  readonly accepting: boolean;
  /** Outgoing transitions keyed by symbol key */
  readonly transitions: ReadonlyMap<string, Edge>;
  /** Records whose path ends here */
  readonly records: readonly WordRecord[];
  /** Insertions that walked through this state, duplicates included */
  readonly passCount: number;
}

// Chart categories used to colour accepting states
export type ChartCategory = 'noun' | 'verb' | 'adjective' | 'adverb' | 'other';

export const CHART_CATEGORIES: readonly ChartCategory[] = ['noun', 'verb', 'adjective', 'adverb', 'other'];
