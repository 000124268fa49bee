// morphochart/query - Read-only traversal and export surface for renderers

import { ROOT_STATE } from './automaton.js';
import type { Automaton } from './automaton.js';
import { compareKeys, symbolLabel } from './symbols.js';
import type { ChartSymbol } from './symbols.js';
import { CHART_CATEGORIES } from './types.js';
import type { ChartCategory, State, StateId, Transition, WordRecord } from './types.js';

export interface ChartState {
  id: StateId;
  depth: number;
  accepting: boolean;
  categories: ChartCategory[];
  /** Surfaces of the records ending at this state */
  words: string[];
}

export interface ChartTransition {
  source: StateId;
  target: StateId;
  key: string;
  label: string;
}

export interface ChartData {
  language?: string;
  root: StateId;
  states: ChartState[];
  transitions: ChartTransition[];
  accepting: Array<{ state: StateId; records: readonly WordRecord[] }>;
}

export interface ChartStats {
  states: number;
  transitions: number;
  accepting: number;
  records: number;
  maxDepth: number;
  maxBranching: number;
}

// Coarse categories for Penn tags, WordNet letters and part-of-speech names
const POS_CATEGORY: Record<string, ChartCategory> = {
  n: 'noun',
  noun: 'noun',
  v: 'verb',
  verb: 'verb',
  a: 'adjective',
  s: 'adjective',
  adj: 'adjective',
  adjective: 'adjective',
  r: 'adverb',
  adv: 'adverb',
  adverb: 'adverb'
};

const PENN_PREFIX_CATEGORY: Array<[string, ChartCategory]> = [
  ['NN', 'noun'],
  ['VB', 'verb'],
  ['JJ', 'adjective'],
  ['RB', 'adverb']
];

export function categorizePartOfSpeech(partOfSpeech: string | undefined): ChartCategory {
  if (!partOfSpeech) return 'other';
  const trimmed = partOfSpeech.trim();

  for (const [prefix, category] of PENN_PREFIX_CATEGORY) {
    if (trimmed.startsWith(prefix)) return category;
  }

  return POS_CATEGORY[trimmed.toLowerCase()] ?? 'other';
}

/**
 * States reachable from the root, breadth-first. Children are visited in
 * creation order, so the same insertion order always yields the same list.
 */
export function reachableStates(automaton: Automaton): State[] {
  const root = automaton.state(ROOT_STATE);
  const visited = new Set<StateId>([root.id]);
  const order: State[] = [];
  const queue: State[] = [root];

  for (let head = 0; head < queue.length; head++) {
    const state = queue[head];
    order.push(state);

    const targets = Array.from(state.transitions.values(), edge => edge.target).sort((a, b) => a - b);
    for (const target of targets) {
      if (visited.has(target)) continue;
      visited.add(target);
      queue.push(automaton.state(target));
    }
  }

  return order;
}

/** Outgoing transitions of `state`, sorted by symbol key */
export function outgoingTransitions(state: State): Transition[] {
  return Array.from(state.transitions.values(), edge => ({
    source: state.id,
    symbol: edge.symbol,
    target: edge.target
  })).sort((a, b) => compareKeys(a.symbol.key, b.symbol.key));
}

export function recordsAt(automaton: Automaton, stateId: StateId): readonly WordRecord[] {
  return automaton.state(stateId).records;
}

/**
 * Group the labels of `state`'s transitions by the state they lead to.
 */
export function destinations(state: State): Map<StateId, string[]> {
  const grouped = new Map<StateId, string[]>();
  for (const transition of outgoingTransitions(state)) {
    const labels = grouped.get(transition.target) ?? [];
    labels.push(symbolLabel(transition.symbol));
    grouped.set(transition.target, labels);
  }
  return grouped;
}

/** Categories of the records ending at `state`, in legend order */
export function stateCategories(state: State): ChartCategory[] {
  const found = new Set(state.records.map(record => categorizePartOfSpeech(record.partOfSpeech)));
  return CHART_CATEGORIES.filter(category => found.has(category));
}

/**
 * Transitions along the path of `symbols`, for highlighting one word.
 * @throws NoSuchPathError when the path is not in the chart
 */
export function highlightPath(automaton: Automaton, symbols: readonly ChartSymbol[]): Transition[] {
  const path = automaton.pathFor(symbols);
  return symbols.map((symbol, i) => ({
    source: path[i].id,
    symbol: path[i].transitions.get(symbol.key)?.symbol ?? symbol,
    target: path[i + 1].id
  }));
}

export function exportChart(automaton: Automaton): ChartData {
  const states = reachableStates(automaton);
  const chart: ChartData = {
    root: ROOT_STATE,
    states: [],
    transitions: [],
    accepting: []
  };
  if (automaton.language !== undefined) chart.language = automaton.language;

  for (const state of states) {
    chart.states.push({
      id: state.id,
      depth: state.depth,
      accepting: state.accepting,
      categories: state.accepting ? stateCategories(state) : [],
      words: state.records.map(record => record.surface)
    });

    for (const transition of outgoingTransitions(state)) {
      chart.transitions.push({
        source: transition.source,
        target: transition.target,
        key: transition.symbol.key,
        label: symbolLabel(transition.symbol)
      });
    }

    if (state.accepting) {
      chart.accepting.push({ state: state.id, records: state.records.slice() });
    }
  }

  return chart;
}

export function chartStats(automaton: Automaton): ChartStats {
  const stats: ChartStats = {
    states: automaton.stateCount,
    transitions: automaton.transitionCount,
    accepting: 0,
    records: 0,
    maxDepth: 0,
    maxBranching: 0
  };

  for (const state of automaton.allStates()) {
    if (state.accepting) stats.accepting++;
    stats.records += state.records.length;
    stats.maxDepth = Math.max(stats.maxDepth, state.depth);
    stats.maxBranching = Math.max(stats.maxBranching, state.transitions.size);
  }

  return stats;
}
