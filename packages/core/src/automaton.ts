// morphochart/automaton - Prefix-sharing state automaton (DFA builder)
//
// States live in a dense table indexed by id; id 0 is the root. Inserting a
// sequence follows existing transitions and only creates states for the
// part of the sequence no earlier insertion shares. Suffixes are never
// merged, so each accepting state keeps the records of its own path.

import { dp } from './config.js';
import { InvalidInputError, NoSuchPathError } from './errors.js';
import { sequenceKeys } from './symbols.js';
import type { ChartSymbol } from './symbols.js';
import type { Edge, State, StateId, WordRecord } from './types.js';

export const ROOT_STATE: StateId = 0;

interface StateNode {
  id: StateId;
  depth: number;
  accepting: boolean;
  transitions: Map<string, Edge>;
  records: WordRecord[];
  recordKeys: Set<string>;
  passCount: number;
}

export interface AutomatonOptions {
  /** Language code shown on exported charts */
  language?: string;
}

function recordKey(record: WordRecord): string {
  return [
    record.kind,
    record.language,
    record.surface,
    record.partOfSpeech ?? '',
    sequenceKeys(record.symbols).join('\u0002')
  ].join('\u0001');
}

function assertSequence(symbols: readonly ChartSymbol[]): void {
  if (!Array.isArray(symbols) || symbols.length === 0) {
    throw new InvalidInputError('Symbol sequence must not be empty');
  }
  for (const [i, symbol] of symbols.entries()) {
    if (!symbol || typeof symbol.key !== 'string' || symbol.key.length === 0) {
      throw new InvalidInputError(`Symbol ${i + 1} of the sequence has no key`);
    }
  }
}

export class Automaton {
  readonly language?: string;
  private states: StateNode[] = [];
  private edgeCount = 0;
  private recordLog: WordRecord[] = [];

  constructor(options: AutomatonOptions = {}) {
    this.language = options.language;
    this.clear();
  }

  get root(): State {
    return this.states[ROOT_STATE];
  }

  get stateCount(): number {
    return this.states.length;
  }

  get transitionCount(): number {
    return this.edgeCount;
  }

  hasState(id: StateId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.states.length;
  }

  state(id: StateId): State {
    if (!this.hasState(id)) {
      throw new InvalidInputError(`Unknown state id: ${id}`, String(id));
    }
    return this.states[id];
  }

  /** Every state in creation order */
  allStates(): readonly State[] {
    return this.states.slice();
  }

  /** Every distinct record, in the order it was first attached */
  records(): readonly WordRecord[] {
    return this.recordLog.slice();
  }

  /**
   * Add `symbols` to the chart and attach `record` to the state the path
   * ends in, which becomes accepting.
   */
  insert(symbols: readonly ChartSymbol[], record: WordRecord): State {
    assertSequence(symbols);
    const keys = sequenceKeys(symbols);
    const recordSymbols = sequenceKeys(record.symbols);
    if (recordSymbols.join('\u0002') !== keys.join('\u0002')) {
      throw new InvalidInputError(
        `Record for "${record.surface}" holds [${recordSymbols.join(' ')}] but [${keys.join(' ')}] was inserted`,
        record.surface
      );
    }

    let current = this.states[ROOT_STATE];
    current.passCount++;

    for (const symbol of symbols) {
      const existing = current.transitions.get(symbol.key);
      if (existing) {
        dp('OLD STATE:', current.id, ',', symbol.key, '->', existing.target);
        current = this.states[existing.target];
      } else {
        const next = this.newState(current.depth + 1);
        current.transitions.set(symbol.key, { symbol, target: next.id });
        this.edgeCount++;
        dp('NEW STATE:', current.id, ',', symbol.key, '->', next.id);
        current = next;
      }
      current.passCount++;
    }

    current.accepting = true;
    const key = recordKey(record);
    if (!current.recordKeys.has(key)) {
      current.recordKeys.add(key);
      current.records.push(record);
      this.recordLog.push(record);
    }

    return current;
  }

  /** The state `symbols` leads to from the root, if the path exists */
  lookup(symbols: readonly ChartSymbol[]): State | undefined {
    let current = this.states[ROOT_STATE];
    for (const symbol of symbols) {
      const edge = current.transitions.get(symbol.key);
      if (!edge) return undefined;
      current = this.states[edge.target];
    }
    return current;
  }

  accepts(symbols: readonly ChartSymbol[]): boolean {
    return symbols.length > 0 && (this.lookup(symbols)?.accepting ?? false);
  }

  /**
   * States visited while replaying `symbols`, root first.
   * @throws NoSuchPathError when a symbol has no transition
   */
  pathFor(symbols: readonly ChartSymbol[]): readonly State[] {
    assertSequence(symbols);
    const path: State[] = [this.states[ROOT_STATE]];
    let current = this.states[ROOT_STATE];

    for (const [i, symbol] of symbols.entries()) {
      const edge = current.transitions.get(symbol.key);
      if (!edge) {
        throw new NoSuchPathError(sequenceKeys(symbols), i, current.id);
      }
      current = this.states[edge.target];
      path.push(current);
    }

    return path;
  }

  /** Drop every state but a fresh root; ids start over */
  clear(): void {
    this.states = [];
    this.edgeCount = 0;
    this.recordLog = [];
    this.newState(0);
  }

  private newState(depth: number): StateNode {
    const node: StateNode = {
      id: this.states.length,
      depth,
      accepting: false,
      transitions: new Map(),
      records: [],
      recordKeys: new Set(),
      passCount: 0
    };
    this.states.push(node);
    return node;
  }
}

export function createAutomaton(options: AutomatonOptions = {}): Automaton {
  return new Automaton(options);
}

export function insert(automaton: Automaton, symbols: readonly ChartSymbol[], record: WordRecord): State {
  return automaton.insert(symbols, record);
}

export function transitionsFrom(state: State): ReadonlyMap<string, Edge> {
  return state.transitions;
}

export function isAccepting(state: State): boolean {
  return state.accepting;
}

export function pathFor(automaton: Automaton, symbols: readonly ChartSymbol[]): readonly State[] {
  return automaton.pathFor(symbols);
}

/**
 * Re-insert every record of `source` into `target`. Automatons built by
 * separate workers are combined this way.
 * @returns number of records replayed
 */
export function mergeAutomaton(target: Automaton, source: Automaton): number {
  const records = source.records();
  for (const record of records) {
    target.insert(record.symbols, record);
  }
  dp('Merged', records.length, 'records; target now has', target.stateCount, 'states');
  return records.length;
}
