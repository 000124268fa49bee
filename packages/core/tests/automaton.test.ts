import { describe, test, expect, vi } from 'vitest';
import {
  Automaton,
  InvalidInputError,
  NoSuchPathError,
  ROOT_STATE,
  createAutomaton,
  insert,
  isAccepting,
  mergeAutomaton,
  pathFor,
  setDebug,
  transitionsFrom
} from '@morphochart/core';
import { record, setupTests, syms } from '../../../test-utils/test-setup.js';

setupTests();

// Every non-root state has exactly one incoming transition and every
// transition key is unique within its source state.
function expectDeterministicTree(automaton: Automaton) {
  const incoming = new Map<number, number>();
  for (const state of automaton.allStates()) {
    const keys = Array.from(state.transitions.keys());
    expect(new Set(keys).size).toBe(keys.length);
    for (const [key, edge] of state.transitions) {
      expect(edge.symbol.key).toBe(key);
      incoming.set(edge.target, (incoming.get(edge.target) ?? 0) + 1);
    }
  }
  expect(incoming.has(ROOT_STATE)).toBe(false);
  for (let id = 1; id < automaton.stateCount; id++) {
    expect(incoming.get(id)).toBe(1);
  }
}

describe('createAutomaton', () => {
  test('starts with a lone non-accepting root', () => {
    const automaton = createAutomaton({ language: 'en' });
    expect(automaton.stateCount).toBe(1);
    expect(automaton.transitionCount).toBe(0);
    expect(automaton.root.id).toBe(ROOT_STATE);
    expect(automaton.root.depth).toBe(0);
    expect(isAccepting(automaton.root)).toBe(false);
    expect(automaton.language).toBe('en');
  });
});

describe('insert', () => {
  test('creates one state per symbol on a fresh path', () => {
    const automaton = createAutomaton();
    const end = insert(automaton, syms('un', 'do', 'able'), record('undoable', ['un', 'do', 'able']));

    expect(automaton.stateCount).toBe(4);
    expect(automaton.transitionCount).toBe(3);
    expect(end.id).toBe(3);
    expect(end.depth).toBe(3);
    expect(end.accepting).toBe(true);
    expect(end.records.map(r => r.surface)).toEqual(['undoable']);
  });

  test('shares the common prefix of two sequences', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('un', 'do', 'able'), record('undoable', ['un', 'do', 'able']));
    insert(automaton, syms('un', 'do', 'ing'), record('undoing', ['un', 'do', 'ing']));

    const first = pathFor(automaton, syms('un', 'do', 'able')).map(state => state.id);
    const second = pathFor(automaton, syms('un', 'do', 'ing')).map(state => state.id);

    expect(first).toEqual([0, 1, 2, 3]);
    expect(second).toEqual([0, 1, 2, 4]);
    expect(automaton.stateCount).toBe(5);
    expect(Array.from(transitionsFrom(automaton.state(2)).keys())).toEqual(['able', 'ing']);
  });

  test('stays deterministic after every insertion', () => {
    const automaton = createAutomaton();
    const words: Array<[string, string[]]> = [
      ['undoable', ['un', 'do', 'able']],
      ['undoing', ['un', 'do', 'ing']],
      ['undo', ['un', 'do']],
      ['doing', ['do', 'ing']],
      ['redo', ['re', 'do']],
      ['undoable', ['un', 'do', 'able']]
    ];

    for (const [surface, keys] of words) {
      automaton.insert(syms(...keys), record(surface, keys));
      expectDeterministicTree(automaton);
    }
  });

  test('does not merge common suffixes', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('do', 'ing'), record('doing', ['do', 'ing']));
    insert(automaton, syms('walk', 'ing'), record('walking', ['walk', 'ing']));

    expect(automaton.lookup(syms('do', 'ing'))?.id).toBe(2);
    expect(automaton.lookup(syms('walk', 'ing'))?.id).toBe(4);
  });

  test('is idempotent for a repeated record', () => {
    const automaton = createAutomaton();
    const word = record('undo', ['un', 'do']);
    insert(automaton, syms('un', 'do'), word);
    insert(automaton, syms('un', 'do'), word);

    expect(automaton.stateCount).toBe(3);
    expect(automaton.transitionCount).toBe(2);
    expect(automaton.state(2).records).toHaveLength(1);
    expect(automaton.records()).toHaveLength(1);
    expect(automaton.state(2).passCount).toBe(2);
  });

  test('keeps distinct records that end in the same state', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('r', 'ɛ', 'd'), record('read', ['r', 'ɛ', 'd'], { kind: 'phonemes' }));
    const end = insert(automaton, syms('r', 'ɛ', 'd'), record('red', ['r', 'ɛ', 'd'], { kind: 'phonemes' }));

    expect(end.records.map(r => r.surface)).toEqual(['read', 'red']);
  });

  test('marks a prefix state accepting when its own word is inserted', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('un', 'do', 'able'), record('undoable', ['un', 'do', 'able']));
    expect(automaton.accepts(syms('un', 'do'))).toBe(false);

    insert(automaton, syms('un', 'do'), record('undo', ['un', 'do']));
    expect(automaton.accepts(syms('un', 'do'))).toBe(true);
    expect(automaton.stateCount).toBe(4);
  });

  test('rejects an empty sequence', () => {
    const automaton = createAutomaton();
    expect(() => insert(automaton, [], record('x', ['x']))).toThrow(InvalidInputError);
    expect(automaton.stateCount).toBe(1);
  });

  test('rejects a record whose symbols differ from the sequence', () => {
    const automaton = createAutomaton();
    expect(() => insert(automaton, syms('un', 'do'), record('undoing', ['un', 'do', 'ing']))).toThrow(
      'Record for "undoing" holds [un do ing] but [un do] was inserted'
    );
  });

  test('logs state creation and reuse in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setDebug(true);

    const automaton = createAutomaton();
    insert(automaton, syms('un'), record('un', ['un']));
    insert(automaton, syms('un', 'do'), record('undo', ['un', 'do']));

    expect(log).toHaveBeenCalledWith('[DEBUG]', 'NEW STATE:', 0, ',', 'un', '->', 1);
    expect(log).toHaveBeenCalledWith('[DEBUG]', 'OLD STATE:', 0, ',', 'un', '->', 1);
    log.mockRestore();
  });
});

describe('pathFor', () => {
  test('round-trips an inserted sequence to its accepting state', () => {
    const automaton = createAutomaton();
    const keys = ['dis', 'agree', 'ment'];
    const end = insert(automaton, syms(...keys), record('disagreement', keys));
    const path = pathFor(automaton, syms(...keys));

    expect(path).toHaveLength(4);
    expect(path[0].id).toBe(ROOT_STATE);
    expect(path[3]).toBe(end);
    expect(path[3].records[0].surface).toBe('disagreement');
  });

  test('throws NoSuchPathError at the first missing symbol', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('un', 'do'), record('undo', ['un', 'do']));

    let caught: unknown;
    try {
      pathFor(automaton, syms('un', 'tie'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NoSuchPathError);
    if (caught instanceof NoSuchPathError) {
      expect(caught.index).toBe(1);
      expect(caught.stateId).toBe(1);
      expect(caught.keys).toEqual(['un', 'tie']);
      expect(caught.message).toBe('No transition for "tie" from state 1 (symbol 2 of 2: un tie)');
    }
  });

  test('lookup and accepts report a missing path without throwing', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('un', 'do'), record('undo', ['un', 'do']));

    expect(automaton.lookup(syms('re', 'do'))).toBeUndefined();
    expect(automaton.accepts(syms('re', 'do'))).toBe(false);
    expect(automaton.accepts([])).toBe(false);
  });
});

describe('state', () => {
  test('throws for an unknown id', () => {
    const automaton = createAutomaton();
    expect(automaton.hasState(0)).toBe(true);
    expect(automaton.hasState(1)).toBe(false);
    expect(() => automaton.state(7)).toThrow('Unknown state id: 7');
  });
});

describe('clear', () => {
  test('returns to a lone root and restarts ids', () => {
    const automaton = createAutomaton();
    insert(automaton, syms('un', 'do'), record('undo', ['un', 'do']));
    automaton.clear();

    expect(automaton.stateCount).toBe(1);
    expect(automaton.transitionCount).toBe(0);
    expect(automaton.records()).toEqual([]);
    expect(automaton.root.accepting).toBe(false);

    const end = insert(automaton, syms('re'), record('re', ['re']));
    expect(end.id).toBe(1);
  });
});

describe('mergeAutomaton', () => {
  test('replays every record of the source into the target', () => {
    const left = createAutomaton();
    const right = createAutomaton();
    insert(left, syms('un', 'do'), record('undo', ['un', 'do']));
    insert(right, syms('un', 'do', 'ing'), record('undoing', ['un', 'do', 'ing']));
    insert(right, syms('un', 'do'), record('undo', ['un', 'do']));

    const replayed = mergeAutomaton(left, right);

    expect(replayed).toBe(2);
    expect(left.stateCount).toBe(4);
    expect(left.records().map(r => r.surface)).toEqual(['undo', 'undoing']);
    expect(left.accepts(syms('un', 'do', 'ing'))).toBe(true);
    expectDeterministicTree(left);
  });
});
