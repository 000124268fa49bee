// Segmentation tests - affix peeling, compounds and the ambiguity tie-break
import { describe, test, expect } from 'vitest';
import { InvalidInputError } from '@morphochart/core';
import { segmentMorphemes, segmentWord } from '@morphochart/parser';
import { createTestProfile, keysOf, setupTests } from '../../../test-utils/test-setup.js';

setupTests();

const profile = createTestProfile();

describe('segmentMorphemes', () => {
  test.each([
    ['unbreakable', ['un', 'break', 'able']],
    ['unkindness', ['un', 'kind', 'ness']],
    ['disagreement', ['dis', 'agree', 'ment']],
    ['undoing', ['un', 'do', 'ing']],
    ['teacher', ['teach', 'er.agent']],
    ['blackbird', ['black', 'bird']]
  ])('%s', (word, expected) => {
    expect(keysOf(segmentMorphemes(word, profile))).toEqual(expected);
  });

  test('labels symbols with their surface form and carries gloss and frequency', () => {
    const [un] = segmentMorphemes('unbreakable', profile);
    expect(un).toEqual({ key: 'un', gloss: 'not', frequency: 950 });

    const [, er] = segmentMorphemes('teacher', profile);
    expect(er).toEqual({ key: 'er.agent', label: 'er', gloss: 'agent', frequency: 900 });
  });

  test('breaks frequency ties by the smaller key', () => {
    const tied = createTestProfile({
      morphemes: [
        { fragment: 'a', role: 'suffix', frequency: 5, key: 'a.two' },
        { fragment: 'a', role: 'suffix', frequency: 5, key: 'a.one' },
        { fragment: 'bb', role: 'root' }
      ]
    });
    expect(keysOf(segmentMorphemes('bba', tied))).toEqual(['bb', 'a.one']);
  });

  test('never peels an affix that would leave a stem shorter than the minimum', () => {
    expect(keysOf(segmentMorphemes('ring', profile))).toEqual(['ring']);
  });

  test('normalizes case and punctuation before segmenting', () => {
    expect(keysOf(segmentMorphemes('  UnBreakable! ', profile))).toEqual(['un', 'break', 'able']);
  });

  test('throws for an empty word', () => {
    expect(() => segmentMorphemes('', profile)).toThrow(InvalidInputError);
    expect(() => segmentMorphemes('?!', profile)).toThrow('Cannot segment empty word: "?!"');
  });
});

describe('segmentWord', () => {
  test('reports a whole-word dictionary hit', () => {
    const result = segmentWord('break', profile);
    expect(result.source).toBe('dictionary');
    expect(keysOf(result.symbols)).toEqual(['break']);
  });

  test('a listed affix on its own is a dictionary hit', () => {
    expect(segmentWord('un', profile).source).toBe('dictionary');
  });

  test('reports rule-based analyses', () => {
    expect(segmentWord('unbreakable', profile).source).toBe('rules');
    expect(segmentWord('blackbird', profile).source).toBe('rules');
  });

  test('keeps an unknown stem as one opaque symbol between known affixes', () => {
    const result = segmentWord('unglorp', profile);
    expect(result.source).toBe('rules');
    expect(keysOf(result.symbols)).toEqual(['un', 'glorp']);
  });

  test('falls back to one opaque symbol', () => {
    const result = segmentWord('xylophone', profile);
    expect(result.source).toBe('opaque');
    expect(keysOf(result.symbols)).toEqual(['xylophone']);
  });

  test('returns frozen sequences', () => {
    expect(Object.isFrozen(segmentWord('unbreakable', profile).symbols)).toBe(true);
  });
});
