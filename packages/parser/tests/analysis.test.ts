import { describe, test, expect } from 'vitest';
import { analyzeWord, parseRecord } from '@morphochart/parser';
import { createTestProfile, keysOf, setupTests } from '../../../test-utils/test-setup.js';

setupTests();

const profile = createTestProfile();

describe('analyzeWord', () => {
  test('returns both sequences with their sources', () => {
    const analysis = analyzeWord('Teacher', profile);

    expect(analysis.surface).toBe('Teacher');
    expect(analysis.word).toBe('teacher');
    expect(analysis.language).toBe('en');
    expect(keysOf(analysis.morphemes.symbols)).toEqual(['teach', 'er.agent']);
    expect(analysis.morphemes.source).toBe('rules');
    expect(keysOf(analysis.phonemes.symbols)).toEqual(['t', 'iː', 'tʃ', 'ə']);
    expect(analysis.phonemes.source).toBe('dictionary');
  });
});

describe('parseRecord', () => {
  test('builds a morpheme record with metadata', () => {
    const record = parseRecord('unbreakable', profile, 'morphemes', { frequency: 360, partOfSpeech: 'JJ' });

    expect(record.surface).toBe('unbreakable');
    expect(record.language).toBe('en');
    expect(record.kind).toBe('morphemes');
    expect(keysOf(record.symbols)).toEqual(['un', 'break', 'able']);
    expect(record.frequency).toBe(360);
    expect(record.partOfSpeech).toBe('JJ');
  });

  test('builds a phoneme record without metadata', () => {
    const record = parseRecord('cat', profile, 'phonemes');

    expect(keysOf(record.symbols)).toEqual(['k', 'æ', 't']);
    expect('frequency' in record).toBe(false);
    expect('partOfSpeech' in record).toBe(false);
  });
});
