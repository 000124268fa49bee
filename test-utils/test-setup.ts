// Shared test setup utilities
import { beforeEach } from 'vitest';
import { makeSymbol, setDebug } from '@morphochart/core';
import type { ChartSymbol, SequenceKind, WordRecord } from '@morphochart/core';
import {
  clearParserCache,
  createLanguageProfile,
  resetInitialization,
  setParserCacheCapacity,
  setProfiling
} from '@morphochart/parser';
import type { LanguageProfile, LanguageResources } from '@morphochart/parser';

// Reset debug output, profiling and the parser cache before every test
export function setupTests() {
  beforeEach(() => {
    setDebug(false);
    setProfiling(false);
    setParserCacheCapacity(500);
    clearParserCache();
    resetInitialization();
  });
}

// Helper to build a bare symbol sequence: syms('un', 'do', 'able')
export function syms(...keys: string[]): ChartSymbol[] {
  return keys.map(key => makeSymbol(key));
}

// Helper to build a record whose symbols are the given keys
export function record(
  surface: string,
  keys: string[],
  extra: { kind?: SequenceKind; language?: string; partOfSpeech?: string; frequency?: number } = {}
): WordRecord {
  const built: { -readonly [K in keyof WordRecord]: WordRecord[K] } = {
    surface,
    language: extra.language ?? 'en',
    kind: extra.kind ?? 'morphemes',
    symbols: syms(...keys)
  };
  if (extra.partOfSpeech !== undefined) built.partOfSpeech = extra.partOfSpeech;
  if (extra.frequency !== undefined) built.frequency = extra.frequency;
  return built;
}

// Keys of a parsed sequence, for compact assertions
export function keysOf(symbols: readonly ChartSymbol[]): string[] {
  return symbols.map(symbol => symbol.key);
}

// Small English profile shared by the parser tests
export function createTestProfile(overrides: Partial<LanguageResources> = {}): LanguageProfile {
  return createLanguageProfile({
    code: 'en',
    name: 'English (test)',
    morphemes: [
      { fragment: 'un-', role: 'prefix', frequency: 950, gloss: 'not' },
      { fragment: 're-', role: 'prefix', frequency: 900, gloss: 'again' },
      { fragment: 'dis-', role: 'prefix', frequency: 600 },
      { fragment: '-able', role: 'suffix', frequency: 700 },
      { fragment: '-ing', role: 'suffix', frequency: 1000 },
      { fragment: '-ness', role: 'suffix', frequency: 650 },
      { fragment: '-ment', role: 'suffix', frequency: 500 },
      { fragment: '-ly', role: 'suffix', frequency: 800 },
      { fragment: '-er', role: 'suffix', frequency: 900, key: 'er.agent', gloss: 'agent' },
      { fragment: '-er', role: 'suffix', frequency: 400, key: 'er.comparative', gloss: 'comparative' },
      { fragment: '-s', role: 'suffix', frequency: 1200, key: 's.plural' },
      { fragment: '-s', role: 'suffix', frequency: 800, key: 's.3sg' },
      { fragment: 'break', role: 'root', frequency: 500 },
      { fragment: 'do', role: 'root', frequency: 900 },
      { fragment: 'kind', role: 'root', frequency: 400 },
      { fragment: 'agree', role: 'root', frequency: 350 },
      { fragment: 'teach', role: 'root', frequency: 380 },
      { fragment: 'black', role: 'root', frequency: 260 },
      { fragment: 'bird', role: 'root', frequency: 240 }
    ],
    g2p: [
      { grapheme: 'tch', phonemes: 'tʃ' },
      { grapheme: 'ch', phonemes: 'tʃ' },
      { grapheme: 'sh', phonemes: 'ʃ' },
      { grapheme: 'ee', phonemes: 'iː' },
      { grapheme: 'ai', phonemes: 'eɪ' },
      { grapheme: 'e$', phonemes: '' },
      { grapheme: '^y', phonemes: 'j' },
      { grapheme: 'y$', phonemes: 'i' },
      { grapheme: 'a', phonemes: 'æ' },
      { grapheme: 'b', phonemes: 'b' },
      { grapheme: 'c', phonemes: 'k' },
      { grapheme: 'd', phonemes: 'd' },
      { grapheme: 'e', phonemes: 'ɛ' },
      { grapheme: 'h', phonemes: 'h' },
      { grapheme: 'i', phonemes: 'ɪ' },
      { grapheme: 'k', phonemes: 'k' },
      { grapheme: 'l', phonemes: 'l' },
      { grapheme: 'n', phonemes: 'n' },
      { grapheme: 'o', phonemes: 'ɒ' },
      { grapheme: 'p', phonemes: 'p' },
      { grapheme: 'r', phonemes: 'ɹ' },
      { grapheme: 's', phonemes: 's' },
      { grapheme: 't', phonemes: 't' },
      { grapheme: 'y', phonemes: 'ɪ' }
    ],
    pronunciations: {
      cat: '/kæt/',
      teacher: '/ˈtiː.tʃə(ɹ)/',
      break: '/bɹeɪk/'
    },
    ...overrides
  });
}
