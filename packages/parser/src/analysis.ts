// morphochart/parser/analysis - Both analyses of one word, and records built from them

import { cleanWord } from '@morphochart/core';
import type { SequenceKind, WordRecord } from '@morphochart/core';
import type { ParseResult } from './cache.js';
import type { LanguageProfile } from './language.js';
import { segmentWord } from './segmentation.js';
import { transcribeWord } from './transcription.js';

export interface WordAnalysis {
  surface: string;
  word: string;
  language: string;
  morphemes: ParseResult;
  phonemes: ParseResult;
}

export interface RecordMetadata {
  frequency?: number;
  partOfSpeech?: string;
}

export function analyzeWord(surface: string, profile: LanguageProfile): WordAnalysis {
  return {
    surface,
    word: cleanWord(surface),
    language: profile.code,
    morphemes: segmentWord(surface, profile),
    phonemes: transcribeWord(surface, profile)
  };
}

/**
 * Parse `surface` into the sequence of `kind` and wrap it in a record ready
 * for insertion.
 * @throws InvalidInputError for an empty word
 */
export function parseRecord(
  surface: string,
  profile: LanguageProfile,
  kind: SequenceKind,
  metadata: RecordMetadata = {}
): WordRecord {
  const parsed = kind === 'phonemes' ? transcribeWord(surface, profile) : segmentWord(surface, profile);
  const record: { -readonly [K in keyof WordRecord]: WordRecord[K] } = {
    surface,
    language: profile.code,
    kind,
    symbols: parsed.symbols
  };
  if (metadata.frequency !== undefined) record.frequency = metadata.frequency;
  if (metadata.partOfSpeech) record.partOfSpeech = metadata.partOfSpeech;
  return record;
}
