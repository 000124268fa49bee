/**
 * Resource tables - tab-separated language resources
 *
 * Every table starts with a header row, which is skipped. Lines starting
 * with # are comments.
 *
 *   morphemes.tsv       fragment  role  frequency  [key]  [gloss]
 *   g2p.tsv             grapheme  phonemes
 *   pronunciations.tsv  word      ipa
 *
 * A word listed more than once in pronunciations.tsv keeps its first row.
 */

import { parse } from 'csv-parse/sync';
import { InvalidInputError } from '@morphochart/core';
import { MORPHEME_ROLES } from '@morphochart/parser';
import type { G2PRule, MorphemeEntry, MorphemeRole } from '@morphochart/parser';

export interface TableRow {
  /** 1-based line number in the source text */
  line: number;
  fields: string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(field => typeof field === 'string');
}

/**
 * Parse tab-separated `content` into rows, header excluded.
 */
export function readRows(content: string, table = 'table'): TableRow[] {
  const records: unknown = parse(content, {
    delimiter: '\t',
    skip_empty_lines: true,
    from_line: 2, // Skip header
    relax_column_count: true,
    quote: false,
    comment: '#',
    info: true
  });

  if (!Array.isArray(records)) {
    throw new InvalidInputError(`Could not read ${table}`);
  }

  return records.map((entry: unknown): TableRow => {
    if (typeof entry !== 'object' || entry === null || !('record' in entry) || !('info' in entry)) {
      throw new InvalidInputError(`Malformed row in ${table}`);
    }
    const { record, info } = entry;
    if (!isStringArray(record)) {
      throw new InvalidInputError(`Malformed row in ${table}`);
    }
    const line = typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
      ? info.lines
      : 0;
    return { line, fields: record.map(field => field.trim()) };
  });
}

export function parseNumberField(value: string | undefined, table: string, line: number, column: string): number {
  const parsed = Number(value);
  if (value === undefined || value === '' || !Number.isFinite(parsed)) {
    throw new InvalidInputError(`${table} line ${line}: invalid ${column} "${value ?? ''}"`, value);
  }
  return parsed;
}

function isRole(value: string): value is MorphemeRole {
  return MORPHEME_ROLES.some(role => role === value);
}

export function parseMorphemeTable(content: string): MorphemeEntry[] {
  return readRows(content, 'morphemes.tsv').map(({ line, fields }) => {
    const [fragment, role, frequency, key, gloss] = fields;
    if (!fragment) {
      throw new InvalidInputError(`morphemes.tsv line ${line}: missing fragment`);
    }
    if (!role || !isRole(role)) {
      throw new InvalidInputError(`morphemes.tsv line ${line}: unknown role "${role ?? ''}"`, role);
    }

    const entry: MorphemeEntry = {
      fragment,
      role,
      frequency: parseNumberField(frequency, 'morphemes.tsv', line, 'frequency')
    };
    if (key) entry.key = key;
    if (gloss) entry.gloss = gloss;
    return entry;
  });
}

export function parseG2PTable(content: string): G2PRule[] {
  return readRows(content, 'g2p.tsv').map(({ line, fields }) => {
    const [grapheme, phonemes] = fields;
    if (!grapheme) {
      throw new InvalidInputError(`g2p.tsv line ${line}: missing grapheme`);
    }
    return { grapheme, phonemes: phonemes ?? '' };
  });
}

export function parsePronunciationTable(content: string): Map<string, string> {
  const pronunciations = new Map<string, string>();
  for (const { line, fields } of readRows(content, 'pronunciations.tsv')) {
    const [word, ipa] = fields;
    if (!word || !ipa) {
      throw new InvalidInputError(`pronunciations.tsv line ${line}: expected word and IPA`);
    }
    if (!pronunciations.has(word)) pronunciations.set(word, ipa);
  }
  return pronunciations;
}
