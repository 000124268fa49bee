/**
 * Bundled language profiles
 *
 * resources/languages.json lists the languages that ship with the package;
 * resources/<code>/ holds their tables.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { InvalidInputError } from '@morphochart/core';
import { createLanguageProfile } from '@morphochart/parser';
import type { LanguageProfile } from '@morphochart/parser';
import { parseG2PTable, parseMorphemeTable, parsePronunciationTable } from './tables.js';
import { parseVocabulary } from './vocabulary.js';
import type { VocabularySource } from './vocabulary.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const RESOURCES_DIR = path.resolve(__dirname, '../resources');

export interface BundledLanguage {
  code: string;
  name: string;
  minStemLength?: number;
}

const profiles = new Map<string, LanguageProfile>();
let languages: BundledLanguage[] | null = null;

function parseLanguage(value: unknown, position: number): BundledLanguage {
  if (typeof value !== 'object' || value === null || !('code' in value) || !('name' in value)) {
    throw new InvalidInputError(`languages.json entry ${position + 1} needs a code and a name`);
  }
  const { code, name } = value;
  if (typeof code !== 'string' || typeof name !== 'string') {
    throw new InvalidInputError(`languages.json entry ${position + 1} needs a code and a name`);
  }

  const language: BundledLanguage = { code, name };
  if ('minStemLength' in value && typeof value.minStemLength === 'number') {
    language.minStemLength = value.minStemLength;
  }
  return language;
}

function readLanguages(): BundledLanguage[] {
  if (!languages) {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(RESOURCES_DIR, 'languages.json'), 'utf-8'));
    if (!Array.isArray(raw)) {
      throw new InvalidInputError('languages.json must hold an array');
    }
    languages = raw.map(parseLanguage);
  }
  return languages;
}

function findLanguage(code: string): BundledLanguage {
  const language = readLanguages().find(candidate => candidate.code === code);
  if (!language) {
    throw new InvalidInputError(`No bundled profile for language "${code}"`, code);
  }
  return language;
}

function readTable(code: string, file: string): string | undefined {
  const tablePath = path.join(RESOURCES_DIR, code, file);
  return fs.existsSync(tablePath) ? fs.readFileSync(tablePath, 'utf-8') : undefined;
}

export function bundledLanguages(): BundledLanguage[] {
  return readLanguages().map(language => ({ ...language }));
}

/**
 * Build (once) and return the profile of a bundled language.
 * @throws InvalidInputError for a language that does not ship
 */
export function loadBundledProfile(code: string): LanguageProfile {
  const cached = profiles.get(code);
  if (cached) return cached;

  const language = findLanguage(code);
  const morphemes = readTable(code, 'morphemes.tsv');
  const g2p = readTable(code, 'g2p.tsv');
  const pronunciations = readTable(code, 'pronunciations.tsv');

  const profile = createLanguageProfile({
    code: language.code,
    name: language.name,
    minStemLength: language.minStemLength,
    morphemes: morphemes ? parseMorphemeTable(morphemes) : [],
    g2p: g2p ? parseG2PTable(g2p) : [],
    pronunciations: pronunciations ? parsePronunciationTable(pronunciations) : new Map()
  });

  profiles.set(code, profile);
  return profile;
}

/**
 * The ranked sample vocabulary of a bundled language.
 */
export function loadBundledVocabulary(code: string): VocabularySource {
  findLanguage(code);
  const content = readTable(code, 'vocabulary.tsv');
  if (content === undefined) {
    throw new InvalidInputError(`Bundled language "${code}" has no vocabulary`, code);
  }
  return parseVocabulary(code, content);
}

export function resetBundledProfiles(): void {
  profiles.clear();
  languages = null;
}
