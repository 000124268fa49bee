// morphochart/characters - Word normalization and IPA character utilities

// Tie bars join the phoneme characters on both sides (t͡ʃ, k͜p)
export const IPA_TIE_BARS = new Set(['͡', '͜']);

// Spacing modifier letters that attach to the preceding phoneme
export const IPA_MODIFIERS = new Set([
  'ː', // length
  'ˑ', // half-length
  'ʼ', // ejective
  'ʴ', // rhotacized
  'ʰ', // aspirated
  'ʱ', // breathy-voice aspirated
  'ʲ', // palatalized
  'ʷ', // labialized
  'ˠ', // velarized
  'ˤ', // pharyngealized
  '˞', // rhotacized
  'ⁿ', // nasal release
  'ˡ'  // lateral release
]);

export const IPA_STRESS_MARKS = new Set(['ˈ', 'ˌ']);

const COMBINING_MARK = /\p{M}/u;
const WORD_CHARACTER = /[\p{L}\p{M}\p{N}'’-]/u;

export function isIpaDiacritic(char: string): boolean {
  if (IPA_TIE_BARS.has(char)) return false;
  return IPA_MODIFIERS.has(char) || COMBINING_MARK.test(char);
}

/**
 * Lowercase and NFC-normalize a word, dropping punctuation and whitespace.
 * Apostrophes and hyphens survive inside the word but not at its edges.
 */
export function cleanWord(word: string): string {
  let cleaned = '';
  for (const char of word.normalize('NFC').toLowerCase()) {
    if (WORD_CHARACTER.test(char)) cleaned += char;
  }
  return cleaned.replace(/^['’-]+|['’-]+$/g, '');
}

/**
 * Strip transcription delimiters (/…/, […]), stress marks, syllable dots,
 * optional segments in parentheses and whitespace from an IPA string.
 */
export function cleanIpa(ipa: string): string {
  let cleaned = ipa.normalize('NFC').trim();
  cleaned = cleaned.replace(/^[\/\[]+/, '').replace(/[\/\]]+$/, '');
  cleaned = cleaned.replace(/\([^)]*\)/g, '');

  let result = '';
  for (const char of cleaned) {
    if (IPA_STRESS_MARKS.has(char) || char === '.' || char === "'" || /\s/.test(char)) continue;
    result += char;
  }
  return result;
}

/**
 * Number of base+diacritic clusters in an IPA string.
 */
export function ipaClusterCount(ipa: string): number {
  return clusterIpa(ipa).length;
}

function clusterIpa(ipa: string): string[] {
  const clusters: string[] = [];
  let joinNext = false;

  for (const char of ipa) {
    const last = clusters.length - 1;

    if (IPA_TIE_BARS.has(char)) {
      if (last >= 0) {
        clusters[last] += char;
        joinNext = true;
      }
      continue;
    }

    if (last >= 0 && (joinNext || isIpaDiacritic(char))) {
      clusters[last] += char;
      joinNext = false;
      continue;
    }

    clusters.push(char);
  }

  return clusters;
}

/**
 * Split an IPA string into phonemes. Diacritics stay with their base and
 * tie bars keep affricates together. Clusters listed together in
 * `inventory` (diphthongs, untied affricates) are re-joined by maximal munch.
 */
export function splitIpa(ipa: string, inventory: ReadonlySet<string> = new Set()): string[] {
  const clusters = clusterIpa(ipa);
  if (inventory.size === 0) return clusters;

  let maxSpan = 1;
  for (const phoneme of inventory) {
    maxSpan = Math.max(maxSpan, ipaClusterCount(phoneme));
  }

  const phonemes: string[] = [];
  let i = 0;
  while (i < clusters.length) {
    let taken = 1;
    for (let span = Math.min(maxSpan, clusters.length - i); span > 1; span--) {
      if (inventory.has(clusters.slice(i, i + span).join(''))) {
        taken = span;
        break;
      }
    }
    phonemes.push(clusters.slice(i, i + taken).join(''));
    i += taken;
  }

  return phonemes;
}
