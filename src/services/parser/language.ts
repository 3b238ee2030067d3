import type { LanguageFamily } from './parser.types';

export const LANGUAGE_FAMILIES: readonly LanguageFamily[] = [
  'latin-based',
  'arabic-based',
  'bengali-based',
  'cyrillic-based',
  'devanagari-based',
  'chinese-traditional',
  'chinese-simplified',
  'japanese',
  'korean',
  'telugu',
  'kannada',
  'thai',
];

const SCRIPTS: Array<{ family: LanguageFamily; pattern: RegExp }> = [
  { family: 'latin-based', pattern: /\p{Script=Latin}/gu },
  { family: 'cyrillic-based', pattern: /\p{Script=Cyrillic}/gu },
  { family: 'arabic-based', pattern: /\p{Script=Arabic}/gu },
  { family: 'bengali-based', pattern: /\p{Script=Bengali}/gu },
  { family: 'devanagari-based', pattern: /\p{Script=Devanagari}/gu },
  { family: 'chinese-simplified', pattern: /\p{Script=Han}/gu },
  { family: 'korean', pattern: /\p{Script=Hangul}/gu },
  { family: 'thai', pattern: /\p{Script=Thai}/gu },
  { family: 'telugu', pattern: /\p{Script=Telugu}/gu },
  { family: 'kannada', pattern: /\p{Script=Kannada}/gu },
];

const KANA = /[\p{Script=Hiragana}\p{Script=Katakana}]/gu;

/** Only the first part of long documents is sampled. */
const SAMPLE_CHARS = 20_000;

export function isLanguageFamily(value: string): value is LanguageFamily {
  return LANGUAGE_FAMILIES.some((family) => family === value);
}

/**
 * Dominant script family of a text, by character counts.
 * Han text alongside kana is Japanese. Defaults to latin-based.
 */
export function detectLanguage(text: string): LanguageFamily {
  const sample = text.slice(0, SAMPLE_CHARS);
  const kana = sample.match(KANA)?.length ?? 0;

  let best: LanguageFamily = 'latin-based';
  let bestCount = 0;

  for (const { family, pattern } of SCRIPTS) {
    let count = sample.match(pattern)?.length ?? 0;
    let resolved = family;
    if (family === 'chinese-simplified' && kana > 0) {
      count += kana;
      resolved = 'japanese';
    }
    if (count > bestCount) {
      best = resolved;
      bestCount = count;
    }
  }

  return best;
}
