/**
 * Sentence detection using regex-based splitting.
 * Handles common abbreviations and initials. Unlike a filter, every
 * non-whitespace character of the input ends up in exactly one sentence.
 */

import { createHash } from 'node:crypto';
import type { Sentence } from './sentence.types';

const ABBREVIATIONS = new Set([
  'mr', 'mrs', 'ms', 'dr', 'prof', 'sr', 'jr', 'st', 'ave', 'blvd',
  'vs', 'etc', 'i.e', 'e.g', 'cf', 'al', 'vol', 'no', 'pp', 'art',
  'inc', 'ltd', 'corp', 'co', 'fig', 'approx', 'dept', 'est', 'para',
]);

// Full-width marks end a clause with or without following whitespace
const CLAUSE_BOUNDARY = /(?<=[,;:])\s+|(?<=[，、；：])\s*/;

/** Scripts written without spaces between words, plus CJK punctuation. */
const UNSPACED_SCRIPT =
  /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}\u3000-\u303f\uff00-\uffef]/u;
const UNSPACED_START = new RegExp(`^${UNSPACED_SCRIPT.source}`, 'u');
const UNSPACED_END = new RegExp(`${UNSPACED_SCRIPT.source}$`, 'u');

/**
 * Split text into sentences.
 * Returns sentence boundaries relative to the input text.
 */
export function splitIntoSentences(text: string): Sentence[] {
  const sentences: Sentence[] = [];

  if (!text.trim()) {
    return sentences;
  }

  // ASCII stops need whitespace or end of input after them; full-width stops do not
  const sentenceEndRegex = /[.!?]+["')\]]*(?=\s|$)|[。！？]+[」』"')\]）]*/g;

  let lastEnd = skipWhitespace(text, 0);
  let match: RegExpExecArray | null;

  while ((match = sentenceEndRegex.exec(text)) !== null) {
    const punctuation = match[0];
    const punctuationEnd = match.index + punctuation.length;
    if (punctuationEnd <= lastEnd) continue;

    const beforePunctuation = text.slice(lastEnd, match.index);
    const lastWord = beforePunctuation.split(/\s+/).pop()?.toLowerCase() || '';

    if (ABBREVIATIONS.has(lastWord.replace(/\.$/, ''))) {
      continue;
    }

    // Initials (single letter followed by period)
    if (/^[a-z]$/i.test(lastWord) && punctuation === '.') {
      continue;
    }

    pushSentence(sentences, text, lastEnd, punctuationEnd);
    lastEnd = skipWhitespace(text, punctuationEnd);
  }

  if (lastEnd < text.length) {
    pushSentence(sentences, text, lastEnd, text.length);
  }

  return sentences;
}

/**
 * Split a sentence at clause punctuation (comma, semicolon, colon, and their
 * full-width forms including the ideographic comma).
 */
export function splitIntoClauses(text: string): string[] {
  return text
    .split(CLAUSE_BOUNDARY)
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
}

export function splitIntoWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function isUnspacedScript(text: string): boolean {
  return UNSPACED_SCRIPT.test(text);
}

/**
 * Join two runs of text, with a space unless the seam falls in a script
 * written without word spacing.
 */
export function joinText(left: string, right: string): string {
  if (!left) return right;
  if (!right) return left;
  const seamless = UNSPACED_END.test(left) || UNSPACED_START.test(right);
  return seamless ? left + right : `${left} ${right}`;
}

/**
 * Compute SHA-256 hash of content for caching and change detection.
 */
export function computeContentHash(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

function pushSentence(sentences: Sentence[], text: string, start: number, end: number): void {
  const sentenceText = text.slice(start, end).trim();
  if (sentenceText.length > 0) {
    sentences.push({ start, end, text: sentenceText });
  }
}

function skipWhitespace(text: string, position: number): number {
  let cursor = position;
  while (cursor < text.length && /\s/.test(text[cursor])) {
    cursor++;
  }
  return cursor;
}
