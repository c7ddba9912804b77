/**
 * Text normalizer.
 *
 * Lowercases, canonicalizes quotes and dashes, blanks out punctuation and
 * collapses whitespace. With `preserveSentences` the sentence terminators,
 * apostrophes and hyphens survive so the result can still be split into
 * sentences; without it only word characters and spaces remain.
 */

import {
  canonicalChar,
  collapseRuns,
  isApostrophe,
  isHyphen,
  isSentenceTerminator,
  isWhitespace,
  isWordChar,
  replaceUnless
} from './char-rules.js';

export function keepsInSentenceMode(ch: string): boolean {
  return isWordChar(ch) ||
    isWhitespace(ch) ||
    isSentenceTerminator(ch) ||
    isApostrophe(ch) ||
    isHyphen(ch);
}

// Apostrophes are non-word characters, so contractions split here too: "don't" -> "don t"
export function keepsInWordMode(ch: string): boolean {
  return isWordChar(ch) || isWhitespace(ch);
}

export function canonicalize(text: string): string {
  return Array.from(text, canonicalChar).join('');
}

export function normalize(text: string, preserveSentences = true): string {
  if (!text) return '';

  const lowered = text.toLowerCase();
  const canonical = canonicalize(lowered);
  const stripped = replaceUnless(
    canonical,
    preserveSentences ? keepsInSentenceMode : keepsInWordMode,
    ' '
  );

  return collapseRuns(stripped, isWhitespace, ' ').trim();
}
