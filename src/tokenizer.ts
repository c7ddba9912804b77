/**
 * Rule-based tokenizer for normalized text.
 * Nothing here fails: degenerate input yields an empty list.
 */

import {
  collapseRuns,
  isSentenceTerminator,
  isWhitespace,
  replaceUnless,
  splitOnRuns
} from './char-rules.js';

export function tokenizeSentences(text: string): string[] {
  return splitOnRuns(text, isSentenceTerminator)
    .map((s: string) => s.trim())
    .filter((s: string) => s.length > 0);
}

export function tokenizeWords(text: string): string[] {
  const withoutTerminators = replaceUnless(text, (ch: string) => !isSentenceTerminator(ch), '');
  return splitOnRuns(withoutTerminators, isWhitespace);
}

export function tokenizeChars(text: string, includeSpace = true): string[] {
  if (includeSpace) {
    return Array.from(collapseRuns(text, isWhitespace, ' '));
  }
  return Array.from(text).filter((c: string) => c !== ' ');
}

export function sentenceLengths(sentences: readonly string[]): number[] {
  return sentences.map((sentence: string) => tokenizeWords(sentence).length);
}
