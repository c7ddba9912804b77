/**
 * Extractive summary: the first sentences of the document.
 */

import { isSentenceTerminator } from './char-rules.js';
import { normalize } from './normalizer.js';
import { tokenizeSentences } from './tokenizer.js';

export const DEFAULT_SUMMARY_SENTENCES = 3;

// Upper-cases the first code point only; the rest is left lowercase from normalization.
export function capitalizeFirst(s: string): string {
  const first = s.codePointAt(0);
  if (first === undefined) return s;
  const head = String.fromCodePoint(first);
  return head.toUpperCase() + s.slice(head.length);
}

export function summarize(text: string, numSentences = DEFAULT_SUMMARY_SENTENCES): string {
  const count = Math.max(0, Math.floor(numSentences));
  const picked = tokenizeSentences(normalize(text, true)).slice(0, count);

  if (picked.length === 0) return '';

  picked[0] = capitalizeFirst(picked[0]);
  const summary = picked.join('. ');

  const last = summary.slice(-1);
  return isSentenceTerminator(last) ? summary : summary + '.';
}
