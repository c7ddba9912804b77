/**
 * Character classes and run helpers behind the normalizer, tokenizer and cleaner.
 *
 * Every rule works on single code points so it can be tested on its own;
 * the string-level functions only iterate and apply them.
 */

const WORD_CHAR = /^[\p{L}\p{N}_]$/u;
const WHITESPACE = /^\s$/u;

export const SENTENCE_TERMINATORS: readonly string[] = ['.', '!', '?'];

// Typographic variants and their plain replacements
export const CHARACTER_CANON: Readonly<Record<string, string>> = {
  '\u201C': '"', // “
  '\u201D': '"', // ”
  '\u2018': "'", // ‘
  '\u2019': "'", // ’
  '\u2013': '-', // en dash
  '\u2014': '-'  // em dash
};

export function isWordChar(ch: string): boolean {
  return WORD_CHAR.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

export function isSentenceTerminator(ch: string): boolean {
  return SENTENCE_TERMINATORS.includes(ch);
}

export function isApostrophe(ch: string): boolean {
  return ch === "'";
}

export function isHyphen(ch: string): boolean {
  return ch === '-';
}

export function canonicalChar(ch: string): string {
  return CHARACTER_CANON[ch] ?? ch;
}

/**
 * Replace every code point rejected by `keep` with `replacement`.
 */
export function replaceUnless(text: string, keep: (ch: string) => boolean, replacement: string): string {
  let out = '';
  for (const ch of text) {
    out += keep(ch) ? ch : replacement;
  }
  return out;
}

/**
 * Replace each maximal run of code points matching `inRun` with `replacement`,
 * provided the run is at least `minRun` long. Shorter runs are kept as-is.
 */
export function collapseRuns(
  text: string,
  inRun: (ch: string) => boolean,
  replacement: string,
  minRun = 1
): string {
  let out = '';
  let run = '';
  let runLength = 0;

  const flush = (): void => {
    if (runLength === 0) return;
    out += runLength >= minRun ? replacement : run;
    run = '';
    runLength = 0;
  };

  for (const ch of text) {
    if (inRun(ch)) {
      run += ch;
      runLength++;
    } else {
      flush();
      out += ch;
    }
  }
  flush();

  return out;
}

/**
 * Split on maximal runs of separator code points, dropping empty pieces.
 */
export function splitOnRuns(text: string, isSeparator: (ch: string) => boolean): string[] {
  const pieces: string[] = [];
  let current = '';
  for (const ch of text) {
    if (isSeparator(ch)) {
      if (current) pieces.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) pieces.push(current);
  return pieces;
}

/**
 * Drop the leading run of code points matching `strip`.
 */
export function stripLeading(text: string, strip: (ch: string) => boolean): string {
  let offset = 0;
  for (const ch of text) {
    if (!strip(ch)) break;
    offset += ch.length;
  }
  return text.slice(offset);
}
