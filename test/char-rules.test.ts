import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  canonicalChar,
  collapseRuns,
  isSentenceTerminator,
  isWhitespace,
  isWordChar,
  replaceUnless,
  splitOnRuns,
  stripLeading
} from '../src/char-rules.js';

describe('Character rules', () => {

  describe('isWordChar', () => {
    it('should accept letters, digits and underscore in any script', () => {
      for (const ch of ['a', 'Z', 'é', 'ß', 'ж', '7', '_']) {
        assert.strictEqual(isWordChar(ch), true, `expected ${ch} to be a word char`);
      }
    });

    it('should reject punctuation, symbols and spaces', () => {
      for (const ch of ["'", '-', '.', ',', ' ', '😀', '*']) {
        assert.strictEqual(isWordChar(ch), false, `expected ${ch} not to be a word char`);
      }
    });
  });

  it('should recognise sentence terminators', () => {
    assert.strictEqual(isSentenceTerminator('.'), true);
    assert.strictEqual(isSentenceTerminator('!'), true);
    assert.strictEqual(isSentenceTerminator('?'), true);
    assert.strictEqual(isSentenceTerminator(';'), false);
  });

  it('should treat tabs and newlines as whitespace', () => {
    assert.strictEqual(isWhitespace('\t'), true);
    assert.strictEqual(isWhitespace('\n'), true);
    assert.strictEqual(isWhitespace('x'), false);
  });

  it('should map curly quotes and dashes to plain ones', () => {
    assert.strictEqual(canonicalChar('“'), '"');
    assert.strictEqual(canonicalChar('”'), '"');
    assert.strictEqual(canonicalChar('‘'), "'");
    assert.strictEqual(canonicalChar('’'), "'");
    assert.strictEqual(canonicalChar('–'), '-');
    assert.strictEqual(canonicalChar('—'), '-');
    assert.strictEqual(canonicalChar('a'), 'a');
  });

  describe('collapseRuns', () => {
    it('should only replace runs of at least minRun', () => {
      const text = 'a\n\n\nb\n\nc';
      assert.strictEqual(collapseRuns(text, (ch) => ch === '\n', '\n\n', 3), 'a\n\nb\n\nc');
    });

    it('should collapse every run when minRun is 1', () => {
      assert.strictEqual(collapseRuns(' a \t\n b ', isWhitespace, ' '), ' a b ');
    });

    it('should handle a run at the end of the text', () => {
      assert.strictEqual(collapseRuns('a   ', (ch) => ch === ' ', ' ', 2), 'a ');
    });
  });

  it('should split on separator runs and drop empty pieces', () => {
    assert.deepStrictEqual(splitOnRuns('..a..b!?c.', isSentenceTerminator), ['a', 'b', 'c']);
    assert.deepStrictEqual(splitOnRuns('', isSentenceTerminator), []);
  });

  it('should replace rejected characters', () => {
    assert.strictEqual(replaceUnless('a,b;c', isWordChar, ' '), 'a b c');
  });

  it('should strip only the leading run', () => {
    const strip = (ch: string) => ch === '\uFEFF' || isWhitespace(ch);
    assert.strictEqual(stripLeading('\uFEFF  x \uFEFF', strip), 'x \uFEFF');
    assert.strictEqual(stripLeading('   ', strip), '');
  });
});
