import { describe, it } from 'node:test';
import assert from 'node:assert';
import { normalize, keepsInSentenceMode, keepsInWordMode } from '../src/normalizer.js';

describe('Normalizer', () => {

  it('should return empty output for empty input', () => {
    assert.strictEqual(normalize('', true), '');
    assert.strictEqual(normalize('', false), '');
  });

  it('should lowercase and keep sentence terminators when preserving sentences', () => {
    assert.strictEqual(normalize('Hello, World!', true), 'hello world!');
  });

  it('should drop sentence terminators in word mode', () => {
    assert.strictEqual(normalize('Hello, World!', false), 'hello world');
  });

  it('should default to preserving sentences', () => {
    assert.strictEqual(normalize('One. Two?'), 'one. two?');
  });

  it('should canonicalize curly quotes and dashes', () => {
    const text = '“Don’t” — she said.';
    assert.strictEqual(normalize(text, true), "don't - she said.");
  });

  it('should split contractions in word mode', () => {
    const text = '“Don’t” — she said.';
    assert.strictEqual(normalize(text, false), 'don t she said');
  });

  it('should replace punctuation with a space rather than join words', () => {
    assert.strictEqual(normalize('end,start', true), 'end start');
    assert.strictEqual(normalize('semi;colon', false), 'semi colon');
  });

  it('should reduce emoji-only text to nothing', () => {
    assert.strictEqual(normalize('😀 🎉 ✨', true), '');
    assert.strictEqual(normalize('😀 🎉 ✨', false), '');
  });

  it('should collapse whitespace of every kind and trim', () => {
    assert.strictEqual(normalize('  a\n\n\tb   c  ', true), 'a b c');
  });

  it('should lowercase non-ASCII letters', () => {
    assert.strictEqual(normalize('ÉCOLE Straße', false), 'école straße');
  });

  it('should keep hyphens only when preserving sentences', () => {
    assert.strictEqual(normalize('well-known fact', true), 'well-known fact');
    assert.strictEqual(normalize('well-known fact', false), 'well known fact');
  });

  it('should be idempotent', () => {
    const samples = [
      'It was the best of times, it was the worst of times...',
      '“What?!” he asked – twice.',
      "Rock 'n' roll isn't dead!",
      '   \t  ',
      'Ünïcödé — ÇÅSÉ'
    ];
    for (const sample of samples) {
      for (const preserve of [true, false]) {
        const once = normalize(sample, preserve);
        assert.strictEqual(normalize(once, preserve), once, `not idempotent for ${JSON.stringify(sample)}`);
      }
    }
  });

  describe('character predicates', () => {
    it('should keep apostrophes and hyphens in sentence mode', () => {
      assert.strictEqual(keepsInSentenceMode("'"), true);
      assert.strictEqual(keepsInSentenceMode('-'), true);
      assert.strictEqual(keepsInSentenceMode('?'), true);
      assert.strictEqual(keepsInSentenceMode(','), false);
    });

    it('should keep only word characters and whitespace in word mode', () => {
      assert.strictEqual(keepsInWordMode("'"), false);
      assert.strictEqual(keepsInWordMode('.'), false);
      assert.strictEqual(keepsInWordMode('a'), true);
      assert.strictEqual(keepsInWordMode(' '), true);
    });
  });
});
