import { describe, it } from 'node:test';
import assert from 'node:assert';
import { summarize, capitalizeFirst } from '../src/summarizer.js';

describe('Summarizer', () => {

  it('should keep the requested number of sentences', () => {
    assert.strictEqual(
      summarize('the cat sat. it was happy! the dog barked.', 2),
      'The cat sat. it was happy.'
    );
  });

  it('should default to three sentences', () => {
    assert.strictEqual(summarize('one. two. three. four.'), 'One. two. three.');
  });

  it('should use every sentence when the text is shorter', () => {
    assert.strictEqual(summarize('only one here', 3), 'Only one here.');
  });

  it('should normalize punctuation before splitting', () => {
    assert.strictEqual(summarize('Hello, world! How are you?'), 'Hello world. how are you.');
  });

  it('should return an empty string when there are no sentences', () => {
    assert.strictEqual(summarize('', 3), '');
    assert.strictEqual(summarize('?!.', 3), '');
  });

  it('should return an empty string for zero or negative counts', () => {
    assert.strictEqual(summarize('a. b.', 0), '');
    assert.strictEqual(summarize('a. b.', -1), '');
  });

  it('should truncate fractional counts', () => {
    assert.strictEqual(summarize('a. b. c.', 2.7), 'A. b.');
  });

  describe('capitalizeFirst', () => {
    it('should upper-case only the first character', () => {
      assert.strictEqual(capitalizeFirst('élan vital'), 'Élan vital');
      assert.strictEqual(capitalizeFirst('1st place'), '1st place');
      assert.strictEqual(capitalizeFirst(''), '');
    });
  });
});
