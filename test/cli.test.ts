import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { run } from '../src/cli.js';
import { loadFrequencies } from '../src/frequency-store.js';
import { sequenceKey } from '../src/ngrams.js';

const BOOK = [
  'Title: Cats',
  '*** START OF THE PROJECT GUTENBERG EBOOK CATS ***',
  'The cat sat. The cat ran.',
  '*** END OF THE PROJECT GUTENBERG EBOOK CATS ***',
  'License'
].join('\n');

describe('textlens CLI', () => {
  let dir: string;
  let book: string;
  let logged: string[];
  let errored: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'textlens-cli-'));
    book = path.join(dir, 'cats.txt');
    fs.writeFileSync(book, BOOK, 'utf-8');

    logged = [];
    errored = [];
    mock.method(console, 'log', (message?: unknown) => { logged.push(String(message)); });
    mock.method(console, 'error', (message?: unknown) => { errored.push(String(message)); });
  });

  afterEach(() => {
    mock.restoreAll();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should save the n-gram table with --out', async () => {
    const out = path.join(dir, 'bigrams.json');
    const code = await run(['ngrams', book, '--out', out]);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(logged, [`Saved 4 word 2-grams to ${out}`]);

    const table = loadFrequencies(out);
    assert.strictEqual(table.size, 4);
    assert.strictEqual(table.get(sequenceKey(['the', 'cat'])), 2);
    assert.strictEqual(table.get(sequenceKey(['sat', 'the'])), 1);
  });

  it('should print the most frequent n-grams', async () => {
    const code = await run(['ngrams', book, '-n', '1']);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(logged, ['2\tthe', '2\tcat', '1\tsat', '1\tran']);
  });

  it('should print a summary', async () => {
    const code = await run(['summary', book, '--sentences', '1']);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(logged, ['The cat sat.']);
  });

  it('should print statistics as JSON', async () => {
    const code = await run(['stats', book]);

    assert.strictEqual(code, 0);
    assert.strictEqual(logged.length, 1);
    const stats: unknown = JSON.parse(logged[0]);
    assert.deepStrictEqual(stats, {
      total_characters: 18,
      total_words: 6,
      total_sentences: 2,
      avg_word_length: 3,
      avg_sentence_length: 3,
      most_common_words: [['the', 2], ['cat', 2], ['sat', 1], ['ran', 1]]
    });
  });

  it('should fail on a missing file', async () => {
    const code = await run(['stats', path.join(dir, 'missing.txt')]);

    assert.strictEqual(code, 1);
    assert.strictEqual(errored.length, 1);
    assert.ok(errored[0].startsWith('\n❌ Error: ENOENT'));
  });

  it('should fail when the document has no text', async () => {
    const empty = path.join(dir, 'empty.txt');
    fs.writeFileSync(empty, '*** START OF THE PROJECT GUTENBERG\n### @@@\n', 'utf-8');

    assert.strictEqual(await run(['summary', empty]), 1);
    assert.deepStrictEqual(errored, [
      '\n❌ Error: The text was cleaned down to nothing. Check your Gutenberg URL or cleaning rules.\n'
    ]);
  });

  it('should reject remote sources that are not text files', async () => {
    const code = await run(['stats', 'https://example.com/book.html']);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(errored, [
      '\n❌ Error: URL must point to a .txt file (Project Gutenberg format expected).\n'
    ]);
  });

  it('should print usage for bad arguments', async () => {
    const code = await run(['stats']);

    assert.strictEqual(code, 1);
    assert.strictEqual(errored[0], '\n❌ Expected 2 positional arguments: <command> <url|file>\n');
    assert.ok(errored[1].includes('Usage: textlens'));
  });

  it('should print help', async () => {
    assert.strictEqual(await run(['--help']), 0);
    assert.ok(logged[0].includes('textlens ngrams <url|file>'));
  });
});
