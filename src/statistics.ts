/**
 * Descriptive statistics over a document.
 */

import { normalize } from './normalizer.js';
import { sentenceLengths, tokenizeChars, tokenizeSentences, tokenizeWords } from './tokenizer.js';
import type { StatisticsRecord, StatisticsPayload, WordCount } from './types.js';

export const TOP_WORDS = 10;

/**
 * Round half away from zero on the exact binary value, so 2.675 (stored as
 * 2.67499…) gives 2.67.
 */
export function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

/**
 * Most frequent words, count descending. Equal counts keep the order in
 * which the words first appeared.
 */
export function mostCommon(words: readonly string[], limit = TOP_WORDS): WordCount[] {
  const counts = new Map<string, number>();
  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort((a: WordCount, b: WordCount) => b[1] - a[1])
    .slice(0, limit);
}

function codePointLength(s: string): number {
  return Array.from(s).length;
}

export function computeStatistics(text: string): StatisticsRecord {
  const wordText = normalize(text, false);
  const words = tokenizeWords(wordText);
  const chars = tokenizeChars(wordText, false);

  const sentences = tokenizeSentences(normalize(text, true));

  const totalWords = words.length;
  const totalSentences = sentences.length;

  const totalWordLength = words.reduce((sum: number, w: string) => sum + codePointLength(w), 0);
  const totalSentenceLength = sentenceLengths(sentences).reduce((sum: number, n: number) => sum + n, 0);

  return {
    totalCharacters: chars.length,
    totalWords,
    totalSentences,
    avgWordLength: totalWords > 0 ? roundTo(totalWordLength / totalWords, 2) : 0,
    avgSentenceLength: totalSentences > 0 ? roundTo(totalSentenceLength / totalSentences, 2) : 0,
    mostCommonWords: mostCommon(words)
  };
}

export function toStatisticsPayload(stats: StatisticsRecord): StatisticsPayload {
  return {
    total_characters: stats.totalCharacters,
    total_words: stats.totalWords,
    total_sentences: stats.totalSentences,
    avg_word_length: stats.avgWordLength,
    avg_sentence_length: stats.avgSentenceLength,
    most_common_words: stats.mostCommonWords
  };
}
