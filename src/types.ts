/**
 * Shared type definitions for textlens
 */

// ============================================================================
// Statistics Types
// ============================================================================

/**
 * A word and the number of times it occurs
 */
export type WordCount = [word: string, count: number];

/**
 * Aggregate statistics for a document
 */
export interface StatisticsRecord {
  totalCharacters: number;
  totalWords: number;
  totalSentences: number;
  /** Mean word length in characters, rounded to 2 decimals */
  avgWordLength: number;
  /** Mean words per sentence, rounded to 2 decimals */
  avgSentenceLength: number;
  /** Up to 10 entries, count descending, ties in first-seen order */
  mostCommonWords: WordCount[];
}

// ============================================================================
// N-gram Types
// ============================================================================

/**
 * Key of an n-gram table: a bare token for unigrams, an ordered
 * sequence of tokens for longer windows.
 */
export type NgramKey =
  | { kind: 'token'; token: string }
  | { kind: 'sequence'; tokens: readonly string[] };

export interface NgramEntry {
  key: NgramKey;
  value: number;
}

export type TokenUnit = 'word' | 'char';

export interface NgramRequest {
  n: number;
  unit?: TokenUnit;
  /** Convert counts to probabilities */
  probabilities?: boolean;
  smoothing?: number;
}

// ============================================================================
// Cleaner Types
// ============================================================================

/**
 * Literal markers and leading characters used to excise archive boilerplate
 */
export interface ArchiveCleanerConfig {
  readonly startMarkers: readonly string[];
  readonly endMarkers: readonly string[];
  /** Characters stripped from the very start, together with whitespace */
  readonly leadingInvisibles: readonly string[];
}

// ============================================================================
// Fetcher / Processor Types
// ============================================================================

/**
 * Anything that can turn a URL into document text
 */
export interface TextSource {
  fetchText(url: string): Promise<string>;
  /** Transfer counters, reported by /api/debug when present */
  getStats?(): FetcherStats;
}

export interface FetcherStats {
  requests: number;
  bytesDownloaded: number;
}

export interface FetcherOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  debug?: boolean;
}

export interface ProcessorOptions {
  source?: TextSource;
  summarySentences?: number;
  debug?: boolean;
}

export interface CleanResult {
  cleanedText: string;
  statistics: StatisticsRecord;
  summary: string;
}

export interface AnalyzeResult {
  statistics: StatisticsRecord;
}

// ============================================================================
// CLI Types
// ============================================================================

export type CliCommand = 'stats' | 'summary' | 'ngrams';

/**
 * Parsed CLI options
 */
export interface CliOptionsData {
  command: CliCommand | null;
  source: string | null;
  n: number;
  unit: TokenUnit;
  smoothing: number;
  probabilities: boolean;
  out: string | null;
  sentences: number;
  raw: boolean;
  errors: string[];
}

// ============================================================================
// Web Server Types
// ============================================================================

/**
 * Web server constructor options
 */
export interface WebServerOptions {
  port?: number;
  host?: string;
  debug?: boolean;
  summarySentences?: number;
  /** Largest accepted request body in bytes (default: 1 MiB) */
  maxBodyBytes?: number;
  /** Replaces the network fetcher, mainly for tests */
  source?: TextSource;
}

/**
 * Event log entry
 */
export interface EventLogEntry {
  type: string;
  message: string;
  duration: number | null;
  timestamp: number;
  errorCode?: string | null;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Statistics as the HTTP API serializes them
 */
export interface StatisticsPayload {
  total_characters: number;
  total_words: number;
  total_sentences: number;
  avg_word_length: number;
  avg_sentence_length: number;
  most_common_words: WordCount[];
}
