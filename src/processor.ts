/**
 * TextProcessor
 * Runs the full pipeline for one document and is the error boundary around it:
 * anything that is not already a TextProcessingError leaves as an
 * InternalProcessingError, with the message and stack written to stderr.
 */

import { cleanArchiveText } from './cleaner.js';
import { InternalProcessingError, EmptyResultError, InputValidationError, isTextProcessingError } from './errors.js';
import { TextFetcher } from './fetcher.js';
import { ngrams, probabilities, NgramTable } from './ngrams.js';
import { normalize } from './normalizer.js';
import { computeStatistics } from './statistics.js';
import { DEFAULT_SUMMARY_SENTENCES, summarize } from './summarizer.js';
import { tokenizeChars, tokenizeWords } from './tokenizer.js';
import type { AnalyzeResult, CleanResult, NgramRequest, ProcessorOptions, TextSource } from './types.js';

export class TextProcessor {
  private source: TextSource;
  private summarySentences: number;
  private debug: boolean;

  constructor(options: ProcessorOptions = {}) {
    this.debug = options.debug || false;
    this.source = options.source || new TextFetcher({ debug: this.debug });
    this.summarySentences = options.summarySentences ?? DEFAULT_SUMMARY_SENTENCES;
  }

  private log(message: string): void {
    if (this.debug) {
      console.error(`[TextProcessor] ${message}`);
    }
  }

  private async guard<T>(stage: string, work: () => T | Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isTextProcessingError(err)) {
        this.log(`${stage}: ${err.kind}: ${err.message}`);
        throw err;
      }
      // Logged whatever the debug flag
      const wrapped = new InternalProcessingError(err);
      console.error(`[TextProcessor] ${stage}: ${wrapped.message}`);
      if (err instanceof Error && err.stack) {
        console.error(err.stack);
      }
      throw wrapped;
    }
  }

  fetch(url: string): Promise<string> {
    return this.guard('fetch', () => this.source.fetchText(url));
  }

  /**
   * Fetch an archive document, strip its boilerplate and analyze it.
   * Statistics and summary are computed on the normalized text.
   */
  processUrl(url: string): Promise<CleanResult> {
    return this.guard('processUrl', async () => {
      const raw = await this.source.fetchText(url);
      this.log(`fetched ${raw.length} characters`);
      return this.analyzeDocument(raw, true);
    });
  }

  /**
   * Same as processUrl for text already in hand. Archive cleaning is optional
   * so local files without markers can skip it.
   */
  processRaw(raw: string, clean = true): Promise<CleanResult> {
    return this.guard('processRaw', () => this.analyzeDocument(raw, clean));
  }

  private analyzeDocument(raw: string, clean: boolean): CleanResult {
    const cleaned = clean ? cleanArchiveText(raw) : raw;
    const normalized = normalize(cleaned, true);

    if (!normalized) {
      throw new EmptyResultError();
    }

    return {
      cleanedText: normalized,
      statistics: computeStatistics(normalized),
      summary: summarize(normalized, this.summarySentences)
    };
  }

  processText(text: string): Promise<AnalyzeResult> {
    return this.guard('processText', () => ({
      statistics: computeStatistics(normalize(text, true))
    }));
  }

  buildNgrams(text: string, request: NgramRequest): Promise<NgramTable> {
    return this.guard('buildNgrams', () => {
      const normalized = normalize(text, true);
      const unit = request.unit ?? 'word';
      const tokens = unit === 'char' ? tokenizeChars(normalized, true) : tokenizeWords(normalized);

      if (tokens.length === 0) {
        throw new InputValidationError('No tokens to count after normalization');
      }

      const counts = ngrams(tokens, request.n);
      this.log(`${unit} ${request.n}-grams: ${counts.size} distinct of ${counts.total()}`);

      return request.probabilities ? probabilities(counts, request.smoothing ?? 0) : counts;
    });
  }
}
