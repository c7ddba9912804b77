export { normalize } from './normalizer.js';
export { tokenizeSentences, tokenizeWords, tokenizeChars, sentenceLengths } from './tokenizer.js';
export { cleanArchiveText, findContentRange, DEFAULT_ARCHIVE_CONFIG } from './cleaner.js';
export { computeStatistics, toStatisticsPayload } from './statistics.js';
export { summarize } from './summarizer.js';
export { NgramTable, ngrams, probabilities, tokenKey, sequenceKey } from './ngrams.js';
export { saveFrequencies, loadFrequencies, serializeKey, deserializeKey } from './frequency-store.js';
export { TextFetcher } from './fetcher.js';
export { TextProcessor } from './processor.js';
export { WebServer } from './web-server.js';
export {
  TextProcessingError,
  InputValidationError,
  TransportError,
  EmptyResultError,
  InternalProcessingError
} from './errors.js';
export type * from './types.js';
