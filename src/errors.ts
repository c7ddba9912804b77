/**
 * Error taxonomy shared by the pipeline, the fetcher and the outer surfaces.
 * Each class carries the HTTP status the web server answers with.
 */

export type ErrorKind = 'validation' | 'transport' | 'empty-result' | 'internal';

export class TextProcessingError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;

  constructor(kind: ErrorKind, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.status = status;
  }

  /** Message safe to show outside the process */
  get publicMessage(): string {
    return this.message;
  }
}

/** Missing or malformed input; nothing was processed */
export class InputValidationError extends TextProcessingError {
  constructor(message: string) {
    super('validation', 400, message);
  }
}

/** The document could not be retrieved */
export class TransportError extends TextProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', 502, message, options);
  }
}

/** Normalization left nothing to analyze */
export class EmptyResultError extends TextProcessingError {
  constructor(message = 'The text was cleaned down to nothing. Check your Gutenberg URL or cleaning rules.') {
    super('empty-result', 400, message);
  }
}

export class InternalProcessingError extends TextProcessingError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('internal', 500, `Unexpected processing failure: ${detail}`, { cause });
  }

  override get publicMessage(): string {
    return 'Text Processing Error: an unexpected error occurred.';
  }
}

export function isTextProcessingError(err: unknown): err is TextProcessingError {
  return err instanceof TextProcessingError;
}
