/**
 * Error taxonomy for translation jobs
 */

export type ErrorKind =
  | 'ValidationError'
  | 'IOError'
  | 'FormatError'
  | 'AuthError'
  | 'RateLimitError'
  | 'TransientNetworkError'
  | 'UnsupportedLanguageError'
  | 'CancelledError';

/**
 * Kinds that can be recorded against a single cell without aborting the job
 */
export type CellFailureKind = 'RateLimitError' | 'TransientNetworkError' | 'UnsupportedLanguageError';

export const CELL_FAILURE_KINDS: readonly CellFailureKind[] = [
  'RateLimitError',
  'TransientNetworkError',
  'UnsupportedLanguageError',
];

export class TranslationJobError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }

  /**
   * Whether another attempt may succeed
   */
  get retryable(): boolean {
    return false;
  }
}

export class ValidationError extends TranslationJobError {
  constructor(message: string) {
    super('ValidationError', message);
  }
}

export class IOError extends TranslationJobError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('IOError', message, { cause });
    this.path = path;
  }
}

export class FormatError extends TranslationJobError {
  constructor(message: string, cause?: unknown) {
    super('FormatError', message, { cause });
  }
}

export class MissingColumnError extends FormatError {
  readonly column: string;

  constructor(column: string) {
    super(`No column matches language code '${column}'`);
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

export class MissingKeyColumnError extends FormatError {
  constructor(keyColumn: string) {
    super(`Missing required '${keyColumn}' column`);
    this.name = 'MissingKeyColumnError';
  }
}

export class AuthError extends TranslationJobError {
  constructor(message = 'Translation API key is invalid or missing', cause?: unknown) {
    super('AuthError', message, { cause });
  }
}

export class RateLimitError extends TranslationJobError {
  constructor(message = 'Translation rate limit or quota exceeded', cause?: unknown) {
    super('RateLimitError', message, { cause });
  }

  override get retryable(): boolean {
    return true;
  }
}

export class TransientNetworkError extends TranslationJobError {
  private readonly canRetry: boolean;

  constructor(message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super('TransientNetworkError', message, { cause: options.cause });
    this.canRetry = options.retryable ?? true;
  }

  override get retryable(): boolean {
    return this.canRetry;
  }
}

export class UnsupportedLanguageError extends TranslationJobError {
  readonly language: string;

  constructor(language: string, message?: string, cause?: unknown) {
    super('UnsupportedLanguageError', message ?? `Unsupported language: ${language}`, { cause });
    this.language = language;
  }
}

export class CancelledError extends TranslationJobError {
  constructor(message = 'Translation job was cancelled') {
    super('CancelledError', message);
  }
}

export function isCellFailureKind(kind: ErrorKind): kind is CellFailureKind {
  return CELL_FAILURE_KINDS.some((cellKind) => cellKind === kind);
}

/**
 * Retries apply to rate limits and transient network failures only
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TranslationJobError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
