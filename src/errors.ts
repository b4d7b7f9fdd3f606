/**
 * Error codes and the result type shared by every fallible operation.
 *
 * Nothing in the public API throws. Operations return a {@link Result} and the
 * caller decides what to do with a failure.
 *
 * @example
 * ```typescript
 * const result = languages.tryGetTextFromLanguage('en', 'hello_world');
 * if (!result.success) {
 *   switch (result.error.code) {
 *     case LanguagesErrorCode.LANGUAGE_NOT_FOUND:
 *       console.log('Language was not loaded');
 *       break;
 *     case LanguagesErrorCode.TEXT_NOT_FOUND:
 *       console.log('Missing text key');
 *       break;
 *   }
 * }
 * ```
 */
export enum LanguagesErrorCode {
  // Config building
  INVALID_LANGUAGE_CODE = 'INVALID_LANGUAGE_CODE',
  DUPLICATE_LANGUAGE = 'DUPLICATE_LANGUAGE',
  INVALID_DIRECTORY = 'INVALID_DIRECTORY',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Loading
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  IO_ERROR = 'IO_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',

  // Lookups
  LANGUAGE_NOT_FOUND = 'LANGUAGE_NOT_FOUND',
  TEXT_NOT_FOUND = 'TEXT_NOT_FOUND',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
}

export type ErrorDetails = Record<string, string | number>;

export class LanguagesError extends Error {
  /**
   * @param code - Error code for programmatic handling
   * @param message - Human-readable error message
   * @param details - Structured context (file path, line, key, ...)
   * @param cause - Underlying error, if any
   */
  constructor(
    public readonly code: LanguagesErrorCode,
    message: string,
    public readonly details: ErrorDetails = {},
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LanguagesError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LanguagesError);
    }
  }

  static isLanguagesError(error: unknown): error is LanguagesError {
    return error instanceof LanguagesError;
  }

  /**
   * Convert error to JSON for serialization.
   * The cause is reduced to its message to keep the output flat.
   */
  toJSON(includeStack = false): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      result.details = { ...this.details };
    }

    if (includeStack && this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      result.causedBy = this.cause.message;
    }

    return result;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
    }
    return result;
  }
}

export type Failure = { success: false; error: LanguagesError };

export type Result<T> = { success: true; data: T } | Failure;

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail(code: LanguagesErrorCode, message: string, details?: ErrorDetails, cause?: unknown): Failure {
  return {
    success: false,
    error: new LanguagesError(code, message, details, toError(cause)),
  };
}

/**
 * Return the data of a successful result or throw its error.
 * For callers that prefer exceptions over result checks.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

/**
 * Extract error message from unknown error type
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toError(cause: unknown): Error | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? cause : new Error(String(cause));
}
