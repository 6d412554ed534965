/**
 * StreamKvError - Error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a StreamKvError
 */
export interface StreamKvErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a StreamKvError
 */
export interface SerializedStreamKvError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedStreamKvError | { name: string; message: string; stack?: string };
}

/**
 * Error class for streamkv with structured error information.
 *
 * @example
 * ```typescript
 * throw new StreamKvError({
 *   code: 'STREAMKV_A100',
 *   context: { operation: 'set' },
 * });
 *
 * try {
 *   keys.set(new Set());
 * } catch (error) {
 *   if (StreamKvError.isCategory(error, 'precondition')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class StreamKvError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: StreamKvErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'StreamKvError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StreamKvError);
    }
  }

  /**
   * Create a StreamKvError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): StreamKvError {
    return new StreamKvError({ code, context });
  }

  /**
   * Wrap an existing error with a StreamKvError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): StreamKvError {
    return new StreamKvError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isStreamKvError(error: unknown): error is StreamKvError {
    return error instanceof StreamKvError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return StreamKvError.isStreamKvError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return StreamKvError.isStreamKvError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedStreamKvError {
    const result: SerializedStreamKvError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (StreamKvError.isStreamKvError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Thrown synchronously when an operation is called in a way that can never
 * succeed. Nothing has touched the store or the change bus when it is thrown.
 */
export class PreconditionError extends StreamKvError {
  constructor(code: ErrorCode, context?: Record<string, unknown>, message?: string) {
    super({ code, message, context });
    this.name = 'PreconditionError';
  }
}

/**
 * Helper function to ensure errors are StreamKvErrors
 */
export function ensureStreamKvError(
  error: unknown,
  defaultCode: ErrorCode = 'STREAMKV_X900'
): StreamKvError {
  if (StreamKvError.isStreamKvError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return StreamKvError.wrap(error, defaultCode);
  }

  return new StreamKvError({
    code: defaultCode,
    message: String(error),
  });
}
