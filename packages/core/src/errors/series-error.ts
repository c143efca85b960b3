/**
 * SeriesError - structured error with a registry code, suggestion and context
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a SeriesError
 */
export interface SeriesErrorOptions {
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
 * Serialized format of a SeriesError
 */
export interface SerializedSeriesError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedSeriesError | { name: string; message: string; stack?: string };
}

/**
 * Base error of every seriate package.
 *
 * @example
 * ```typescript
 * try {
 *   TimeSeries.fromPoints(points);
 * } catch (error) {
 *   if (SeriesError.isCode(error, 'SERIATE_C102')) {
 *     console.log('Duplicate key');
 *   } else if (SeriesError.isCategory(error, 'construction')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class SeriesError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: SeriesErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'SeriesError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SeriesError);
    }
  }

  /**
   * Create a SeriesError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): SeriesError {
    return new SeriesError({ code, context });
  }

  /**
   * Wrap an existing error with a SeriesError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): SeriesError {
    return new SeriesError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isSeriesError(error: unknown): error is SeriesError {
    return error instanceof SeriesError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): error is SeriesError {
    return SeriesError.isSeriesError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): error is SeriesError {
    return SeriesError.isSeriesError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context, jsonSafe)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedSeriesError {
    const result: SerializedSeriesError = {
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
      if (SeriesError.isSeriesError(this.cause)) {
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

/** bigint keys end up in error context; JSON.stringify rejects them otherwise */
function jsonSafe(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Key and value sequences of different length
 */
export class LengthMismatchError extends SeriesError {
  readonly keyCount: number;
  readonly valueCount: number;

  constructor(keyCount: number, valueCount: number) {
    super({
      code: 'SERIATE_C100',
      message: `Cannot pair ${keyCount} keys with ${valueCount} values`,
      context: { keyCount, valueCount },
    });

    this.name = 'LengthMismatchError';
    this.keyCount = keyCount;
    this.valueCount = valueCount;
  }
}

/**
 * A key smaller than the key before it
 */
export class UnorderedInputError extends SeriesError {
  /** Position of the offending key */
  readonly position: number;

  constructor(position: number, context?: Record<string, unknown>) {
    super({
      code: 'SERIATE_C101',
      message: `Key at position ${position} is less than the key before it`,
      context: { ...context, position },
    });

    this.name = 'UnorderedInputError';
    this.position = position;
  }
}

/**
 * A key equal to the key before it
 */
export class DuplicateKeyError extends SeriesError {
  /** Position of the repeated key */
  readonly position: number;

  constructor(position: number, context?: Record<string, unknown>) {
    super({
      code: 'SERIATE_C102',
      message: `Key at position ${position} repeats the key before it`,
      context: { ...context, position },
    });

    this.name = 'DuplicateKeyError';
    this.position = position;
  }
}

/**
 * Invalid argument to an operation
 */
export class InvalidArgumentError extends SeriesError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: 'SERIATE_A200' | 'SERIATE_A201' | 'SERIATE_A202' = 'SERIATE_A200'
  ) {
    super({ code, message, context });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Field validation error detail
 */
export interface FieldValidationError {
  /** Field path (e.g., 'points.3.value' or 'hashJoinRatio') */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends SeriesError {
  /** Field-level validation errors */
  readonly errors: FieldValidationError[];

  constructor(
    errors: FieldValidationError[],
    code: 'SERIATE_A203' | 'SERIATE_D301' = 'SERIATE_D301',
    context?: Record<string, unknown>
  ) {
    const message = errors.map((e) => `${e.path}: ${e.message}`).join('; ');

    super({
      code,
      message: `Validation failed: ${message}`,
      context: {
        ...context,
        fieldErrors: errors,
      },
    });

    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Encode/decode failure
 */
export class CodecError extends SeriesError {
  constructor(
    code: 'SERIATE_D300' | 'SERIATE_D302',
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'CodecError';
  }
}

/**
 * Outcome of an operation that reports failure as a value instead of throwing
 */
export type SeriesResult<T> = { success: true; data: T } | { success: false; error: SeriesError };

/**
 * Run `fn`, capturing any thrown error as a failed SeriesResult
 */
export function attempt<T>(fn: () => T): SeriesResult<T> {
  try {
    return { success: true, data: fn() };
  } catch (error) {
    return { success: false, error: ensureSeriesError(error) };
  }
}

/**
 * Helper function to ensure errors are SeriesErrors
 */
export function ensureSeriesError(
  error: unknown,
  defaultCode: ErrorCode = 'SERIATE_X900'
): SeriesError {
  if (SeriesError.isSeriesError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return SeriesError.wrap(error, defaultCode);
  }

  return new SeriesError({
    code: defaultCode,
    message: String(error),
  });
}
