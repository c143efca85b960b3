/**
 * Seriate Error System
 *
 * Every error thrown by the seriate packages is a SeriesError carrying a
 * registry code (SERIATE_C101, SERIATE_D300, ...), a suggestion, a category
 * and context.
 *
 * @example
 * ```typescript
 * import { SeriesError, TimeSeries } from '@seriate/core';
 *
 * try {
 *   TimeSeries.fromParallelSequences([1, 2, 3], [10, 20]);
 * } catch (error) {
 *   if (SeriesError.isCode(error, 'SERIATE_C100')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CodecError,
  DuplicateKeyError,
  InvalidArgumentError,
  LengthMismatchError,
  SeriesError,
  UnorderedInputError,
  ValidationError,
  attempt,
  ensureSeriesError,
  type FieldValidationError,
  type SeriesErrorOptions,
  type SeriesResult,
  type SerializedSeriesError,
} from './series-error.js';
