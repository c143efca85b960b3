/**
 * @seriate/core: ordered time-indexed series with lookup, windowing,
 * joins and resampling.
 *
 * @example
 * ```typescript
 * import { TimeSeries, Duration, aggregate, roundUpToDuration } from '@seriate/core';
 *
 * const series = TimeSeries.fromParallelSequences(timestamps, readings);
 * const smoothed = series.applyRolling(5, (window) => window.reduce((a, b) => a + b) / window.length);
 * const quarterly = series.resampleAndAggregate(
 *   (key) => roundUpToDuration(key, Duration.minutes(15)),
 *   aggregate.mean()
 * );
 * ```
 *
 * @module @seriate/core
 */

// Errors
export * from './errors/index.js';

// Logging
export * from './observability/index.js';

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  configureEngine,
  getEngineConfig,
  getEngineLogger,
  resetEngineConfig,
  type EngineConfig,
  type JoinStrategy,
} from './config.js';

// Keys
export {
  assertStrictlyAscending,
  findOrderViolation,
  lowerBound,
  naturalOrder,
  orderBy,
  reverseOrder,
  upperBound,
  type HashKey,
  type KeyOrder,
  type OrderedKey,
  type TemporalKey,
} from './keys.js';

// Data points and series
export { dataPoint, type DataPoint } from './data-point.js';
export {
  PointSequence,
  TimeSeries,
  type CollectOptions,
  type DuplicatePolicy,
  type ResampleOptions,
} from './time-series.js';

// Windows
export {
  RollingAccumulator,
  RollingBuffer,
  assertPositiveInteger,
  type AccumulatorStep,
  type WindowPhase,
} from './windowing.js';

// Joins
export { joinAll } from './join-all.js';
export {
  withinDistance,
  type AsofMatcher,
  type AsofMode,
  type AsofOptions,
  type Columns,
  type JoinOptions,
} from './joins.js';

// Resampling
export { aggregate, type BucketAggregator } from './resample.js';
export type { SampleRate } from './sampling.js';

// Durations
export {
  Duration,
  keyDistance,
  roundDownToDuration,
  roundToNearestDuration,
  roundUpToDuration,
} from './duration.js';
