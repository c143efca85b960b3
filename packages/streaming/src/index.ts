/**
 * @seriate/streaming: rxjs operators that bring seriate's ordering,
 * windows and resampling to point streams.
 *
 * @example
 * ```typescript
 * import { Duration, aggregate, roundUpToDuration } from '@seriate/core';
 * import { collectSeries, ensureOrdered, resampleStream } from '@seriate/streaming';
 *
 * const minuteBars$ = ticks$.pipe(
 *   ensureOrdered({ onViolation: 'drop' }),
 *   resampleStream((key: number) => roundUpToDuration(key, Duration.minutes(1)), aggregate.last()),
 *   collectSeries()
 * );
 * ```
 *
 * @module @seriate/streaming
 */

export { decodeLines, type LineParser } from './lines.js';
export { ensureOrdered, type EnsureOrderedOptions, type OrderViolationPolicy } from './ordered.js';
export { resampleStream } from './resample.js';
export { collectSeries, fromSeries } from './series.js';
export { rollingWindow, updatingRollingWindow } from './windows.js';
