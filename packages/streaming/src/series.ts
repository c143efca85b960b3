/**
 * Conversions between series and point streams.
 *
 * @module series
 */

import { from, map, pipe, toArray, type Observable, type OperatorFunction } from 'rxjs';
import { TimeSeries, type CollectOptions, type DataPoint } from '@seriate/core';

/** Emit the points of a series in key order, then complete */
export function fromSeries<K, V>(series: TimeSeries<K, V>): Observable<DataPoint<K, V>> {
  return from(series);
}

/**
 * Collect a finite stream into a series through
 * `TimeSeries.collectChecked`, emitting it on completion.
 */
export function collectSeries<K, V>(
  options?: CollectOptions<K>
): OperatorFunction<DataPoint<K, V>, TimeSeries<K, V>> {
  return pipe(
    toArray(),
    map((points) => TimeSeries.collectChecked(points, options))
  );
}
