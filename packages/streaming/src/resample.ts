/**
 * Bucket resampling over point streams.
 *
 * @module resample
 */

import { Observable, type OperatorFunction } from 'rxjs';
import {
  dataPoint,
  getEngineLogger,
  naturalOrder,
  type BucketAggregator,
  type DataPoint,
  type KeyOrder,
} from '@seriate/core';

/**
 * Group consecutive points sharing a bucket key and emit one aggregated
 * point per group. A group is emitted when the next point falls into
 * another bucket; the last group is emitted on completion.
 *
 * @example
 * ```typescript
 * ticks$.pipe(
 *   resampleStream((key) => roundUpToDuration(key, Duration.minutes(1)), aggregate.last())
 * );
 * ```
 */
export function resampleStream<K, V, K2, R>(
  bucketFn: (key: K) => K2,
  aggFn: BucketAggregator<K, V, R>,
  bucketOrder: KeyOrder<K2> = naturalOrder<K2>()
): OperatorFunction<DataPoint<K, V>, DataPoint<K2, R>> {
  return (source) =>
    new Observable<DataPoint<K2, R>>((subscriber) => {
      let current: { bucket: K2; points: DataPoint<K, V>[] } | undefined;
      let buckets = 0;

      // Aggregate the open group; false once the stream has errored
      const flush = (): boolean => {
        if (!current) return true;
        const group = current;
        current = undefined;
        let value: R;
        try {
          value = aggFn(group.points);
        } catch (err) {
          subscriber.error(err);
          return false;
        }
        buckets++;
        subscriber.next(dataPoint(group.bucket, value));
        return true;
      };

      const subscription = source.subscribe({
        next: (point) => {
          let bucket: K2;
          let changed: boolean;
          try {
            bucket = bucketFn(point.key);
            changed = current !== undefined && bucketOrder.compare(current.bucket, bucket) !== 0;
          } catch (err) {
            subscriber.error(err);
            return;
          }
          if (changed && !flush()) return;
          current ??= { bucket, points: [] };
          current.points.push(point);
        },
        error: (err: unknown) => subscriber.error(err),
        complete: () => {
          if (!flush()) return;
          getEngineLogger('stream').debug('Resample stream completed', { buckets });
          subscriber.complete();
        },
      });

      return () => subscription.unsubscribe();
    });
}
