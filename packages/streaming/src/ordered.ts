/**
 * Key order enforcement on point streams.
 *
 * @module ordered
 */

import { Observable, type OperatorFunction } from 'rxjs';
import {
  DuplicateKeyError,
  UnorderedInputError,
  getEngineLogger,
  naturalOrder,
  type DataPoint,
  type KeyOrder,
} from '@seriate/core';

/**
 * What ensureOrdered does with a point whose key is not greater than the
 * last one it passed:
 * - `error`: fail the stream with UnorderedInputError or DuplicateKeyError
 * - `drop`: skip the point and log a warning
 * - `complete`: complete the stream
 */
export type OrderViolationPolicy = 'error' | 'drop' | 'complete';

export interface EnsureOrderedOptions<K> {
  /** Key order, natural order by default */
  order?: KeyOrder<K>;
  /** Default `'error'` */
  onViolation?: OrderViolationPolicy;
}

/**
 * Pass through points in strictly ascending key order.
 *
 * @example
 * ```typescript
 * ticks$.pipe(ensureOrdered({ onViolation: 'drop' }), rollingWindow(20, mean));
 * ```
 */
export function ensureOrdered<K, V>(
  options: EnsureOrderedOptions<K> = {}
): OperatorFunction<DataPoint<K, V>, DataPoint<K, V>> {
  const order = options.order ?? naturalOrder<K>();
  const policy = options.onViolation ?? 'error';

  return (source) =>
    new Observable<DataPoint<K, V>>((subscriber) => {
      const log = getEngineLogger('stream');
      let last: DataPoint<K, V> | undefined;
      let position = -1;

      const subscription = source.subscribe({
        next: (point) => {
          position++;
          let cmp: number;
          try {
            cmp = last ? order.compare(last.key, point.key) : -1;
          } catch (err) {
            subscriber.error(err);
            return;
          }
          if (cmp < 0) {
            last = point;
            subscriber.next(point);
            return;
          }

          switch (policy) {
            case 'drop':
              log.warn('Dropped out-of-order point', { position, key: point.key });
              return;
            case 'complete':
              subscriber.complete();
              return;
            case 'error':
              subscriber.error(
                cmp > 0
                  ? new UnorderedInputError(position, { key: point.key })
                  : new DuplicateKeyError(position, { key: point.key })
              );
          }
        },
        error: (err: unknown) => subscriber.error(err),
        complete: () => subscriber.complete(),
      });

      return () => subscription.unsubscribe();
    });
}
