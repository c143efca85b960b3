/**
 * Rolling windows over point streams. Each subscription keeps its own
 * window state.
 *
 * @module windows
 */

import { Observable, type OperatorFunction } from 'rxjs';
import {
  RollingAccumulator,
  RollingBuffer,
  assertPositiveInteger,
  dataPoint,
  type AccumulatorStep,
  type DataPoint,
} from '@seriate/core';

/**
 * Emit `f` over the last `window` values at every point once the window
 * has filled, keyed by the newest point.
 */
export function rollingWindow<K, V, R>(
  window: number,
  f: (buffer: readonly V[]) => R
): OperatorFunction<DataPoint<K, V>, DataPoint<K, R>> {
  assertPositiveInteger(window, 'window');

  return (source) =>
    new Observable<DataPoint<K, R>>((subscriber) => {
      const buffer = new RollingBuffer<V>(window);

      const subscription = source.subscribe({
        next: (point) => {
          if (buffer.push(point.value) === 'filling') return;
          let result: R;
          try {
            result = f(buffer.toArray());
          } catch (err) {
            subscriber.error(err);
            return;
          }
          subscriber.next(dataPoint(point.key, result));
        },
        error: (err: unknown) => subscriber.error(err),
        complete: () => subscriber.complete(),
      });

      return () => subscription.unsubscribe();
    });
}

/**
 * Running accumulator over the last `window` values; see
 * `TimeSeries.applyUpdatingRolling`. Points where the accumulator is
 * `undefined` are not emitted.
 */
export function updatingRollingWindow<K, V, Acc>(
  window: number,
  add: AccumulatorStep<Acc, V>,
  remove: AccumulatorStep<Acc, V>
): OperatorFunction<DataPoint<K, V>, DataPoint<K, Acc>> {
  assertPositiveInteger(window, 'window');

  return (source) =>
    new Observable<DataPoint<K, Acc>>((subscriber) => {
      const accumulator = new RollingAccumulator<V, Acc>(window, add, remove);

      const subscription = source.subscribe({
        next: (point) => {
          try {
            if (accumulator.push(point.value) === 'filling') return;
          } catch (err) {
            subscriber.error(err);
            return;
          }
          const acc = accumulator.value;
          if (acc !== undefined) {
            subscriber.next(dataPoint(point.key, acc));
          }
        },
        error: (err: unknown) => subscriber.error(err),
        complete: () => subscriber.complete(),
      });

      return () => subscription.unsubscribe();
    });
}
