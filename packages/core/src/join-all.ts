/**
 * N-ary inner join.
 *
 * @module join-all
 */

import type { JoinOptions } from './joins.js';
import type { TimeSeries } from './time-series.js';

/**
 * Inner-join several series on their common keys, collecting their values
 * into one tuple per key in argument order.
 *
 * Folds pairwise `crossApplyInner` joins from left to right.
 *
 * @example
 * ```typescript
 * const joined = joinAll(open, high, low, close);
 * joined.at(day); // [open, high, low, close]
 * ```
 */
export function joinAll<K, A, B>(
  a: TimeSeries<K, A>,
  b: TimeSeries<K, B>,
  options?: JoinOptions
): TimeSeries<K, [A, B]>;
export function joinAll<K, A, B, C>(
  a: TimeSeries<K, A>,
  b: TimeSeries<K, B>,
  c: TimeSeries<K, C>,
  options?: JoinOptions
): TimeSeries<K, [A, B, C]>;
export function joinAll<K, A, B, C, D>(
  a: TimeSeries<K, A>,
  b: TimeSeries<K, B>,
  c: TimeSeries<K, C>,
  d: TimeSeries<K, D>,
  options?: JoinOptions
): TimeSeries<K, [A, B, C, D]>;
export function joinAll<K, A, B, C, D, E>(
  a: TimeSeries<K, A>,
  b: TimeSeries<K, B>,
  c: TimeSeries<K, C>,
  d: TimeSeries<K, D>,
  e: TimeSeries<K, E>,
  options?: JoinOptions
): TimeSeries<K, [A, B, C, D, E]>;
export function joinAll<K>(
  first: TimeSeries<K, unknown>,
  ...rest: (TimeSeries<K, unknown> | JoinOptions | undefined)[]
): TimeSeries<K, unknown[]>;
export function joinAll<K>(
  first: TimeSeries<K, unknown>,
  ...rest: (TimeSeries<K, unknown> | JoinOptions | undefined)[]
): TimeSeries<K, unknown[]> {
  const others: TimeSeries<K, unknown>[] = [];
  let options: JoinOptions = {};
  for (const arg of rest) {
    if (arg === undefined) continue;
    if (isSeries(arg)) others.push(arg);
    else options = arg;
  }

  let joined = first.map((value): unknown[] => [value]);
  for (const series of others) {
    joined = joined.crossApplyInner(series, (tuple, value) => [...tuple, value], options);
  }
  return joined;
}

function isSeries<K>(
  arg: TimeSeries<K, unknown> | JoinOptions
): arg is TimeSeries<K, unknown> {
  return 'crossApplyInner' in arg;
}
