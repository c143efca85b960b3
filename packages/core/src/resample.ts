/**
 * Time-bucket resampling.
 *
 * @module resample
 */

import { getEngineLogger } from './config.js';
import { dataPoint, type DataPoint } from './data-point.js';
import type { Columns, ColumnsView } from './joins.js';
import type { KeyOrder } from './keys.js';

/** Aggregation of one bucket's points */
export type BucketAggregator<K, V, R> = (group: readonly DataPoint<K, V>[]) => R;

/**
 * Group consecutive points whose bucket keys compare equal and aggregate
 * each group into one point keyed by its bucket key.
 *
 * Grouping follows adjacency only: a bucket function that is not monotonic
 * in the key produces one group per run, so a bucket key can repeat.
 */
export function resampleColumns<K, V, K2, R>(
  series: ColumnsView<K, V>,
  bucketFn: (key: K) => K2,
  aggFn: BucketAggregator<K, V, R>,
  bucketOrder: KeyOrder<K2>
): Columns<K2, R> {
  const out: Columns<K2, R> = { keys: [], values: [] };
  let current: { bucket: K2; points: DataPoint<K, V>[] } | undefined;

  for (let i = 0; i < series.keys.length; i++) {
    const key = series.keys[i];
    const bucket = bucketFn(key);
    if (current && bucketOrder.compare(current.bucket, bucket) !== 0) {
      out.keys.push(current.bucket);
      out.values.push(aggFn(current.points));
      current = undefined;
    }
    current ??= { bucket, points: [] };
    current.points.push(dataPoint(key, series.values[i]));
  }

  if (current) {
    out.keys.push(current.bucket);
    out.values.push(aggFn(current.points));
  }

  getEngineLogger('resample').debug('Resampled series', {
    inputPoints: series.keys.length,
    buckets: out.keys.length,
  });
  return out;
}

// ─── Aggregations ───────────────────────────────────────────────────────────

type Selector<V> = (value: V) => number;

function numbers<K, V>(group: readonly DataPoint<K, V>[], select: Selector<V>): number[] {
  return group.map((p) => select(p.value));
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Ready-made bucket aggregations over numeric values.
 *
 * Each takes an optional selector for series whose values are not numbers.
 *
 * @example
 * ```typescript
 * series.resampleAndAggregate((k) => roundUpToDuration(k, Duration.minutes(15)), aggregate.mean());
 * trades.resampleAndAggregate(bucket, aggregate.sum((t) => t.volume));
 * ```
 */
export const aggregate = {
  first:
    <K, V>(): BucketAggregator<K, V, V> =>
    (group) =>
      group[0].value,
  last:
    <K, V>(): BucketAggregator<K, V, V> =>
    (group) =>
      group[group.length - 1].value,
  count:
    <K, V>(): BucketAggregator<K, V, number> =>
    (group) =>
      group.length,
  sum:
    <K, V = number>(select?: Selector<V>): BucketAggregator<K, V, number> =>
    (group) =>
      sum(numbers(group, select ?? toNumber)),
  mean:
    <K, V = number>(select?: Selector<V>): BucketAggregator<K, V, number> =>
    (group) =>
      sum(numbers(group, select ?? toNumber)) / group.length,
  min:
    <K, V = number>(select?: Selector<V>): BucketAggregator<K, V, number> =>
    (group) =>
      numbers(group, select ?? toNumber).reduce((a, b) => (b < a ? b : a), Infinity),
  max:
    <K, V = number>(select?: Selector<V>): BucketAggregator<K, V, number> =>
    (group) =>
      numbers(group, select ?? toNumber).reduce((a, b) => (b > a ? b : a), -Infinity),
} as const;

function toNumber(value: unknown): number {
  return typeof value === 'number' ? value : Number(value);
}
