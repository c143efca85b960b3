/**
 * A single (key, value) pair of a series.
 */
export interface DataPoint<K, V> {
  readonly key: K;
  readonly value: V;
}

/** Create a DataPoint */
export function dataPoint<K, V>(key: K, value: V): DataPoint<K, V> {
  return { key, value };
}
