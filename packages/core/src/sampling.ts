/**
 * Sampling-interval statistics of a key column.
 */

/** How often one interval occurs between consecutive keys */
export interface SampleRate {
  interval: number;
  count: number;
}

/**
 * Histogram of the distances between consecutive keys, most frequent
 * first. Ties put the larger interval first.
 */
export function sampleRatesOf<K>(
  keys: readonly K[],
  distance: (from: K, to: K) => number
): SampleRate[] {
  const counts = new Map<number, number>();
  for (let i = 1; i < keys.length; i++) {
    const interval = distance(keys[i - 1], keys[i]);
    counts.set(interval, (counts.get(interval) ?? 0) + 1);
  }
  return Array.from(counts, ([interval, count]) => ({ interval, count })).sort(
    (a, b) => b.count - a.count || b.interval - a.interval
  );
}
