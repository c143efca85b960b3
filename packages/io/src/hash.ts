/**
 * Content hashing for cheap series comparison.
 *
 * Uses a portable djb2-style hash over the serialized points. The digest
 * is not cryptographic; it only rules out equality quickly.
 *
 * @module hash
 */

import type { DataPoint, TimeSeries } from '@seriate/core';

/** Serialization of one point fed to the hash */
export type PointSerializer<K, V> = (point: DataPoint<K, V>) => string;

function defaultSerializer<K, V>(point: DataPoint<K, V>): string {
  return JSON.stringify([point.key, point.value], (_key, value: unknown) =>
    typeof value === 'bigint' ? `${value}n` : value
  );
}

/**
 * 128-bit hex digest built from four 32-bit multiplicative hash lanes.
 */
export function digest128(data: string): string {
  let h1 = 0x811c9dc5;
  let h2 = 0x01000193;

  for (let i = 0; i < data.length; i++) {
    const ch = data.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 0x01000193);
    h2 = Math.imul(h2 ^ ch, 0x811c9dc5);
  }

  let h3 = h1 ^ 0xdeadbeef;
  let h4 = h2 ^ 0xcafebabe;
  for (let i = 0; i < data.length; i++) {
    const ch = data.charCodeAt(i);
    h3 = Math.imul(h3 ^ ch, 0x5bd1e995);
    h4 = Math.imul(h4 ^ ch, 0x1b873593);
  }

  return [h1, h2, h3, h4].map((h) => (h >>> 0).toString(16).padStart(8, '0')).join('');
}

/**
 * Stable digest of a series' points in order.
 *
 * Points serialize as the JSON array `[key, value]` by default, with
 * bigints written as `"<digits>n"`; pass `serialize` for values JSON
 * cannot represent faithfully.
 */
export function contentHash<K, V>(
  series: TimeSeries<K, V>,
  serialize: PointSerializer<K, V> = defaultSerializer
): string {
  const lines: string[] = [];
  for (const point of series) {
    lines.push(serialize(point));
  }
  return digest128(`${series.length}\n${lines.join('\n')}`);
}

/**
 * Structural equality: primitives by `Object.is`, dates by instant,
 * arrays element-wise, other objects by their own enumerable entries.
 */
export function structuralEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && Object.is(a.getTime(), b.getTime());
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item: unknown, index) => structuralEqual(item, b[index]));
  }

  const aEntries = Object.entries(a);
  const bEntries = new Map(Object.entries(b));
  if (aEntries.length !== bEntries.size) return false;
  return aEntries.every(([key, value]) => bEntries.has(key) && structuralEqual(value, bEntries.get(key)));
}

/**
 * Equality with a hash precompare: different digests mean different
 * series, equal digests fall back to `TimeSeries.equals` with
 * `valueEquals` (structural by default), so a collision never reports
 * equality.
 *
 * @example
 * ```typescript
 * seriesEqual(decoded, original, undefined, (a, b) => a.bid === b.bid);
 * ```
 */
export function seriesEqual<K, V>(
  a: TimeSeries<K, V>,
  b: TimeSeries<K, V>,
  serialize?: PointSerializer<K, V>,
  valueEquals: (left: V, right: V) => boolean = structuralEqual
): boolean {
  if (a.length !== b.length) return false;
  if (contentHash(a, serialize) !== contentHash(b, serialize)) return false;
  return a.equals(b, valueEquals);
}
