/**
 * Key ordering for series keys.
 *
 * @module keys
 */

import { InvalidArgumentError, UnorderedInputError, DuplicateKeyError } from './errors/index.js';

/** Keys with a built-in natural order */
export type OrderedKey = number | bigint | string | Date;

/** Keys with a numeric distance between them */
export type TemporalKey = number | bigint | Date;

/** Value a key is projected to when used as a Map key */
export type HashKey = string | number | bigint;

/**
 * Total order over a key type.
 *
 * `hashKey` must return equal projections for keys that compare equal;
 * hash joins rely on it.
 */
export interface KeyOrder<K> {
  compare(a: K, b: K): number;
  hashKey(key: K): HashKey;
}

function toComparable(key: unknown): HashKey {
  if (typeof key === 'number' || typeof key === 'bigint' || typeof key === 'string') {
    return key;
  }
  if (key instanceof Date) {
    return key.getTime();
  }
  throw new InvalidArgumentError(
    `Keys of type ${key === null ? 'null' : typeof key} have no natural order`,
    { keyType: key === null ? 'null' : typeof key },
    'SERIATE_A202'
  );
}

function compareComparable(a: HashKey, b: HashKey): number {
  if (typeof a === 'string' || typeof b === 'string') {
    if (typeof a !== 'string' || typeof b !== 'string') {
      throw new InvalidArgumentError(
        `Cannot compare a ${typeof a} key with a ${typeof b} key`,
        { left: typeof a, right: typeof b },
        'SERIATE_A202'
      );
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

const MIN_SAFE_BIGINT = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * One projection per numeric value: safe-range bigints become numbers and
 * integral numbers beyond the safe range become bigints, so `1` and `1n`,
 * or `2 ** 60` and `2n ** 60n`, share a Map key. `-0` hashes as `0`.
 */
function canonicalHashKey(value: HashKey): HashKey {
  if (typeof value === 'bigint') {
    return value >= MIN_SAFE_BIGINT && value <= MAX_SAFE_BIGINT ? Number(value) : value;
  }
  if (typeof value === 'number') {
    if (value === 0) return 0;
    if (Number.isInteger(value) && !Number.isSafeInteger(value)) return BigInt(value);
  }
  return value;
}

function toHashKey(key: unknown): HashKey {
  return canonicalHashKey(toComparable(key));
}

const NATURAL_ORDER: KeyOrder<unknown> = {
  compare: (a, b) => compareComparable(toComparable(a), toComparable(b)),
  hashKey: toHashKey,
};

/**
 * Natural order of number, bigint, string and Date keys.
 *
 * Numbers, bigints and dates (by `getTime()`) compare numerically with
 * each other; strings compare by UTF-16 code unit with strings only. Any
 * other key, or a string against a non-string, throws SERIATE_A202 when
 * compared.
 */
export function naturalOrder<K>(): KeyOrder<K> {
  return NATURAL_ORDER;
}

/**
 * Order keys by a projection onto a naturally ordered value.
 *
 * @example
 * ```typescript
 * const byTick = orderBy((key: { tick: number }) => key.tick);
 * ```
 */
export function orderBy<K>(project: (key: K) => number | bigint | string | Date): KeyOrder<K> {
  return {
    compare: (a, b) => compareComparable(toComparable(project(a)), toComparable(project(b))),
    hashKey: (key) => toHashKey(project(key)),
  };
}

/** Reverse of an order, for series kept in descending key order */
export function reverseOrder<K>(order: KeyOrder<K>): KeyOrder<K> {
  return {
    compare: (a, b) => order.compare(b, a),
    hashKey: (key) => order.hashKey(key),
  };
}

// ─── Binary search ──────────────────────────────────────────────────────────

/** First position whose key is not less than `key` */
export function lowerBound<K>(keys: readonly K[], key: K, order: KeyOrder<K>): number {
  let lo = 0;
  let hi = keys.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (order.compare(keys[mid], key) < 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First position whose key is greater than `key` */
export function upperBound<K>(keys: readonly K[], key: K, order: KeyOrder<K>): number {
  let lo = 0;
  let hi = keys.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (order.compare(keys[mid], key) <= 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

// ─── Order checks ───────────────────────────────────────────────────────────

/**
 * Position of the first key that breaks strict ascending order, with the
 * kind of break, or `undefined` for an ordered sequence.
 */
export function findOrderViolation<K>(
  keys: readonly K[],
  order: KeyOrder<K>
): { position: number; kind: 'unordered' | 'duplicate' } | undefined {
  for (let i = 1; i < keys.length; i++) {
    const cmp = order.compare(keys[i - 1], keys[i]);
    if (cmp > 0) return { position: i, kind: 'unordered' };
    if (cmp === 0) return { position: i, kind: 'duplicate' };
  }
  return undefined;
}

/** Throw UnorderedInputError/DuplicateKeyError at the first violation */
export function assertStrictlyAscending<K>(
  keys: readonly K[],
  order: KeyOrder<K>,
  context?: Record<string, unknown>
): void {
  const violation = findOrderViolation(keys, order);
  if (!violation) return;
  const detail = { ...context, key: keys[violation.position] };
  if (violation.kind === 'unordered') {
    throw new UnorderedInputError(violation.position, detail);
  }
  throw new DuplicateKeyError(violation.position, detail);
}
