/**
 * Join algorithms over ordered key/value columns.
 *
 * Every function here assumes both inputs are strictly ascending under the
 * given order; joins do not re-check it (see `validateInputs` in the
 * engine config).
 *
 * @module joins
 */

import { getEngineConfig, getEngineLogger, type JoinStrategy } from './config.js';
import type { DataPoint } from './data-point.js';
import { InvalidArgumentError } from './errors/index.js';
import { keyDistance } from './duration.js';
import type { HashKey, KeyOrder, TemporalKey } from './keys.js';

/** Parallel key and value arrays of one series */
export interface Columns<K, V> {
  keys: K[];
  values: V[];
}

/** Read-only view of a series' columns */
export interface ColumnsView<K, V> {
  readonly keys: readonly K[];
  readonly values: readonly V[];
}

/** Options shared by the inner and left joins */
export interface JoinOptions {
  /** Overrides the configured join strategy */
  strategy?: JoinStrategy;
}

/**
 * Direction of the as-of search:
 * - `roll-prior`: greatest right key less than or equal to the left key
 * - `roll-next`: least right key greater than or equal to the left key
 * - `no-roll`: equal keys only
 */
export type AsofMode = 'roll-prior' | 'roll-next' | 'no-roll';

/**
 * Tolerance predicate of an as-of join. A candidate it rejects counts as
 * no match.
 */
export type AsofMatcher<K> = (leftKey: K, candidateKey: K) => boolean;

export interface AsofOptions<K> {
  mode: AsofMode;
  matcher?: AsofMatcher<K>;
}

/**
 * Matcher accepting candidates at most `tolerance` key units away from the
 * left key, boundary included. Units are milliseconds for Date keys.
 */
export function withinDistance<K extends TemporalKey>(tolerance: number): AsofMatcher<K> {
  if (!(tolerance >= 0)) {
    throw new InvalidArgumentError('Tolerance must be a non-negative number', { tolerance });
  }
  return (leftKey, candidateKey) => Math.abs(keyDistance(leftKey, candidateKey)) <= tolerance;
}

type ResolvedStrategy = Exclude<JoinStrategy, 'auto'>;

const log = () => getEngineLogger('join');

/**
 * Pick merge or hash for a join of `leftLength` and `rightLength` points.
 */
export function resolveJoinStrategy(
  leftLength: number,
  rightLength: number,
  requested?: JoinStrategy
): ResolvedStrategy {
  const config = getEngineConfig();
  const strategy = requested ?? config.joinStrategy;
  if (strategy !== 'auto') return strategy;

  const smaller = Math.min(leftLength, rightLength);
  const larger = Math.max(leftLength, rightLength);
  const resolved: ResolvedStrategy =
    smaller > 0 && larger >= smaller * config.hashJoinRatio ? 'hash' : 'merge';
  log().debug('Join strategy selected', {
    strategy: resolved,
    leftLength,
    rightLength,
    hashJoinRatio: config.hashJoinRatio,
  });
  return resolved;
}

function positionMap<K>(keys: readonly K[], order: KeyOrder<K>): Map<HashKey, number> {
  const map = new Map<HashKey, number>();
  for (let i = 0; i < keys.length; i++) {
    map.set(order.hashKey(keys[i]), i);
  }
  return map;
}

// ─── Inner join ─────────────────────────────────────────────────────────────

/** Keys present in both inputs, with `f(left, right)` as value */
export function innerJoinColumns<K, V1, V2, R>(
  left: ColumnsView<K, V1>,
  right: ColumnsView<K, V2>,
  order: KeyOrder<K>,
  f: (left: V1, right: V2) => R,
  strategy: ResolvedStrategy
): Columns<K, R> {
  return strategy === 'hash'
    ? innerHashJoin(left, right, order, f)
    : innerMergeJoin(left, right, order, f);
}

function innerMergeJoin<K, V1, V2, R>(
  left: ColumnsView<K, V1>,
  right: ColumnsView<K, V2>,
  order: KeyOrder<K>,
  f: (left: V1, right: V2) => R
): Columns<K, R> {
  const out: Columns<K, R> = { keys: [], values: [] };
  let i = 0;
  let j = 0;
  while (i < left.keys.length && j < right.keys.length) {
    const cmp = order.compare(left.keys[i], right.keys[j]);
    if (cmp < 0) {
      i++;
    } else if (cmp > 0) {
      j++;
    } else {
      out.keys.push(left.keys[i]);
      out.values.push(f(left.values[i], right.values[j]));
      i++;
      j++;
    }
  }
  return out;
}

function innerHashJoin<K, V1, V2, R>(
  left: ColumnsView<K, V1>,
  right: ColumnsView<K, V2>,
  order: KeyOrder<K>,
  f: (left: V1, right: V2) => R
): Columns<K, R> {
  const out: Columns<K, R> = { keys: [], values: [] };

  if (left.keys.length <= right.keys.length) {
    const index = positionMap(left.keys, order);
    for (let j = 0; j < right.keys.length; j++) {
      const i = index.get(order.hashKey(right.keys[j]));
      if (i === undefined) continue;
      out.keys.push(left.keys[i]);
      out.values.push(f(left.values[i], right.values[j]));
    }
  } else {
    const index = positionMap(right.keys, order);
    for (let i = 0; i < left.keys.length; i++) {
      const j = index.get(order.hashKey(left.keys[i]));
      if (j === undefined) continue;
      out.keys.push(left.keys[i]);
      out.values.push(f(left.values[i], right.values[j]));
    }
  }
  return out;
}

// ─── Left join ──────────────────────────────────────────────────────────────

/** Every left key, with `f(left, right | undefined)` as value */
export function leftJoinColumns<K, V1, V2, R>(
  left: ColumnsView<K, V1>,
  right: ColumnsView<K, V2>,
  order: KeyOrder<K>,
  f: (left: V1, right: V2 | undefined) => R,
  strategy: ResolvedStrategy
): Columns<K, R> {
  const out: Columns<K, R> = { keys: left.keys.slice(), values: [] };

  if (strategy === 'hash') {
    const index = positionMap(right.keys, order);
    for (let i = 0; i < left.keys.length; i++) {
      const j = index.get(order.hashKey(left.keys[i]));
      out.values.push(f(left.values[i], j === undefined ? undefined : right.values[j]));
    }
    return out;
  }

  let j = 0;
  for (let i = 0; i < left.keys.length; i++) {
    while (j < right.keys.length && order.compare(right.keys[j], left.keys[i]) < 0) {
      j++;
    }
    const matched = j < right.keys.length && order.compare(right.keys[j], left.keys[i]) === 0;
    out.values.push(f(left.values[i], matched ? right.values[j] : undefined));
  }
  return out;
}

// ─── As-of join ─────────────────────────────────────────────────────────────

/**
 * Every left key, with `f(left, right | undefined)` where `right` is the
 * value at the candidate key chosen by `mode` and accepted by `matcher`.
 */
export function asofJoinColumns<K, V1, V2, R>(
  left: ColumnsView<K, V1>,
  right: ColumnsView<K, V2>,
  order: KeyOrder<K>,
  f: (left: V1, right: V2 | undefined) => R,
  options: AsofOptions<K>
): Columns<K, R> {
  const { mode, matcher } = options;
  if (mode === 'no-roll' && matcher) {
    throw new InvalidArgumentError(
      "A tolerance matcher cannot be combined with 'no-roll'",
      { mode },
      'SERIATE_A201'
    );
  }

  const out: Columns<K, R> = { keys: left.keys.slice(), values: [] };
  const m = right.keys.length;
  // Number of right keys strictly below (roll-next, no-roll) or not above
  // (roll-prior) the current left key. Only ever moves forward.
  let cursor = 0;

  for (let i = 0; i < left.keys.length; i++) {
    const key = left.keys[i];
    let candidate = -1;

    if (mode === 'roll-prior') {
      while (cursor < m && order.compare(right.keys[cursor], key) <= 0) cursor++;
      candidate = cursor - 1;
    } else {
      while (cursor < m && order.compare(right.keys[cursor], key) < 0) cursor++;
      if (cursor < m && (mode === 'roll-next' || order.compare(right.keys[cursor], key) === 0)) {
        candidate = cursor;
      }
    }

    const accepted = candidate >= 0 && (!matcher || matcher(key, right.keys[candidate]));
    out.values.push(f(left.values[i], accepted ? right.values[candidate] : undefined));
  }
  return out;
}

// ─── Interweave ─────────────────────────────────────────────────────────────

/**
 * Ordered union of two series. Where both hold a key, `pick` chooses the
 * point to keep.
 */
export function interweaveColumns<K, V>(
  left: ColumnsView<K, V>,
  right: ColumnsView<K, V>,
  order: KeyOrder<K>,
  pick: (left: DataPoint<K, V>, right: DataPoint<K, V>) => DataPoint<K, V>
): Columns<K, V> {
  const out: Columns<K, V> = { keys: [], values: [] };
  let i = 0;
  let j = 0;
  while (i < left.keys.length || j < right.keys.length) {
    const cmp =
      i >= left.keys.length
        ? 1
        : j >= right.keys.length
          ? -1
          : order.compare(left.keys[i], right.keys[j]);
    if (cmp < 0) {
      out.keys.push(left.keys[i]);
      out.values.push(left.values[i]);
      i++;
    } else if (cmp > 0) {
      out.keys.push(right.keys[j]);
      out.values.push(right.values[j]);
      j++;
    } else {
      const chosen = pick(
        { key: left.keys[i], value: left.values[i] },
        { key: right.keys[j], value: right.values[j] }
      );
      out.keys.push(chosen.key);
      out.values.push(chosen.value);
      i++;
      j++;
    }
  }
  return out;
}
