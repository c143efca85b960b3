/**
 * Ordered, immutable time-indexed series and its lazy point sequences.
 *
 * @module time-series
 */

import { getEngineConfig, getEngineLogger } from './config.js';
import { dataPoint, type DataPoint } from './data-point.js';
import { keyDistance } from './duration.js';
import {
  DuplicateKeyError,
  InvalidArgumentError,
  LengthMismatchError,
  UnorderedInputError,
  attempt,
  type SeriesResult,
} from './errors/index.js';
import {
  asofJoinColumns,
  innerJoinColumns,
  interweaveColumns,
  leftJoinColumns,
  resolveJoinStrategy,
  type AsofOptions,
  type Columns,
  type ColumnsView,
  type JoinOptions,
} from './joins.js';
import {
  assertStrictlyAscending,
  findOrderViolation,
  lowerBound,
  naturalOrder,
  upperBound,
  type KeyOrder,
  type TemporalKey,
} from './keys.js';
import { resampleColumns, type BucketAggregator } from './resample.js';
import { sampleRatesOf, type SampleRate } from './sampling.js';
import {
  rollingColumns,
  shiftColumns,
  skipApplyColumns,
  updatingRollingColumns,
  type AccumulatorStep,
} from './windowing.js';

/** What collectChecked does with repeated keys */
export type DuplicatePolicy = 'reject' | 'keep-first' | 'keep-last';

export interface CollectOptions<K> {
  /** Key order, natural order by default */
  order?: KeyOrder<K>;
  /** Default `'reject'`, which throws DuplicateKeyError */
  onDuplicate?: DuplicatePolicy;
}

export interface ResampleOptions<K2> {
  /** Order of the bucket keys, natural order by default */
  order?: KeyOrder<K2>;
}

function isTemporal(key: unknown): key is TemporalKey {
  return typeof key === 'number' || typeof key === 'bigint' || key instanceof Date;
}

function temporalDistance(from: unknown, to: unknown): number {
  if (isTemporal(from) && isTemporal(to)) {
    return keyDistance(from, to);
  }
  throw new InvalidArgumentError(
    'Sample rates need number, bigint or Date keys, or an explicit distance function',
    { keyType: typeof from },
    'SERIATE_A202'
  );
}

function formatPart(part: unknown): string {
  if (part instanceof Date) return part.toISOString();
  if (typeof part === 'object' && part !== null) {
    return JSON.stringify(part, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    );
  }
  return String(part);
}

/**
 * An ordered sequence of (key, value) points.
 *
 * Keys are strictly ascending under the series' `KeyOrder` whenever the
 * series was built through a checked path (`fromPoints`,
 * `fromValidatedSequences`, `collectChecked`). Unchecked paths trust the
 * caller; an unordered series gives unspecified results from lookups,
 * windows and joins.
 *
 * A series never changes after construction. Constructors copy their
 * inputs and every transform returns a new series or a lazy
 * `PointSequence`, so inputs stay usable after any operation.
 *
 * Keys and values themselves are held by reference. Mutating a `Date`
 * after using it as a key (`setTime`, `setMinutes`) changes the key inside
 * every series holding it and can break the ascending order checked at
 * construction; pass fresh `Date`s or `getTime()` numbers instead.
 *
 * @example
 * ```typescript
 * const prices = TimeSeries.fromPoints([
 *   dataPoint(new Date('2024-01-01T00:00:00Z'), 101.5),
 *   dataPoint(new Date('2024-01-01T00:01:00Z'), 101.9),
 * ]);
 *
 * const returns = prices.skipApply(1, (prior, current) => current / prior - 1).collect();
 * ```
 */
export class TimeSeries<K, V> implements Iterable<DataPoint<K, V>> {
  private constructor(
    private readonly keyColumn: readonly K[],
    private readonly valueColumn: readonly V[],
    /** Order the keys are sorted by */
    readonly order: KeyOrder<K>
  ) {}

  private static of<K, V>(columns: Columns<K, V>, order: KeyOrder<K>): TimeSeries<K, V> {
    return new TimeSeries(columns.keys, columns.values, order);
  }

  /* ------------------------------------------------------------------ */
  /*  Construction                                                       */
  /* ------------------------------------------------------------------ */

  /** Series with no points */
  static empty<K, V>(order: KeyOrder<K> = naturalOrder<K>()): TimeSeries<K, V> {
    return new TimeSeries<K, V>([], [], order);
  }

  /**
   * Pair keys with values position by position.
   *
   * Only the lengths are checked; use `fromValidatedSequences` to also
   * check the key order.
   *
   * @throws LengthMismatchError when the sequences differ in length
   */
  static fromParallelSequences<K, V>(
    keys: readonly K[],
    values: readonly V[],
    order: KeyOrder<K> = naturalOrder<K>()
  ): TimeSeries<K, V> {
    if (keys.length !== values.length) {
      throw new LengthMismatchError(keys.length, values.length);
    }
    return new TimeSeries(keys.slice(), values.slice(), order);
  }

  /**
   * Pair keys with values and check that the keys are strictly ascending.
   *
   * @throws LengthMismatchError, UnorderedInputError or DuplicateKeyError
   */
  static fromValidatedSequences<K, V>(
    keys: readonly K[],
    values: readonly V[],
    order: KeyOrder<K> = naturalOrder<K>()
  ): TimeSeries<K, V> {
    const series = TimeSeries.fromParallelSequences(keys, values, order);
    assertStrictlyAscending(series.keyColumn, order);
    return series;
  }

  /**
   * Build a series from points already in strictly ascending key order.
   *
   * @throws UnorderedInputError or DuplicateKeyError at the first violation
   */
  static fromPoints<K, V>(
    points: Iterable<DataPoint<K, V>>,
    order: KeyOrder<K> = naturalOrder<K>()
  ): TimeSeries<K, V> {
    const keys: K[] = [];
    const values: V[] = [];
    for (const point of points) {
      if (keys.length > 0) {
        const cmp = order.compare(keys[keys.length - 1], point.key);
        if (cmp > 0) throw new UnorderedInputError(keys.length, { key: point.key });
        if (cmp === 0) throw new DuplicateKeyError(keys.length, { key: point.key });
      }
      keys.push(point.key);
      values.push(point.value);
    }
    return new TimeSeries(keys, values, order);
  }

  /** Build a series from points the caller guarantees to be ordered and unique */
  static fromPointsUnchecked<K, V>(
    points: Iterable<DataPoint<K, V>>,
    order: KeyOrder<K> = naturalOrder<K>()
  ): TimeSeries<K, V> {
    return TimeSeries.collectUnchecked(points, order);
  }

  /**
   * Materialize points in any order: sorts them (stably) when they are not
   * already ascending, then applies the duplicate policy.
   *
   * @throws DuplicateKeyError for repeated keys under the default policy
   */
  static collectChecked<K, V>(
    points: Iterable<DataPoint<K, V>>,
    options: CollectOptions<K> = {}
  ): TimeSeries<K, V> {
    const order = options.order ?? naturalOrder<K>();
    const policy = options.onDuplicate ?? 'reject';
    let input = Array.from(points);

    for (let i = 1; i < input.length; i++) {
      if (order.compare(input[i - 1].key, input[i].key) > 0) {
        input = input.slice().sort((a, b) => order.compare(a.key, b.key));
        getEngineLogger('collect').debug('Sorted unordered input', { points: input.length });
        break;
      }
    }

    const keys: K[] = [];
    const values: V[] = [];
    for (let i = 0; i < input.length; i++) {
      const { key, value } = input[i];
      if (keys.length > 0 && order.compare(keys[keys.length - 1], key) === 0) {
        if (policy === 'reject') throw new DuplicateKeyError(i, { key });
        if (policy === 'keep-last') values[values.length - 1] = value;
        continue;
      }
      keys.push(key);
      values.push(value);
    }
    return new TimeSeries(keys, values, order);
  }

  /** Materialize points without sorting or validation */
  static collectUnchecked<K, V>(
    points: Iterable<DataPoint<K, V>>,
    order: KeyOrder<K> = naturalOrder<K>()
  ): TimeSeries<K, V> {
    const keys: K[] = [];
    const values: V[] = [];
    for (const point of points) {
      keys.push(point.key);
      values.push(point.value);
    }
    return new TimeSeries(keys, values, order);
  }

  /** `fromParallelSequences` returning the error as a value */
  static safeFromParallelSequences<K, V>(
    keys: readonly K[],
    values: readonly V[],
    order?: KeyOrder<K>
  ): SeriesResult<TimeSeries<K, V>> {
    return attempt(() => TimeSeries.fromParallelSequences(keys, values, order));
  }

  /** `fromPoints` returning the error as a value */
  static safeFromPoints<K, V>(
    points: Iterable<DataPoint<K, V>>,
    order?: KeyOrder<K>
  ): SeriesResult<TimeSeries<K, V>> {
    return attempt(() => TimeSeries.fromPoints(points, order));
  }

  /** `collectChecked` returning the error as a value */
  static safeCollect<K, V>(
    points: Iterable<DataPoint<K, V>>,
    options?: CollectOptions<K>
  ): SeriesResult<TimeSeries<K, V>> {
    return attempt(() => TimeSeries.collectChecked(points, options));
  }

  /* ------------------------------------------------------------------ */
  /*  Access                                                             */
  /* ------------------------------------------------------------------ */

  get length(): number {
    return this.keyColumn.length;
  }

  isEmpty(): boolean {
    return this.keyColumn.length === 0;
  }

  get keys(): readonly K[] {
    return this.keyColumn;
  }

  get values(): readonly V[] {
    return this.valueColumn;
  }

  /** Position of `key`, or -1 */
  indexOf(key: K): number {
    const pos = lowerBound(this.keyColumn, key, this.order);
    return pos < this.keyColumn.length && this.order.compare(this.keyColumn[pos], key) === 0
      ? pos
      : -1;
  }

  has(key: K): boolean {
    return this.indexOf(key) >= 0;
  }

  /** Value at exactly `key` */
  at(key: K): V | undefined {
    const pos = this.indexOf(key);
    return pos < 0 ? undefined : this.valueColumn[pos];
  }

  /** Value at the greatest key less than or equal to `key` */
  atOrFirstPrior(key: K): V | undefined {
    const pos = upperBound(this.keyColumn, key, this.order) - 1;
    return pos < 0 ? undefined : this.valueColumn[pos];
  }

  /** Point at position `pos` */
  atIndex(pos: number): DataPoint<K, V> | undefined {
    if (!Number.isInteger(pos) || pos < 0 || pos >= this.keyColumn.length) return undefined;
    return dataPoint(this.keyColumn[pos], this.valueColumn[pos]);
  }

  first(): DataPoint<K, V> | undefined {
    return this.atIndex(0);
  }

  last(): DataPoint<K, V> | undefined {
    return this.atIndex(this.keyColumn.length - 1);
  }

  /** Points with `start <= key <= end` */
  between(start: K, end: K): TimeSeries<K, V> {
    const lo = lowerBound(this.keyColumn, start, this.order);
    const hi = Math.max(lo, upperBound(this.keyColumn, end, this.order));
    return new TimeSeries(
      this.keyColumn.slice(lo, hi),
      this.valueColumn.slice(lo, hi),
      this.order
    );
  }

  *[Symbol.iterator](): IterableIterator<DataPoint<K, V>> {
    for (let i = 0; i < this.keyColumn.length; i++) {
      yield dataPoint(this.keyColumn[i], this.valueColumn[i]);
    }
  }

  /** Lazy sequence over the points */
  points(): PointSequence<K, V> {
    return new PointSequence(this[Symbol.iterator](), this.order);
  }

  toArray(): DataPoint<K, V>[] {
    return Array.from(this);
  }

  /** Copies of the key and value columns */
  toColumns(): Columns<K, V> {
    return { keys: this.keyColumn.slice(), values: this.valueColumn.slice() };
  }

  /** Whether the keys are strictly ascending */
  isOrdered(): boolean {
    return findOrderViolation(this.keyColumn, this.order) === undefined;
  }

  /**
   * Same keys (by the key order) and values. Values compare with
   * `Object.is` unless `valueEquals` is given.
   */
  equals<V2>(
    other: TimeSeries<K, V2>,
    valueEquals: (a: V, b: V2) => boolean = Object.is
  ): boolean {
    if (this.length !== other.length) return false;
    for (let i = 0; i < this.keyColumn.length; i++) {
      if (this.order.compare(this.keyColumn[i], other.keyColumn[i]) !== 0) return false;
      if (!valueEquals(this.valueColumn[i], other.valueColumn[i])) return false;
    }
    return true;
  }

  /** One `(key, value)` line per point; long series show only both ends */
  toString(): string {
    const line = (i: number) =>
      `(${formatPart(this.keyColumn[i])}, ${formatPart(this.valueColumn[i])})`;
    const n = this.keyColumn.length;
    const lines: string[] = [];
    if (n < 10) {
      for (let i = 0; i < n; i++) lines.push(line(i));
    } else {
      for (let i = 0; i < 5; i++) lines.push(line(i));
      lines.push('...');
      for (let i = n - 5; i < n; i++) lines.push(line(i));
    }
    return lines.join('\n');
  }

  /* ------------------------------------------------------------------ */
  /*  Element-wise transforms                                            */
  /* ------------------------------------------------------------------ */

  /** Apply `f` to every value, keeping the keys */
  map<R>(f: (value: V, key: K) => R): TimeSeries<K, R> {
    const values = this.valueColumn.map((value, i) => f(value, this.keyColumn[i]));
    return new TimeSeries(this.keyColumn.slice(), values, this.order);
  }

  filter(predicate: (value: V, key: K) => boolean): TimeSeries<K, V> {
    const out: Columns<K, V> = { keys: [], values: [] };
    for (let i = 0; i < this.keyColumn.length; i++) {
      if (predicate(this.valueColumn[i], this.keyColumn[i])) {
        out.keys.push(this.keyColumn[i]);
        out.values.push(this.valueColumn[i]);
      }
    }
    return TimeSeries.of(out, this.order);
  }

  /* ------------------------------------------------------------------ */
  /*  Windows                                                            */
  /* ------------------------------------------------------------------ */

  /**
   * Keep keys in place and move values by `offset` positions: a positive
   * offset takes later values (lead), a negative one earlier values (lag).
   * The result is `|offset|` points shorter.
   */
  shift(offset: number): PointSequence<K, V> {
    this.checkInputs('shift');
    return new PointSequence(shiftColumns(this.keyColumn, this.valueColumn, offset), this.order);
  }

  /** `(key[i], f(value[i - span], value[i]))` for every `i >= span` */
  skipApply<R>(span: number, f: (prior: V, current: V) => R): PointSequence<K, R> {
    this.checkInputs('skipApply');
    return new PointSequence(
      skipApplyColumns(this.keyColumn, this.valueColumn, span, f),
      this.order
    );
  }

  /**
   * `f` over the last `window` values at every position once the window
   * has filled. Costs O(window) per step.
   */
  applyRolling<R>(window: number, f: (buffer: readonly V[]) => R): PointSequence<K, R> {
    this.checkInputs('applyRolling');
    return new PointSequence(
      rollingColumns(this.keyColumn, this.valueColumn, window, f),
      this.order
    );
  }

  /**
   * Running accumulator over the last `window` values: `add` folds each
   * incoming value in and, once the window is full, `remove` folds the
   * leaving value out. O(1) per step; `add` and `remove` must be inverses.
   *
   * @example
   * ```typescript
   * const rollingSum = series.applyUpdatingRolling(
   *   3,
   *   (acc, x) => (acc ?? 0) + x,
   *   (acc, x) => (acc ?? 0) - x
   * );
   * ```
   */
  applyUpdatingRolling<Acc>(
    window: number,
    add: AccumulatorStep<Acc, V>,
    remove: AccumulatorStep<Acc, V>
  ): PointSequence<K, Acc> {
    this.checkInputs('applyUpdatingRolling');
    return new PointSequence(
      updatingRollingColumns(this.keyColumn, this.valueColumn, window, add, remove),
      this.order
    );
  }

  /* ------------------------------------------------------------------ */
  /*  Joins                                                              */
  /* ------------------------------------------------------------------ */

  /** Keys present in both series, valued `f(left, right)` */
  crossApplyInner<V2, R>(
    other: TimeSeries<K, V2>,
    f: (left: V, right: V2) => R,
    options: JoinOptions = {}
  ): TimeSeries<K, R> {
    this.checkInputs('crossApplyInner', other);
    const strategy = resolveJoinStrategy(this.length, other.length, options.strategy);
    return TimeSeries.of(
      innerJoinColumns(this.columns(), other.columns(), this.order, f, strategy),
      this.order
    );
  }

  /** Every key of this series, valued `f(left, right | undefined)` */
  crossApplyLeft<V2, R>(
    other: TimeSeries<K, V2>,
    f: (left: V, right: V2 | undefined) => R,
    options: JoinOptions = {}
  ): TimeSeries<K, R> {
    this.checkInputs('crossApplyLeft', other);
    const strategy = resolveJoinStrategy(this.length, other.length, options.strategy);
    return TimeSeries.of(
      leftJoinColumns(this.columns(), other.columns(), this.order, f, strategy),
      this.order
    );
  }

  /**
   * Every key of this series, valued `f(left, right | undefined)` where
   * `right` belongs to the nearest key of `other` in the direction of
   * `options.mode` that `options.matcher` accepts.
   *
   * @example
   * ```typescript
   * const quotedTrades = trades.mergeApplyAsof(
   *   quotes,
   *   (trade, quote) => ({ ...trade, bid: quote?.bid }),
   *   { mode: 'roll-prior', matcher: withinDistance(Duration.seconds(5)) }
   * );
   * ```
   */
  mergeApplyAsof<V2, R>(
    other: TimeSeries<K, V2>,
    f: (left: V, right: V2 | undefined) => R,
    options: AsofOptions<K>
  ): TimeSeries<K, R> {
    this.checkInputs('mergeApplyAsof', other);
    return TimeSeries.of(
      asofJoinColumns(this.columns(), other.columns(), this.order, f, options),
      this.order
    );
  }

  /** Ordered union; `pick` settles keys present in both series */
  interweave(
    other: TimeSeries<K, V>,
    pick: (left: DataPoint<K, V>, right: DataPoint<K, V>) => DataPoint<K, V>
  ): TimeSeries<K, V> {
    this.checkInputs('interweave', other);
    return TimeSeries.of(
      interweaveColumns(this.columns(), other.columns(), this.order, pick),
      this.order
    );
  }

  /* ------------------------------------------------------------------ */
  /*  Resampling and sampling statistics                                 */
  /* ------------------------------------------------------------------ */

  /**
   * Aggregate runs of consecutive points that share a bucket key.
   *
   * @example
   * ```typescript
   * const quarterHourly = series.resampleAndAggregate(
   *   (key) => roundUpToDuration(key, Duration.minutes(15)),
   *   aggregate.last()
   * );
   * ```
   */
  resampleAndAggregate<K2, R>(
    bucketFn: (key: K) => K2,
    aggFn: BucketAggregator<K, V, R>,
    options: ResampleOptions<K2> = {}
  ): TimeSeries<K2, R> {
    this.checkInputs('resampleAndAggregate');
    const order = options.order ?? naturalOrder<K2>();
    return TimeSeries.of(resampleColumns(this.columns(), bucketFn, aggFn, order), order);
  }

  /**
   * Intervals between consecutive keys, most frequent first.
   * The default distance covers number, bigint and Date keys.
   */
  sampleRates(distance: (from: K, to: K) => number = temporalDistance): SampleRate[] {
    return sampleRatesOf(this.keyColumn, distance);
  }

  /** Whether every pair of consecutive keys is the same distance apart */
  isMonoIntervaled(distance?: (from: K, to: K) => number): boolean {
    return this.sampleRates(distance).length === 1;
  }

  // ── Private ──────────────────────────────────────────────────────────

  private columns(): ColumnsView<K, V> {
    return { keys: this.keyColumn, values: this.valueColumn };
  }

  private checkInputs<V2>(operation: string, other?: TimeSeries<K, V2>): void {
    if (!getEngineConfig().validateInputs) return;
    assertStrictlyAscending(this.keyColumn, this.order, { operation, input: 'left' });
    if (other) {
      assertStrictlyAscending(other.keyColumn, other.order, { operation, input: 'right' });
    }
  }
}

/* ------------------------------------------------------------------ */
/*  Lazy sequences                                                     */
/* ------------------------------------------------------------------ */

function* mapPoints<K, V, R>(
  source: Iterable<DataPoint<K, V>>,
  f: (value: V, key: K) => R
): Generator<DataPoint<K, R>, void, undefined> {
  for (const point of source) {
    yield dataPoint(point.key, f(point.value, point.key));
  }
}

function* filterPoints<K, V>(
  source: Iterable<DataPoint<K, V>>,
  predicate: (value: V, key: K) => boolean
): Generator<DataPoint<K, V>, void, undefined> {
  for (const point of source) {
    if (predicate(point.value, point.key)) yield point;
  }
}

function* orderedPoints<K, V>(
  source: Iterable<DataPoint<K, V>>,
  order: KeyOrder<K>
): Generator<DataPoint<K, V>, void, undefined> {
  let previous: DataPoint<K, V> | undefined;
  for (const point of source) {
    if (previous && order.compare(previous.key, point.key) > 0) return;
    previous = point;
    yield point;
  }
}

/**
 * Lazy, single-pass sequence of points produced by a transform.
 *
 * Nothing runs until the sequence is iterated or materialized, and it can
 * be consumed once. `collect` and `collectUnchecked` turn it back into a
 * `TimeSeries`.
 */
export class PointSequence<K, V> implements Iterable<DataPoint<K, V>> {
  constructor(
    private readonly source: Iterable<DataPoint<K, V>>,
    /** Order used when the sequence is collected */
    readonly order: KeyOrder<K>
  ) {}

  [Symbol.iterator](): Iterator<DataPoint<K, V>> {
    return this.source[Symbol.iterator]();
  }

  map<R>(f: (value: V, key: K) => R): PointSequence<K, R> {
    return new PointSequence(mapPoints(this.source, f), this.order);
  }

  filter(predicate: (value: V, key: K) => boolean): PointSequence<K, V> {
    return new PointSequence(filterPoints(this.source, predicate), this.order);
  }

  /** Pass points through until the first key smaller than the one before it */
  ordered(): PointSequence<K, V> {
    return new PointSequence(orderedPoints(this.source, this.order), this.order);
  }

  toArray(): DataPoint<K, V>[] {
    return Array.from(this);
  }

  /** Materialize through `TimeSeries.collectChecked` */
  collect(options: Omit<CollectOptions<K>, 'order'> = {}): TimeSeries<K, V> {
    return TimeSeries.collectChecked(this, { ...options, order: this.order });
  }

  /** Materialize through `TimeSeries.collectUnchecked` */
  collectUnchecked(): TimeSeries<K, V> {
    return TimeSeries.collectUnchecked(this, this.order);
  }
}
