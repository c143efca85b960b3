/**
 * Positional shifts and rolling windows over ordered columns.
 *
 * The generators here are lazy and single-pass; `TimeSeries` wraps them in
 * a `PointSequence`. Window state lives in `RollingBuffer` and
 * `RollingAccumulator`, which the streaming operators reuse.
 *
 * @module windowing
 */

import { dataPoint, type DataPoint } from './data-point.js';
import { InvalidArgumentError } from './errors/index.js';

/** Phase of a rolling window: no output until the window has filled */
export type WindowPhase = 'filling' | 'sliding';

/** Incremental accumulator step, folding one value in or out */
export type AccumulatorStep<Acc, V> = (acc: Acc | undefined, value: V) => Acc | undefined;

/** @throws InvalidArgumentError unless `value` is a safe integer of at least 1 */
export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`, {
      [name]: value,
    });
  }
}

function assertInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer, got ${value}`, { [name]: value });
  }
}

/* ------------------------------------------------------------------ */
/*  Window state                                                       */
/* ------------------------------------------------------------------ */

/**
 * Bounded buffer of the last `size` values, oldest first.
 */
export class RollingBuffer<V> {
  private readonly ring: V[];
  private head = 0;
  private count = 0;

  constructor(readonly size: number) {
    assertPositiveInteger(size, 'window');
    this.ring = new Array<V>(size);
  }

  get phase(): WindowPhase {
    return this.count === this.size ? 'sliding' : 'filling';
  }

  /** Add a value, evicting the oldest once full. Returns the phase after the push. */
  push(value: V): WindowPhase {
    if (this.count === this.size) {
      this.ring[this.head] = value;
      this.head = (this.head + 1) % this.size;
    } else {
      this.ring[(this.head + this.count) % this.size] = value;
      this.count++;
    }
    return this.phase;
  }

  /** Snapshot of the buffered values, oldest first */
  toArray(): V[] {
    const out: V[] = [];
    for (let i = 0; i < this.count; i++) {
      out.push(this.ring[(this.head + i) % this.size]);
    }
    return out;
  }
}

/**
 * Running accumulator over the last `size` values.
 *
 * Each push folds the incoming value in with `add` and, once the window
 * is full, folds the leaving value out with `remove`. `add` and `remove`
 * must be inverses for the result to equal a recomputation over the window.
 */
export class RollingAccumulator<V, Acc> {
  private readonly ring: V[];
  private head = 0;
  private count = 0;
  private acc: Acc | undefined = undefined;

  constructor(
    readonly size: number,
    private readonly add: AccumulatorStep<Acc, V>,
    private readonly remove: AccumulatorStep<Acc, V>
  ) {
    assertPositiveInteger(size, 'window');
    this.ring = new Array<V>(size);
  }

  get phase(): WindowPhase {
    return this.count === this.size ? 'sliding' : 'filling';
  }

  get value(): Acc | undefined {
    return this.acc;
  }

  push(incoming: V): WindowPhase {
    this.acc = this.add(this.acc, incoming);
    if (this.count === this.size) {
      const leaving = this.ring[this.head];
      this.ring[this.head] = incoming;
      this.head = (this.head + 1) % this.size;
      this.acc = this.remove(this.acc, leaving);
    } else {
      this.ring[(this.head + this.count) % this.size] = incoming;
      this.count++;
    }
    return this.phase;
  }
}

/* ------------------------------------------------------------------ */
/*  Transforms                                                         */
/* ------------------------------------------------------------------ */

/**
 * Keep every key in place and move values by `offset` positions.
 *
 * A positive offset pairs `keys[i]` with `values[i + offset]`, a negative
 * one with `values[i - |offset|]`; unpaired positions are dropped.
 */
export function shiftColumns<K, V>(
  keys: readonly K[],
  values: readonly V[],
  offset: number
): Generator<DataPoint<K, V>, void, undefined> {
  assertInteger(offset, 'offset');
  return shiftGenerator(keys, values, offset);
}

function* shiftGenerator<K, V>(
  keys: readonly K[],
  values: readonly V[],
  offset: number
): Generator<DataPoint<K, V>, void, undefined> {
  const start = Math.max(0, -offset);
  const end = Math.min(keys.length, keys.length - offset);
  for (let i = start; i < end; i++) {
    yield dataPoint(keys[i], values[i + offset]);
  }
}

/**
 * Emit `(keys[i], f(values[i - span], values[i]))` for every `i >= span`.
 */
export function skipApplyColumns<K, V, R>(
  keys: readonly K[],
  values: readonly V[],
  span: number,
  f: (prior: V, current: V) => R
): Generator<DataPoint<K, R>, void, undefined> {
  assertPositiveInteger(span, 'span');
  return skipApplyGenerator(keys, values, span, f);
}

function* skipApplyGenerator<K, V, R>(
  keys: readonly K[],
  values: readonly V[],
  span: number,
  f: (prior: V, current: V) => R
): Generator<DataPoint<K, R>, void, undefined> {
  for (let i = span; i < keys.length; i++) {
    yield dataPoint(keys[i], f(values[i - span], values[i]));
  }
}

/**
 * Recompute `f` over the last `window` values at every position from
 * `window - 1` on.
 */
export function rollingColumns<K, V, R>(
  keys: readonly K[],
  values: readonly V[],
  window: number,
  f: (buffer: readonly V[]) => R
): Generator<DataPoint<K, R>, void, undefined> {
  const buffer = new RollingBuffer<V>(window);
  return rollingGenerator(keys, values, buffer, f);
}

function* rollingGenerator<K, V, R>(
  keys: readonly K[],
  values: readonly V[],
  buffer: RollingBuffer<V>,
  f: (buffer: readonly V[]) => R
): Generator<DataPoint<K, R>, void, undefined> {
  for (let i = 0; i < keys.length; i++) {
    if (buffer.push(values[i]) === 'sliding') {
      yield dataPoint(keys[i], f(buffer.toArray()));
    }
  }
}

/**
 * Maintain a running accumulator over the last `window` values and emit it
 * at every position from `window - 1` on. Positions where the accumulator
 * is `undefined` produce no point.
 */
export function updatingRollingColumns<K, V, Acc>(
  keys: readonly K[],
  values: readonly V[],
  window: number,
  add: AccumulatorStep<Acc, V>,
  remove: AccumulatorStep<Acc, V>
): Generator<DataPoint<K, Acc>, void, undefined> {
  const accumulator = new RollingAccumulator<V, Acc>(window, add, remove);
  return updatingRollingGenerator(keys, values, accumulator);
}

function* updatingRollingGenerator<K, V, Acc>(
  keys: readonly K[],
  values: readonly V[],
  accumulator: RollingAccumulator<V, Acc>
): Generator<DataPoint<K, Acc>, void, undefined> {
  for (let i = 0; i < keys.length; i++) {
    if (accumulator.push(values[i]) === 'filling') continue;
    const acc = accumulator.value;
    if (acc !== undefined) {
      yield dataPoint(keys[i], acc);
    }
  }
}
