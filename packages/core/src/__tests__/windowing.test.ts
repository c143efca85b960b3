import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from '../errors/index.js';
import { TimeSeries } from '../time-series.js';
import { RollingAccumulator, RollingBuffer } from '../windowing.js';

const series = TimeSeries.fromParallelSequences([1, 2, 3, 4, 5], [10, 20, 30, 40, 50]);

const sum = (values: readonly number[]) => values.reduce((a, b) => a + b, 0);

// ─── Shift ──────────────────────────────────────────────────────────────────

describe('shift', () => {
  it('leads with a positive offset', () => {
    expect(series.shift(1).toArray()).toEqual([
      { key: 1, value: 20 },
      { key: 2, value: 30 },
      { key: 3, value: 40 },
      { key: 4, value: 50 },
    ]);
  });

  it('lags with a negative offset', () => {
    expect(series.shift(-1).toArray()).toEqual([
      { key: 2, value: 10 },
      { key: 3, value: 20 },
      { key: 4, value: 30 },
      { key: 5, value: 40 },
    ]);
  });

  it('is the identity at offset zero', () => {
    expect(series.shift(0).collect().equals(series)).toBe(true);
  });

  it('is empty once the offset reaches the length', () => {
    expect(series.shift(5).toArray()).toEqual([]);
    expect(series.shift(-7).toArray()).toEqual([]);
  });

  it('rejects fractional offsets before iteration', () => {
    expect(() => series.shift(1.5)).toThrow(InvalidArgumentError);
  });

  it('leaves the input series unchanged', () => {
    series.shift(2).toArray();
    expect(series.values).toEqual([10, 20, 30, 40, 50]);
  });
});

// ─── Skip apply ─────────────────────────────────────────────────────────────

describe('skipApply', () => {
  it('combines each value with the one span positions before it', () => {
    expect(series.skipApply(1, (prior, current) => current - prior).toArray()).toEqual([
      { key: 2, value: 10 },
      { key: 3, value: 10 },
      { key: 4, value: 10 },
      { key: 5, value: 10 },
    ]);
    expect(series.skipApply(2, (prior, current) => `${prior}->${current}`).toArray()).toEqual([
      { key: 3, value: '10->30' },
      { key: 4, value: '20->40' },
      { key: 5, value: '30->50' },
    ]);
  });

  it('is empty when the span covers the series', () => {
    expect(series.skipApply(5, (a, b) => a + b).toArray()).toEqual([]);
  });

  it('rejects a span below one', () => {
    expect(() => series.skipApply(0, (a, b) => a + b)).toThrow(
      'span must be a positive integer, got 0'
    );
  });
});

// ─── Rolling windows ────────────────────────────────────────────────────────

describe('applyRolling', () => {
  const small = TimeSeries.fromParallelSequences([1, 2, 3, 4, 5], [1, 2, 3, 4, 5]);

  it('starts once the window has filled', () => {
    expect(small.applyRolling(3, sum).toArray()).toEqual([
      { key: 3, value: 6 },
      { key: 4, value: 9 },
      { key: 5, value: 12 },
    ]);
  });

  it('passes the window oldest first', () => {
    expect(small.applyRolling(2, (w) => w.join(',')).collect().values).toEqual([
      '1,2',
      '2,3',
      '3,4',
      '4,5',
    ]);
  });

  it('is empty for a window longer than the series', () => {
    expect(small.applyRolling(6, sum).toArray()).toEqual([]);
  });

  it('rejects invalid windows eagerly', () => {
    expect(() => small.applyRolling(0, sum)).toThrow(InvalidArgumentError);
    expect(() => small.applyUpdatingRolling(2.5, (a) => a, (a) => a)).toThrow(
      InvalidArgumentError
    );
  });
});

describe('applyUpdatingRolling', () => {
  const values = [4, 8, 15, 16, 23, 42, 7, 1];
  const keyed = TimeSeries.fromParallelSequences(
    values.map((_, i) => i),
    values
  );

  it('matches a full recomputation when add and remove are inverses', () => {
    for (const window of [1, 2, 3, 8]) {
      const updating = keyed
        .applyUpdatingRolling<number>(
          window,
          (acc, x) => (acc ?? 0) + x,
          (acc, x) => (acc ?? 0) - x
        )
        .collect();
      const recomputed = keyed.applyRolling(window, sum).collect();
      expect(updating.equals(recomputed)).toBe(true);
    }
  });

  it('skips positions where the accumulator is undefined', () => {
    const mixed = TimeSeries.fromParallelSequences([1, 2, 3], [3, -1, 4]);
    const positives = mixed.applyUpdatingRolling<number>(
      1,
      (_acc, x) => (x > 0 ? x : undefined),
      (acc) => acc
    );
    expect(positives.toArray()).toEqual([
      { key: 1, value: 3 },
      { key: 3, value: 4 },
    ]);
  });
});

// ─── Window state ───────────────────────────────────────────────────────────

describe('RollingBuffer', () => {
  it('keeps the last size values', () => {
    const buffer = new RollingBuffer<string>(2);
    expect(buffer.push('a')).toBe('filling');
    expect(buffer.push('b')).toBe('sliding');
    expect(buffer.toArray()).toEqual(['a', 'b']);
    expect(buffer.push('c')).toBe('sliding');
    expect(buffer.toArray()).toEqual(['b', 'c']);
  });

  it('returns snapshots', () => {
    const buffer = new RollingBuffer<number>(2);
    buffer.push(1);
    const snapshot = buffer.toArray();
    buffer.push(2);
    expect(snapshot).toEqual([1]);
  });
});

describe('RollingAccumulator', () => {
  it('folds values in and out', () => {
    const acc = new RollingAccumulator<number, number>(
      2,
      (total, x) => (total ?? 0) + x,
      (total, x) => (total ?? 0) - x
    );
    expect(acc.push(1)).toBe('filling');
    expect(acc.value).toBe(1);
    expect(acc.push(2)).toBe('sliding');
    expect(acc.value).toBe(3);
    acc.push(5);
    expect(acc.value).toBe(7);
  });

  it('rejects a non-positive size', () => {
    expect(() => new RollingAccumulator<number, number>(-1, (a) => a, (a) => a)).toThrow(
      'window must be a positive integer, got -1'
    );
  });
});
