import { afterEach, describe, expect, it } from 'vitest';
import { configureEngine, getEngineConfig, resetEngineConfig, DEFAULT_ENGINE_CONFIG } from '../config.js';
import {
  Duration,
  keyDistance,
  roundDownToDuration,
  roundToNearestDuration,
  roundUpToDuration,
} from '../duration.js';
import { InvalidArgumentError, SeriesError, ValidationError } from '../errors/index.js';
import { orderBy } from '../keys.js';
import { aggregate } from '../resample.js';
import { TimeSeries } from '../time-series.js';

// ─── Resampling ─────────────────────────────────────────────────────────────

describe('resampleAndAggregate', () => {
  const minutes = TimeSeries.fromParallelSequences(
    [1, 2, 3, 16].map((m) => Duration.minutes(m)),
    [2, 2, 5, 99]
  );
  const quarter = (key: number) => roundUpToDuration(key, Duration.minutes(15));

  it('emits one point per bucket', () => {
    const resampled = minutes.resampleAndAggregate(quarter, aggregate.last());
    expect(resampled.toArray()).toEqual([
      { key: Duration.minutes(15), value: 5 },
      { key: Duration.minutes(30), value: 99 },
    ]);
  });

  it('hands the bucket points to the aggregator', () => {
    const resampled = minutes.resampleAndAggregate(quarter, (group) =>
      group.map((p) => p.key / Duration.minutes(1))
    );
    expect(resampled.values).toEqual([[1, 2, 3], [16]]);
  });

  it('rounds Date keys to Date buckets', () => {
    const dates = TimeSeries.fromParallelSequences(
      [new Date(Duration.minutes(14)), new Date(Duration.minutes(15))],
      [1, 2]
    );
    const resampled = dates.resampleAndAggregate(
      (key) => roundDownToDuration(key, Duration.minutes(15)),
      aggregate.sum()
    );
    expect(resampled.keys).toEqual([new Date(0), new Date(Duration.minutes(15))]);
    expect(resampled.values).toEqual([1, 2]);
  });

  it('starts a new group each time a non-monotonic bucket changes', () => {
    const series = TimeSeries.fromParallelSequences([1, 2, 3, 4, 5], [1, 1, 1, 1, 1]);
    const resampled = series.resampleAndAggregate((k) => k % 2, aggregate.count());
    expect(resampled.keys).toEqual([1, 0, 1, 0, 1]);
    expect(resampled.values).toEqual([1, 1, 1, 1, 1]);
  });

  it('uses the given bucket order', () => {
    const series = TimeSeries.fromParallelSequences([1, 2, 3, 4], ['a', 'b', 'c', 'd']);
    const resampled = series.resampleAndAggregate(
      (k) => ({ half: k <= 2 ? 'low' : 'high' }),
      (group) => group.map((p) => p.value).join(''),
      { order: orderBy((bucket: { half: string }) => bucket.half) }
    );
    expect(resampled.values).toEqual(['ab', 'cd']);
  });

  it('returns an empty series for empty input', () => {
    expect(TimeSeries.empty<number, number>().resampleAndAggregate(quarter, aggregate.mean()).length).toBe(0);
  });
});

describe('aggregate', () => {
  const group = [
    { key: 1, value: 2 },
    { key: 2, value: 4 },
    { key: 3, value: 9 },
  ];

  it('reduces numeric groups', () => {
    expect(aggregate.first<number, number>()(group)).toBe(2);
    expect(aggregate.last<number, number>()(group)).toBe(9);
    expect(aggregate.count<number, number>()(group)).toBe(3);
    expect(aggregate.sum<number>()(group)).toBe(15);
    expect(aggregate.mean<number>()(group)).toBe(5);
    expect(aggregate.min<number>()(group)).toBe(2);
    expect(aggregate.max<number>()(group)).toBe(9);
  });

  it('reads numbers through a selector', () => {
    const trades = [
      { key: 1, value: { volume: 10 } },
      { key: 2, value: { volume: 30 } },
    ];
    expect(aggregate.sum<number, { volume: number }>((t) => t.volume)(trades)).toBe(40);
    expect(aggregate.max<number, { volume: number }>((t) => t.volume)(trades)).toBe(30);
  });
});

// ─── Durations ──────────────────────────────────────────────────────────────

describe('Duration', () => {
  it('converts to milliseconds', () => {
    expect(Duration.seconds(2)).toBe(2000);
    expect(Duration.minutes(15)).toBe(900_000);
    expect(Duration.hours(2)).toBe(7_200_000);
    expect(Duration.days(1)).toBe(86_400_000);
  });
});

describe('rounding', () => {
  it('rounds up to the end of the containing bucket', () => {
    expect(roundUpToDuration(Duration.minutes(3), Duration.minutes(15))).toBe(Duration.minutes(15));
    expect(roundUpToDuration(Duration.minutes(15), Duration.minutes(15))).toBe(Duration.minutes(30));
    expect(roundUpToDuration(-1, 10)).toBe(0);
  });

  it('rounds down to the start of the containing bucket', () => {
    expect(roundDownToDuration(Duration.minutes(16), Duration.minutes(15))).toBe(
      Duration.minutes(15)
    );
    expect(roundDownToDuration(-1, 10)).toBe(-10);
  });

  it('rounds to the nearest boundary, halfway down', () => {
    expect(roundToNearestDuration(14, 10)).toBe(10);
    expect(roundToNearestDuration(15, 10)).toBe(10);
    expect(roundToNearestDuration(16, 10)).toBe(20);
  });

  it('keeps Date keys as dates', () => {
    const rounded = roundUpToDuration(new Date(Duration.minutes(3)), Duration.minutes(15));
    expect(rounded).toBeInstanceOf(Date);
    expect(rounded.getTime()).toBe(Duration.minutes(15));
  });

  it('rejects sizes that are not positive and finite', () => {
    expect(() => roundUpToDuration(5, 0)).toThrow(InvalidArgumentError);
    expect(() => roundDownToDuration(5, Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => roundToNearestDuration(5, Infinity)).toThrow(InvalidArgumentError);
  });

  it('measures signed key distances', () => {
    expect(keyDistance(1n, 4n)).toBe(3);
    expect(keyDistance(new Date(0), new Date(1000))).toBe(1000);
    expect(keyDistance(5, 2)).toBe(-3);
  });
});

// ─── Engine configuration ───────────────────────────────────────────────────

describe('engine configuration', () => {
  afterEach(() => {
    resetEngineConfig();
  });

  it('starts from the defaults', () => {
    expect(getEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(DEFAULT_ENGINE_CONFIG).toEqual({
      joinStrategy: 'auto',
      hashJoinRatio: 8,
      validateInputs: false,
      logLevel: 'info',
    });
  });

  it('merges partial updates', () => {
    configureEngine({ joinStrategy: 'hash' });
    const config = configureEngine({ validateInputs: true, joinStrategy: undefined });
    expect(config).toMatchObject({ joinStrategy: 'hash', validateInputs: true, hashJoinRatio: 8 });
  });

  it('hands out copies', () => {
    getEngineConfig().hashJoinRatio = 1;
    expect(getEngineConfig().hashJoinRatio).toBe(8);
  });

  it('rejects invalid values with field errors', () => {
    try {
      configureEngine({ hashJoinRatio: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(SeriesError.isCode(error, 'SERIATE_A203')).toBe(true);
      if (error instanceof ValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual(['hashJoinRatio']);
      }
    }
    expect(() => configureEngine({ hashJoinRatio: Infinity })).toThrow(ValidationError);
    expect(getEngineConfig().hashJoinRatio).toBe(8);
  });
});
