import { afterEach, describe, expect, it } from 'vitest';
import { configureEngine, resetEngineConfig } from '../config.js';
import { dataPoint } from '../data-point.js';
import { Duration } from '../duration.js';
import { InvalidArgumentError, SeriesError } from '../errors/index.js';
import { joinAll } from '../join-all.js';
import { resolveJoinStrategy, withinDistance, type AsofMode } from '../joins.js';
import type { LogEntry } from '../observability/index.js';
import { TimeSeries } from '../time-series.js';

afterEach(() => {
  resetEngineConfig();
});

const left = TimeSeries.fromParallelSequences([0, 1, 2, 3, 4], [1.0, 2.0, 3.0, 4.0, 5.0]);
const right = TimeSeries.fromParallelSequences([0, 1, 2], [1.0, 2.0, 4.0]);

function ones(n: number): TimeSeries<number, number> {
  const keys = Array.from({ length: n }, (_, i) => i + 1);
  return TimeSeries.fromParallelSequences(
    keys,
    keys.map(() => 1.0)
  );
}

// ─── Inner and left joins ───────────────────────────────────────────────────

describe('crossApplyInner', () => {
  it('keeps keys present in both series', () => {
    const joined = left.crossApplyInner(right, (a, b) => [a, b]);
    expect(joined.toArray()).toEqual([
      { key: 0, value: [1.0, 1.0] },
      { key: 1, value: [2.0, 2.0] },
      { key: 2, value: [3.0, 4.0] },
    ]);
  });

  it('gives the same result with either strategy', () => {
    const a = TimeSeries.fromParallelSequences([1, 3, 4, 7, 9, 12], ['a', 'b', 'c', 'd', 'e', 'f']);
    const b = TimeSeries.fromParallelSequences([0, 3, 7, 8, 12], [10, 30, 70, 80, 120]);
    const f = (x: string, y: number) => `${x}${y}`;
    const merge = a.crossApplyInner(b, f, { strategy: 'merge' });
    const hash = a.crossApplyInner(b, f, { strategy: 'hash' });
    const flipped = b.crossApplyInner(a, (y, x) => f(x, y), { strategy: 'hash' });
    expect(merge.toArray()).toEqual([
      { key: 3, value: 'b30' },
      { key: 7, value: 'd70' },
      { key: 12, value: 'f120' },
    ]);
    expect(hash.equals(merge)).toBe(true);
    expect(flipped.equals(merge)).toBe(true);
  });

  it('matches Date keys by instant', () => {
    const t = (minute: number) => new Date(Duration.minutes(minute));
    const prices = TimeSeries.fromParallelSequences([t(0), t(1), t(2)], [100, 101, 102]);
    const volumes = TimeSeries.fromParallelSequences([t(1), t(2), t(3)], [5, 6, 7]);
    for (const strategy of ['merge', 'hash'] as const) {
      expect(prices.crossApplyInner(volumes, (p, v) => p * v, { strategy }).values).toEqual([
        505, 612,
      ]);
    }
  });

  it('matches number and bigint keys alike under either strategy', () => {
    const big = 2 ** 60;
    const a = TimeSeries.fromParallelSequences<number | bigint, string>([1, 2, 3, big], ['a', 'b', 'c', 'd']);
    const b = TimeSeries.fromParallelSequences<number | bigint, string>(
      [1n, 2n, 3n, 2n ** 60n],
      ['x', 'y', 'z', 'w']
    );
    for (const strategy of ['merge', 'hash'] as const) {
      const inner = a.crossApplyInner(b, (x, y) => x + y, { strategy });
      expect(inner.toArray()).toEqual([
        { key: 1, value: 'ax' },
        { key: 2, value: 'by' },
        { key: 3, value: 'cz' },
        { key: big, value: 'dw' },
      ]);
      const outer = a.crossApplyLeft(b, (x, y) => x + (y ?? '-'), { strategy });
      expect(outer.values).toEqual(['ax', 'by', 'cz', 'dw']);
    }
  });

  it('returns an empty series when one side is empty', () => {
    expect(left.crossApplyInner(TimeSeries.empty<number, number>(), (a, b) => a + b).isEmpty()).toBe(
      true
    );
  });

  it('leaves both inputs unchanged', () => {
    left.crossApplyInner(right, (a, b) => a + b);
    expect(left.values).toEqual([1.0, 2.0, 3.0, 4.0, 5.0]);
    expect(right.values).toEqual([1.0, 2.0, 4.0]);
  });
});

describe('crossApplyLeft', () => {
  it('keeps every left key', () => {
    const joined = left.crossApplyLeft(right, (a, b) => [a, b ?? null]);
    expect(joined.toArray()).toEqual([
      { key: 0, value: [1.0, 1.0] },
      { key: 1, value: [2.0, 2.0] },
      { key: 2, value: [3.0, 4.0] },
      { key: 3, value: [4.0, null] },
      { key: 4, value: [5.0, null] },
    ]);
  });

  it('gives the same result with either strategy', () => {
    const sparse = TimeSeries.fromParallelSequences([-1, 1, 3, 10], [1, 2, 3, 4]);
    const f = (a: number, b: number | undefined) => (b === undefined ? -a : a * b);
    const merge = left.crossApplyLeft(sparse, f, { strategy: 'merge' });
    const hash = left.crossApplyLeft(sparse, f, { strategy: 'hash' });
    expect(merge.values).toEqual([-1, 4, -3, 12, -5]);
    expect(hash.equals(merge)).toBe(true);
  });
});

// ─── Strategy selection ─────────────────────────────────────────────────────

describe('resolveJoinStrategy', () => {
  it('picks hash once one side is hashJoinRatio times the other', () => {
    expect(resolveJoinStrategy(100, 13)).toBe('merge');
    expect(resolveJoinStrategy(104, 13)).toBe('hash');
    expect(resolveJoinStrategy(2, 16)).toBe('hash');
    expect(resolveJoinStrategy(0, 16)).toBe('merge');
  });

  it('honours the configured strategy and ratio', () => {
    configureEngine({ hashJoinRatio: 2 });
    expect(resolveJoinStrategy(10, 5)).toBe('hash');
    configureEngine({ joinStrategy: 'merge' });
    expect(resolveJoinStrategy(1000, 1)).toBe('merge');
    expect(resolveJoinStrategy(1000, 1, 'hash')).toBe('hash');
  });

  it('logs the automatic choice at debug level', () => {
    const entries: LogEntry[] = [];
    configureEngine({ logLevel: 'debug', logHandler: (entry) => entries.push(entry) });
    ones(8).crossApplyInner(ones(1), (a, b) => a + b);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'debug',
      module: 'seriate:join',
      message: 'Join strategy selected',
      context: { strategy: 'hash', leftLength: 8, rightLength: 1, hashJoinRatio: 8 },
    });
  });
});

// ─── As-of join ─────────────────────────────────────────────────────────────

describe('mergeApplyAsof', () => {
  const keep = (_a: number, b: number | undefined) => b;

  const cases: {
    name: string;
    rightKeys: number[];
    mode: AsofMode;
    tolerance?: number;
    expected: (number | undefined)[];
  }[] = [
    {
      name: 'roll-prior within one unit',
      rightKeys: [2, 4, 5, 7, 8, 10],
      mode: 'roll-prior',
      tolerance: 1,
      expected: [undefined, 1, 1, 2, 3, 3, 4, 5, 5, 6],
    },
    {
      name: 'exact matches only',
      rightKeys: [2, 4, 5, 7, 8, 10],
      mode: 'no-roll',
      expected: [undefined, 1, undefined, 2, 3, undefined, 4, 5, undefined, 6],
    },
    {
      name: 'roll-next within one unit',
      rightKeys: [2, 5, 6, 8, 10],
      mode: 'roll-next',
      tolerance: 1,
      expected: [1, 1, undefined, 2, 2, 3, 4, 4, 5, 5],
    },
    {
      name: 'roll-next within two units',
      rightKeys: [2, 5, 6, 8, 10],
      mode: 'roll-next',
      tolerance: 2,
      expected: [1, 1, 2, 2, 2, 3, 4, 4, 5, 5],
    },
    {
      name: 'sparse exact matches',
      rightKeys: [2, 5, 6, 8, 10],
      mode: 'no-roll',
      expected: [undefined, 1, undefined, undefined, 2, 3, undefined, 4, undefined, 5],
    },
  ];

  it.each(cases)('$name', ({ rightKeys, mode, tolerance, expected }) => {
    const other = TimeSeries.fromParallelSequences(
      rightKeys,
      rightKeys.map((_, i) => i + 1)
    );
    const matcher = tolerance === undefined ? undefined : withinDistance<number>(tolerance);
    const joined = ones(10).mergeApplyAsof(other, keep, { mode, matcher });
    expect(joined.keys).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(joined.values).toEqual(expected);
  });

  it('rolls without bound when no matcher is given', () => {
    const other = TimeSeries.fromParallelSequences([2, 9], [20, 90]);
    expect(ones(10).mergeApplyAsof(other, keep, { mode: 'roll-prior' }).values).toEqual([
      undefined, 20, 20, 20, 20, 20, 20, 20, 90, 90,
    ]);
    expect(ones(10).mergeApplyAsof(other, keep, { mode: 'roll-next' }).values).toEqual([
      20, 20, 90, 90, 90, 90, 90, 90, 90, undefined,
    ]);
  });

  it('rejects a matcher with no-roll', () => {
    try {
      ones(3).mergeApplyAsof(ones(3), keep, { mode: 'no-roll', matcher: withinDistance(1) });
      expect.unreachable();
    } catch (error) {
      expect(SeriesError.isCode(error, 'SERIATE_A201')).toBe(true);
    }
  });

  it('measures Date tolerance in milliseconds', () => {
    const t = (second: number) => new Date(Duration.seconds(second));
    const trades = TimeSeries.fromParallelSequences([t(10), t(20), t(30)], ['t1', 't2', 't3']);
    const quotes = TimeSeries.fromParallelSequences([t(8), t(14)], [99.5, 99.7]);
    const quoted = trades.mergeApplyAsof(quotes, (trade, quote) => `${trade}@${quote ?? '-'}`, {
      mode: 'roll-prior',
      matcher: withinDistance<Date>(Duration.seconds(6)),
    });
    expect(quoted.values).toEqual(['t1@99.5', 't2@99.7', 't3@-']);
  });

  it('rejects a negative tolerance', () => {
    expect(() => withinDistance(-1)).toThrow(InvalidArgumentError);
  });
});

// ─── Interweave ─────────────────────────────────────────────────────────────

describe('interweave', () => {
  const a = TimeSeries.fromParallelSequences([1, 2, 3, 4, 5], [1, 2, 3, 4, 5]);
  const b = TimeSeries.fromParallelSequences([4, 5, 6, 7, 8], [6, 7, 8, 9, 10]);

  it('takes the ordered union of both series', () => {
    const woven = a.interweave(b, (l) => l);
    expect(woven.keys).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(woven.values).toEqual([1, 2, 3, 4, 5, 8, 9, 10]);
  });

  it('lets the caller settle shared keys', () => {
    const woven = a.interweave(b, (l, r) => dataPoint(l.key, l.value + r.value));
    expect(woven.values).toEqual([1, 2, 3, 10, 12, 8, 9, 10]);
  });
});

// ─── N-ary join ─────────────────────────────────────────────────────────────

describe('joinAll', () => {
  const open = TimeSeries.fromParallelSequences([1, 2, 3, 4], [10, 20, 30, 40]);
  const label = TimeSeries.fromParallelSequences([2, 3, 4, 5], ['b', 'c', 'd', 'e']);
  const flag = TimeSeries.fromParallelSequences([1, 3, 4], [true, false, true]);

  it('collects one tuple per common key', () => {
    const joined = joinAll(open, label, flag);
    expect(joined.toArray()).toEqual([
      { key: 3, value: [30, 'c', false] },
      { key: 4, value: [40, 'd', true] },
    ]);
    const [price, name, ok] = joined.values[0];
    expect(price + 1).toBe(31);
    expect(name.toUpperCase()).toBe('C');
    expect(ok).toBe(false);
  });

  it('accepts join options last', () => {
    const merge = joinAll(open, label, { strategy: 'merge' });
    const hash = joinAll(open, label, { strategy: 'hash' });
    expect(merge.values).toEqual([
      [20, 'b'],
      [30, 'c'],
      [40, 'd'],
    ]);
    expect(hash.equals(merge, (x, y) => x[0] === y[0] && x[1] === y[1])).toBe(true);
  });
});
