import { describe, expect, it } from 'vitest';
import { CodecError, SeriesError, TimeSeries, UnorderedInputError } from '@seriate/core';
import { decodeBinary, encodeBinary, type DecodedBinary } from '../binary.js';

const series = TimeSeries.fromParallelSequences([1000, 2000, 3500], [1.5, 1.5, -2]);

function numeric(decoded: DecodedBinary): TimeSeries<number, number> {
  if (decoded.keyKind !== 'number') throw new Error('expected number keys');
  return decoded.series;
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return SeriesError.isSeriesError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('encodeBinary', () => {
  it('writes the header', () => {
    const bytes = encodeBinary(series);
    const view = new DataView(bytes.buffer);
    expect(bytes.byteLength).toBe(58);
    expect(Array.from(bytes.subarray(0, 6))).toEqual([0x53, 0x52, 0x43, 0x31, 1, 0]);
    expect(view.getUint32(6)).toBe(3);
  });

  it('stores each key as a float64', () => {
    const view = new DataView(encodeBinary(series).buffer);
    expect(view.getFloat64(10)).toBe(1000);
    expect(view.getFloat64(18)).toBe(2000);
    expect(view.getFloat64(26)).toBe(3500);
  });

  it('stores values as XOR of consecutive bit patterns', () => {
    const bytes = encodeBinary(series);
    expect(Array.from(bytes.subarray(34, 42))).toEqual([0x3f, 0xf8, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(bytes.subarray(42, 50))).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(bytes.subarray(50, 58))).toEqual([0xff, 0xf8, 0, 0, 0, 0, 0, 0]);
  });

  it('marks Date keys', () => {
    const dated = TimeSeries.fromParallelSequences([new Date(0)], [1]);
    expect(encodeBinary(dated)[5]).toBe(1);
  });
});

describe('decodeBinary', () => {
  it('restores numeric keys', () => {
    const decoded = decodeBinary(encodeBinary(series));
    expect(decoded.keyKind).toBe('number');
    expect(numeric(decoded).equals(series)).toBe(true);
  });

  it('restores Date keys', () => {
    const dated = TimeSeries.fromParallelSequences(
      [new Date('2024-03-01T00:00:00Z'), new Date('2024-03-01T00:00:15Z')],
      [10, 11]
    );
    const decoded = decodeBinary(encodeBinary(dated));
    if (decoded.keyKind !== 'date') throw new Error('expected Date keys');
    expect(decoded.series.keys.map((d) => d.toISOString())).toEqual([
      '2024-03-01T00:00:00.000Z',
      '2024-03-01T00:00:15.000Z',
    ]);
    expect(decoded.series.values).toEqual([10, 11]);
  });

  it('keeps special float values', () => {
    const special = TimeSeries.fromParallelSequences([1, 2, 3, 4], [Number.NaN, -0, Infinity, 0.1]);
    expect(numeric(decodeBinary(encodeBinary(special))).equals(special)).toBe(true);
  });

  it('keeps keys at the ends of the float64 range', () => {
    const extreme = TimeSeries.fromParallelSequences([-1e308, 0.25, 1e308], [1, 2, 3]);
    const decoded = numeric(decodeBinary(encodeBinary(extreme)));
    expect(decoded.keys).toEqual([-1e308, 0.25, 1e308]);
  });

  it('decodes an empty series', () => {
    const bytes = encodeBinary(TimeSeries.empty<number, number>());
    expect(bytes.byteLength).toBe(10);
    expect(decodeBinary(bytes).series.isEmpty()).toBe(true);
  });

  it('reads from a view into a larger buffer', () => {
    const bytes = encodeBinary(series);
    const padded = new Uint8Array(bytes.byteLength + 5);
    padded.set(bytes, 3);
    const decoded = decodeBinary(padded.subarray(3, 3 + bytes.byteLength));
    expect(numeric(decoded).equals(series)).toBe(true);
  });

  it('rejects foreign and truncated input', () => {
    const bytes = encodeBinary(series);

    expect(codeOf(() => decodeBinary(bytes.subarray(0, 5)))).toBe('SERIATE_D300');
    expect(codeOf(() => decodeBinary(bytes.subarray(0, 57)))).toBe('SERIATE_D300');

    const foreign = bytes.slice();
    foreign[0] = 0x00;
    expect(codeOf(() => decodeBinary(foreign))).toBe('SERIATE_D302');

    const future = bytes.slice();
    future[4] = 2;
    expect(codeOf(() => decodeBinary(future))).toBe('SERIATE_D302');

    const unknownKind = bytes.slice();
    unknownKind[5] = 7;
    expect(codeOf(() => decodeBinary(unknownKind))).toBe('SERIATE_D302');
  });

  it('names the expected length', () => {
    expect(() => decodeBinary(encodeBinary(series).subarray(0, 57))).toThrow(
      new CodecError('SERIATE_D300', 'Expected 58 bytes for 3 points, got 57')
    );
  });

  it('validates the decoded key order', () => {
    const bytes = encodeBinary(TimeSeries.fromParallelSequences([1, 2], [0, 0]));
    new DataView(bytes.buffer).setFloat64(18, -5);
    expect(() => decodeBinary(bytes)).toThrow(UnorderedInputError);
  });
});
