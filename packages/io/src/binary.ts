/**
 * Columnar binary codec for numeric series, after Gorilla-style time-series
 * compression: values as the XOR of consecutive IEEE-754 bit patterns,
 * keys as plain float64.
 *
 * Layout (big-endian):
 *
 *   [4 bytes: magic "SRC1"]
 *   [1 byte:  format version]
 *   [1 byte:  key kind, 0 = number, 1 = Date]
 *   [4 bytes: point count]
 *   [8 bytes each: key (float64, Date as epoch ms)]   count times
 *   [8 bytes each: value bits XOR previous]           count times, uint64
 *
 * @module binary
 */

import {
  CodecError,
  InvalidArgumentError,
  TimeSeries,
  getEngineLogger,
} from '@seriate/core';

const MAGIC = [0x53, 0x52, 0x43, 0x31] as const; // "SRC1"
export const BINARY_VERSION = 1;

const HEADER_BYTES = 10;
const KIND_NUMBER = 0;
const KIND_DATE = 1;

/** Result of decodeBinary, tagged by key kind */
export type DecodedBinary =
  | { keyKind: 'number'; series: TimeSeries<number, number> }
  | { keyKind: 'date'; series: TimeSeries<Date, number> };

/** Header, then one key field and one value field per point */
function encodedLength(count: number): number {
  return HEADER_BYTES + 16 * count;
}

/** Bit pattern of a float64 */
function bitsOf(value: number, scratch: DataView): bigint {
  scratch.setFloat64(0, value);
  return scratch.getBigUint64(0);
}

/**
 * Encode a series with numeric values and number or Date keys.
 *
 * @throws InvalidArgumentError (SERIATE_A202) when number and Date keys mix
 */
export function encodeBinary(series: TimeSeries<number, number> | TimeSeries<Date, number>): Uint8Array {
  const keys: readonly (number | Date)[] = series.keys;
  const values: readonly number[] = series.values;
  const count = keys.length;
  const kind = count > 0 && keys[0] instanceof Date ? KIND_DATE : KIND_NUMBER;

  const buffer = new ArrayBuffer(encodedLength(count));
  const view = new DataView(buffer);
  const scratch = new DataView(new ArrayBuffer(8));
  let offset = 0;

  for (const byte of MAGIC) {
    view.setUint8(offset++, byte);
  }
  view.setUint8(offset++, BINARY_VERSION);
  view.setUint8(offset++, kind);
  view.setUint32(offset, count);
  offset += 4;

  for (let i = 0; i < count; i++) {
    const key = keys[i];
    if ((key instanceof Date) !== (kind === KIND_DATE)) {
      throw new InvalidArgumentError(
        'Number and Date keys cannot share a binary encoding',
        { position: i },
        'SERIATE_A202'
      );
    }
    view.setFloat64(offset, key instanceof Date ? key.getTime() : key);
    offset += 8;
  }

  let previousBits = 0n;
  for (let i = 0; i < count; i++) {
    const bits = bitsOf(values[i], scratch);
    view.setBigUint64(offset, bits ^ previousBits);
    offset += 8;
    previousBits = bits;
  }

  return new Uint8Array(buffer);
}

/**
 * Decode bytes written by encodeBinary. The keys go through the checked
 * construction path.
 *
 * @throws CodecError (SERIATE_D302) for a foreign magic, version or key kind
 * @throws CodecError (SERIATE_D300) for truncated or oversized input
 * @throws UnorderedInputError or DuplicateKeyError for corrupted keys
 */
export function decodeBinary(data: Uint8Array): DecodedBinary {
  if (data.byteLength < HEADER_BYTES) {
    throw new CodecError('SERIATE_D300', `Input of ${data.byteLength} bytes is shorter than the header`, {
      byteLength: data.byteLength,
    });
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  let offset = 0;

  if (MAGIC.some((byte, i) => view.getUint8(i) !== byte)) {
    throw new CodecError('SERIATE_D302', 'Input is not a seriate binary series');
  }
  offset += MAGIC.length;

  const version = view.getUint8(offset++);
  if (version !== BINARY_VERSION) {
    throw new CodecError('SERIATE_D302', `Unsupported binary version ${version}`, { version });
  }
  const kind = view.getUint8(offset++);
  if (kind !== KIND_NUMBER && kind !== KIND_DATE) {
    throw new CodecError('SERIATE_D302', `Unknown key kind ${kind}`, { kind });
  }
  const count = view.getUint32(offset);
  offset += 4;

  const expected = encodedLength(count);
  if (data.byteLength !== expected) {
    throw new CodecError(
      'SERIATE_D300',
      `Expected ${expected} bytes for ${count} points, got ${data.byteLength}`,
      { count, expected, byteLength: data.byteLength }
    );
  }

  const keys: number[] = [];
  for (let i = 0; i < count; i++) {
    keys.push(view.getFloat64(offset));
    offset += 8;
  }

  const values: number[] = [];
  const scratch = new DataView(new ArrayBuffer(8));
  let bits = 0n;
  for (let i = 0; i < count; i++) {
    bits ^= view.getBigUint64(offset);
    offset += 8;
    scratch.setBigUint64(0, bits);
    values.push(scratch.getFloat64(0));
  }

  getEngineLogger('codec').debug('Decoded binary series', { count, byteLength: data.byteLength });

  if (kind === KIND_DATE) {
    const dates = keys.map((millis) => new Date(millis));
    return { keyKind: 'date', series: TimeSeries.fromValidatedSequences(dates, values) };
  }
  return { keyKind: 'number', series: TimeSeries.fromValidatedSequences(keys, values) };
}
