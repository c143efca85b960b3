/**
 * @seriate/io: delimited, JSON and columnar binary codecs for seriate
 * series, plus content hashing.
 *
 * @example
 * ```typescript
 * import { dataPoint } from '@seriate/core';
 * import { decodeDelimited, encodeJson } from '@seriate/io';
 *
 * const series = decodeDelimited(csv, {
 *   parseRecord: (row) => dataPoint(new Date(row.time), Number(row.price)),
 * });
 * const json = encodeJson(series, { pretty: true });
 * ```
 *
 * @module @seriate/io
 */

export {
  decodeDelimited,
  encodeDelimited,
  parseDelimited,
  readDelimitedFile,
  writeDelimitedFile,
  type DelimitedDecodeOptions,
  type DelimitedEncodeOptions,
} from './delimited.js';

export {
  JSON_FORMAT,
  JSON_VERSION,
  decodeJson,
  encodeJson,
  readJsonFile,
  writeJsonFile,
  type JsonDecodeOptions,
  type JsonEncodeOptions,
  type JsonKey,
  type JsonKeyKind,
  type JsonKeyTypes,
} from './json.js';

export { BINARY_VERSION, decodeBinary, encodeBinary, type DecodedBinary } from './binary.js';

export {
  contentHash,
  digest128,
  seriesEqual,
  structuralEqual,
  type PointSerializer,
} from './hash.js';
