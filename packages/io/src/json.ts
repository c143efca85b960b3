/**
 * Tagged JSON codec.
 *
 * A document is an envelope naming its format, version and key kind:
 *
 * ```json
 * {
 *   "format": "seriate/json",
 *   "version": 1,
 *   "keyKind": "date",
 *   "points": [{ "key": "2024-01-01T00:00:00.000Z", "value": 101.5 }]
 * }
 * ```
 *
 * Bigint keys are written as decimal strings and Date keys as ISO strings.
 *
 * @module json
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  CodecError,
  InvalidArgumentError,
  TimeSeries,
  ValidationError,
  getEngineLogger,
  type DataPoint,
  type DuplicatePolicy,
  type FieldValidationError,
} from '@seriate/core';

export const JSON_FORMAT = 'seriate/json';
export const JSON_VERSION = 1;

/** Key types a JSON document can carry */
export interface JsonKeyTypes {
  number: number;
  string: string;
  bigint: bigint;
  date: Date;
}

export type JsonKeyKind = keyof JsonKeyTypes;

export type JsonKey = JsonKeyTypes[JsonKeyKind];

const KEY_KINDS = ['number', 'string', 'bigint', 'date'] as const satisfies readonly JsonKeyKind[];

const keySchemas = {
  number: z.number().finite(),
  string: z.string(),
  bigint: z
    .string()
    .regex(/^-?\d+$/, 'Expected a decimal integer string')
    .transform((s) => BigInt(s)),
  date: z
    .string()
    .datetime({ offset: true })
    .transform((s) => new Date(s)),
} satisfies { [KK in JsonKeyKind]: z.ZodType<JsonKeyTypes[KK], z.ZodTypeDef, unknown> };

const envelopeHeaderSchema = z.object({
  format: z.string(),
  version: z.number(),
});

const envelopeSchema = z.object({
  format: z.literal(JSON_FORMAT),
  version: z.literal(JSON_VERSION),
  keyKind: z.enum(KEY_KINDS),
  points: z.array(
    z.object({
      key: z.unknown(),
      value: z.unknown(),
    })
  ),
});

export interface JsonEncodeOptions<V> {
  /** JSON value written for each series value (default: the value itself) */
  encodeValue?: (value: V) => unknown;
  /** Indent with two spaces */
  pretty?: boolean;
  /** Key kind recorded for an empty series (default: 'number') */
  keyKind?: JsonKeyKind;
}

export interface JsonDecodeOptions {
  /** Default `'reject'` */
  onDuplicate?: DuplicatePolicy;
}

function kindOf(key: JsonKey): JsonKeyKind {
  if (key instanceof Date) return 'date';
  switch (typeof key) {
    case 'number':
      return 'number';
    case 'bigint':
      return 'bigint';
    default:
      return 'string';
  }
}

function encodeKey(key: JsonKey): number | string {
  if (key instanceof Date) return key.toISOString();
  if (typeof key === 'bigint') return key.toString();
  return key;
}

function toFieldErrors(issues: z.ZodIssue[], prefix: (string | number)[] = []): FieldValidationError[] {
  return issues.map((issue) => {
    const path = [...prefix, ...issue.path];
    return {
      path: path.length > 0 ? path.join('.') : '(root)',
      message: issue.message,
    };
  });
}

/**
 * Encode a series as a tagged JSON document.
 *
 * @throws InvalidArgumentError (SERIATE_A202) when the keys mix kinds
 */
export function encodeJson<K extends JsonKey, V>(
  series: TimeSeries<K, V>,
  options: JsonEncodeOptions<V> = {}
): string {
  const first = series.first();
  const keyKind = first ? kindOf(first.key) : (options.keyKind ?? 'number');
  const points: { key: number | string; value: unknown }[] = [];

  for (const { key, value } of series) {
    if (kindOf(key) !== keyKind) {
      throw new InvalidArgumentError(
        `Keys of kind ${kindOf(key)} and ${keyKind} cannot share a document`,
        { keyKind, found: kindOf(key) },
        'SERIATE_A202'
      );
    }
    points.push({
      key: encodeKey(key),
      value: options.encodeValue ? options.encodeValue(value) : value,
    });
  }

  const envelope = { format: JSON_FORMAT, version: JSON_VERSION, keyKind, points };
  return JSON.stringify(envelope, null, options.pretty ? 2 : undefined);
}

/**
 * Decode a tagged JSON document, validating every value against
 * `valueSchema`. Passing `keyKind` pins the expected key kind and types
 * the result accordingly.
 *
 * @throws CodecError (SERIATE_D300) for invalid JSON or an unexpected key kind
 * @throws CodecError (SERIATE_D302) for another format or version
 * @throws ValidationError (SERIATE_D301) listing every invalid field
 *
 * @example
 * ```typescript
 * const prices = decodeJson(text, z.number(), { keyKind: 'date' });
 * prices.at(new Date('2024-01-01T00:00:00Z'));
 * ```
 */
export function decodeJson<V, KK extends JsonKeyKind>(
  text: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options: JsonDecodeOptions & { keyKind: KK }
): TimeSeries<JsonKeyTypes[KK], V>;
export function decodeJson<V>(
  text: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options?: JsonDecodeOptions
): TimeSeries<JsonKey, V>;
export function decodeJson<V>(
  text: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options: JsonDecodeOptions & { keyKind?: JsonKeyKind } = {}
): TimeSeries<JsonKey, V> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new CodecError('SERIATE_D300', 'Input is not valid JSON', {}, cause);
  }

  const header = envelopeHeaderSchema.safeParse(raw);
  if (
    !header.success ||
    header.data.format !== JSON_FORMAT ||
    header.data.version !== JSON_VERSION
  ) {
    throw new CodecError(
      'SERIATE_D302',
      `Expected a ${JSON_FORMAT} document of version ${JSON_VERSION}`,
      header.success ? { format: header.data.format, version: header.data.version } : {}
    );
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new ValidationError(toFieldErrors(envelope.error.issues));
  }

  const { keyKind, points: rawPoints } = envelope.data;
  if (options.keyKind !== undefined && options.keyKind !== keyKind) {
    throw new CodecError('SERIATE_D300', `Expected ${options.keyKind} keys, found ${keyKind}`, {
      expected: options.keyKind,
      keyKind,
    });
  }

  const keySchema = keySchemas[keyKind];
  const errors: FieldValidationError[] = [];
  const points: DataPoint<JsonKey, V>[] = [];

  rawPoints.forEach((point, i) => {
    const key = keySchema.safeParse(point.key);
    const value = valueSchema.safeParse(point.value);
    if (!key.success) errors.push(...toFieldErrors(key.error.issues, ['points', i, 'key']));
    if (!value.success) errors.push(...toFieldErrors(value.error.issues, ['points', i, 'value']));
    if (key.success && value.success) points.push({ key: key.data, value: value.data });
  });

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  const series = TimeSeries.collectChecked(points, { onDuplicate: options.onDuplicate });
  getEngineLogger('codec').debug('Decoded JSON document', { keyKind, points: series.length });
  return series;
}

/** Read and decode a tagged JSON file (UTF-8); see decodeJson */
export function readJsonFile<V, KK extends JsonKeyKind>(
  path: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options: JsonDecodeOptions & { keyKind: KK }
): Promise<TimeSeries<JsonKeyTypes[KK], V>>;
export function readJsonFile<V>(
  path: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options?: JsonDecodeOptions
): Promise<TimeSeries<JsonKey, V>>;
export async function readJsonFile<V>(
  path: string,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options: JsonDecodeOptions & { keyKind?: JsonKeyKind } = {}
): Promise<TimeSeries<JsonKey, V>> {
  const text = await readFile(path, 'utf8');
  return decodeJson(text, valueSchema, options);
}

/** Encode a series and write it to a file (UTF-8), with a trailing newline */
export async function writeJsonFile<K extends JsonKey, V>(
  path: string,
  series: TimeSeries<K, V>,
  options?: JsonEncodeOptions<V>
): Promise<void> {
  await writeFile(path, `${encodeJson(series, options)}\n`, 'utf8');
}
