/**
 * Delimited text (CSV and friends) codec for series.
 *
 * Output has a header row followed by one `key<delim>value` row per point.
 * Fields containing the delimiter, a quote or a line break are quoted with
 * doubled inner quotes; quoted fields may span lines on input.
 *
 * @module delimited
 */

import { readFile, writeFile } from 'node:fs/promises';
import {
  CodecError,
  SeriesError,
  TimeSeries,
  getEngineLogger,
  type DataPoint,
  type DuplicatePolicy,
  type KeyOrder,
} from '@seriate/core';

export interface DelimitedEncodeOptions<K, V> {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Header names of the key and value columns (default: ['key', 'value']) */
  header?: readonly [string, string];
  /** Field written for a key; Dates become ISO strings by default */
  encodeKey?: (key: K) => unknown;
  /** Field written for a value; objects and arrays become JSON by default */
  encodeValue?: (value: V) => unknown;
}

export interface DelimitedDecodeOptions<K, V> {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /**
   * Turn one row, keyed by header name, into a point. `line` is the
   * 1-based line the row starts on.
   */
  parseRecord: (record: Readonly<Record<string, string>>, line: number) => DataPoint<K, V>;
  /** Key order of the decoded series */
  order?: KeyOrder<K>;
  /** Default `'reject'` */
  onDuplicate?: DuplicatePolicy;
}

interface DelimitedRow {
  fields: string[];
  line: number;
}

function assertDelimiter(delimiter: string): void {
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new CodecError('SERIATE_D302', `Unsupported delimiter ${JSON.stringify(delimiter)}`, {
      delimiter,
    });
  }
}

function escapeField(value: unknown, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  const str =
    typeof value === 'object'
      ? JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
      : String(value);
  if (str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Split delimited text into rows of fields. Blank lines are skipped.
 *
 * @throws CodecError (SERIATE_D300) on an unterminated quoted field or
 * text after a closing quote
 */
export function parseDelimited(text: string, delimiter = ','): DelimitedRow[] {
  assertDelimiter(delimiter);
  const rows: DelimitedRow[] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoted = false;
  let line = 1;
  let rowLine = 1;
  let i = 0;

  const endRow = () => {
    fields.push(current);
    if (fields.length > 1 || fields[0] !== '' || quoted) {
      rows.push({ fields, line: rowLine });
    }
    fields = [];
    current = '';
    quoted = false;
  };

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        current += '"';
        i += 2;
      } else if (char === '"') {
        inQuotes = false;
        i++;
      } else {
        if (char === '\n') line++;
        current += char;
        i++;
      }
      continue;
    }

    if (char === '"') {
      if (current !== '' || quoted) {
        throw new CodecError('SERIATE_D300', `Line ${line}: unexpected quote inside a field`, {
          line,
        });
      }
      inQuotes = true;
      quoted = true;
      i++;
    } else if (char === delimiter) {
      fields.push(current);
      current = '';
      quoted = false;
      i++;
    } else if (char === '\r' || char === '\n') {
      endRow();
      i += char === '\r' && text[i + 1] === '\n' ? 2 : 1;
      line++;
      rowLine = line;
    } else {
      if (quoted) {
        throw new CodecError('SERIATE_D300', `Line ${line}: text after a closing quote`, {
          line,
        });
      }
      current += char;
      i++;
    }
  }

  if (inQuotes) {
    throw new CodecError('SERIATE_D300', `Line ${rowLine}: unterminated quoted field`, {
      line: rowLine,
    });
  }
  endRow();
  return rows;
}

/**
 * Encode a series as delimited text with a header row.
 *
 * @example
 * ```typescript
 * const csv = encodeDelimited(prices, { header: ['time', 'price'] });
 * // time,price
 * // 2024-01-01T00:00:00.000Z,101.5
 * ```
 */
export function encodeDelimited<K, V>(
  series: TimeSeries<K, V>,
  options: DelimitedEncodeOptions<K, V> = {}
): string {
  const delimiter = options.delimiter ?? ',';
  assertDelimiter(delimiter);
  const [keyHeader, valueHeader] = options.header ?? ['key', 'value'];

  const lines: string[] = [];
  lines.push([keyHeader, valueHeader].map((h) => escapeField(h, delimiter)).join(delimiter));

  for (const { key, value } of series) {
    const keyField = options.encodeKey ? options.encodeKey(key) : key;
    const valueField = options.encodeValue ? options.encodeValue(value) : value;
    lines.push(escapeField(keyField, delimiter) + delimiter + escapeField(valueField, delimiter));
  }

  return lines.join('\n');
}

/**
 * Decode delimited text into a series. The first row names the columns;
 * every later row goes through `parseRecord` and the points are
 * collected with `TimeSeries.collectChecked`.
 *
 * @throws CodecError (SERIATE_D300) for malformed rows, with the line number
 * @throws DuplicateKeyError for repeated keys under the default policy
 */
export function decodeDelimited<K, V>(
  text: string,
  options: DelimitedDecodeOptions<K, V>
): TimeSeries<K, V> {
  const rows = parseDelimited(text, options.delimiter ?? ',');
  if (rows.length === 0) {
    throw new CodecError('SERIATE_D300', 'Missing header row');
  }

  const [headerRow, ...dataRows] = rows;
  const headers = headerRow.fields;
  const points: DataPoint<K, V>[] = [];

  for (const row of dataRows) {
    if (row.fields.length !== headers.length) {
      throw new CodecError(
        'SERIATE_D300',
        `Line ${row.line}: column count mismatch, expected ${headers.length}, got ${row.fields.length}`,
        { line: row.line, expected: headers.length, actual: row.fields.length }
      );
    }
    const record: Record<string, string> = {};
    headers.forEach((header, i) => {
      record[header] = row.fields[i];
    });
    points.push(parseRow(options.parseRecord, record, row.line));
  }

  const series = TimeSeries.collectChecked(points, {
    order: options.order,
    onDuplicate: options.onDuplicate,
  });
  getEngineLogger('codec').debug('Decoded delimited input', {
    rows: dataRows.length,
    points: series.length,
  });
  return series;
}

function parseRow<K, V>(
  parseRecord: DelimitedDecodeOptions<K, V>['parseRecord'],
  record: Readonly<Record<string, string>>,
  line: number
): DataPoint<K, V> {
  try {
    return parseRecord(record, line);
  } catch (error) {
    if (SeriesError.isSeriesError(error)) throw error;
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new CodecError('SERIATE_D300', `Line ${line}: ${cause.message}`, { line }, cause);
  }
}

/** Read and decode a delimited file (UTF-8) */
export async function readDelimitedFile<K, V>(
  path: string,
  options: DelimitedDecodeOptions<K, V>
): Promise<TimeSeries<K, V>> {
  const text = await readFile(path, 'utf8');
  return decodeDelimited(text, options);
}

/** Encode a series and write it to a file (UTF-8), with a trailing newline */
export async function writeDelimitedFile<K, V>(
  path: string,
  series: TimeSeries<K, V>,
  options?: DelimitedEncodeOptions<K, V>
): Promise<void> {
  await writeFile(path, `${encodeDelimited(series, options)}\n`, 'utf8');
}
