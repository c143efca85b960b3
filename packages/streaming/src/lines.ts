/**
 * Line decoding of text and byte chunk streams.
 *
 * @module lines
 */

import { Observable, type OperatorFunction } from 'rxjs';
import { CodecError, SeriesError } from '@seriate/core';

/**
 * Parser for one line. `lineNumber` is 1-based; returning `undefined`
 * skips the line (a header, a comment).
 */
export type LineParser<T> = (line: string, lineNumber: number) => T | undefined;

/**
 * Split a stream of string or UTF-8 byte chunks into lines, wherever the
 * chunk boundaries fall, and parse each non-blank line. Handles `\n` and
 * `\r\n` endings; a last line without a newline is parsed on completion.
 *
 * Parser failures end the stream with a CodecError (SERIATE_D300)
 * naming the line, unless the parser threw a SeriesError itself.
 *
 * @example
 * ```typescript
 * chunks$.pipe(
 *   decodeLines((line, n) => (n === 1 ? undefined : parseTick(line))),
 *   ensureOrdered(),
 *   collectSeries()
 * );
 * ```
 */
export function decodeLines<T>(parse: LineParser<T>): OperatorFunction<string | Uint8Array, T> {
  return (source) =>
    new Observable<T>((subscriber) => {
      const decoder = new TextDecoder('utf-8');
      let pending = '';
      let lineNumber = 0;

      // Parse one line; false once the stream has errored
      const emit = (raw: string): boolean => {
        lineNumber++;
        const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
        if (line.trim() === '') return true;
        let parsed: T | undefined;
        try {
          parsed = parse(line, lineNumber);
        } catch (err) {
          subscriber.error(asLineError(err, lineNumber));
          return false;
        }
        if (parsed !== undefined) subscriber.next(parsed);
        return true;
      };

      const push = (text: string): boolean => {
        pending += text;
        let newline = pending.indexOf('\n');
        while (newline >= 0) {
          const line = pending.slice(0, newline);
          pending = pending.slice(newline + 1);
          if (!emit(line)) return false;
          newline = pending.indexOf('\n');
        }
        return true;
      };

      const subscription = source.subscribe({
        next: (chunk) => {
          push(typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true }));
        },
        error: (err: unknown) => subscriber.error(err),
        complete: () => {
          if (!push(decoder.decode())) return;
          if (pending !== '' && !emit(pending)) return;
          subscriber.complete();
        },
      });

      return () => subscription.unsubscribe();
    });
}

function asLineError(err: unknown, lineNumber: number): SeriesError {
  if (SeriesError.isSeriesError(err)) return err;
  const cause = err instanceof Error ? err : new Error(String(err));
  return new CodecError('SERIATE_D300', `Line ${lineNumber}: ${cause.message}`, { line: lineNumber }, cause);
}
