/**
 * Duration arithmetic and key rounding helpers.
 *
 * Durations are plain millisecond counts. Rounding works on numeric keys
 * (taken as milliseconds) and Date keys, and returns the same kind of key
 * it was given.
 */

import { InvalidArgumentError } from './errors/index.js';
import type { TemporalKey } from './keys.js';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/** Millisecond duration constructors */
export const Duration = {
  milliseconds: (n: number): number => n,
  seconds: (n: number): number => n * SECOND,
  minutes: (n: number): number => n * MINUTE,
  hours: (n: number): number => n * HOUR,
  days: (n: number): number => n * DAY,
} as const;

function assertSize(size: number): void {
  if (!Number.isFinite(size) || size <= 0) {
    throw new InvalidArgumentError('Rounding size must be a positive, finite duration', { size });
  }
}

/** Floored remainder, non-negative for negative timestamps */
function floorMod(value: number, size: number): number {
  return ((value % size) + size) % size;
}

function toMillis(key: number | Date): number {
  return typeof key === 'number' ? key : key.getTime();
}

function sameKind(key: number | Date, millis: number): number | Date {
  return typeof key === 'number' ? millis : new Date(millis);
}

/**
 * Label of the bucket `[b, b + size)` containing `key`, taken at its end.
 *
 * A key exactly on a boundary belongs to the bucket that starts there, so
 * it rounds up to the next boundary.
 *
 * @example
 * ```typescript
 * roundUpToDuration(Duration.minutes(3), Duration.minutes(15)); // 15 min
 * roundUpToDuration(Duration.minutes(15), Duration.minutes(15)); // 30 min
 * ```
 */
export function roundUpToDuration(key: number, size: number): number;
export function roundUpToDuration(key: Date, size: number): Date;
export function roundUpToDuration<T extends number | Date>(key: T, size: number): T;
export function roundUpToDuration(key: number | Date, size: number): number | Date {
  assertSize(size);
  const millis = toMillis(key);
  return sameKind(key, millis - floorMod(millis, size) + size);
}

/** Start of the bucket `[b, b + size)` containing `key` */
export function roundDownToDuration(key: number, size: number): number;
export function roundDownToDuration(key: Date, size: number): Date;
export function roundDownToDuration<T extends number | Date>(key: T, size: number): T;
export function roundDownToDuration(key: number | Date, size: number): number | Date {
  assertSize(size);
  const millis = toMillis(key);
  return sameKind(key, millis - floorMod(millis, size));
}

/** Nearest boundary; a key exactly halfway rounds down */
export function roundToNearestDuration(key: number, size: number): number;
export function roundToNearestDuration(key: Date, size: number): Date;
export function roundToNearestDuration<T extends number | Date>(key: T, size: number): T;
export function roundToNearestDuration(key: number | Date, size: number): number | Date {
  assertSize(size);
  const millis = toMillis(key);
  const mod = floorMod(millis, size);
  const base = millis - mod;
  return sameKind(key, mod > Math.floor(size / 2) ? base + size : base);
}

/** Signed distance `b - a` between two keys of the same kind, in key units */
export function keyDistance(a: TemporalKey, b: TemporalKey): number {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return Number(b - a);
  }
  if (typeof a === 'bigint' || typeof b === 'bigint') {
    return Number(b) - Number(a);
  }
  return toMillis(b) - toMillis(a);
}
