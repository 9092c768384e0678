/**
 * Temporal conversions between kdb+ wire counts and JavaScript dates.
 *
 * kdb+ counts from 2000.01.01 UTC. Each conversion maps the null sentinel to
 * `null` and `null` back to the sentinel, so nothing is lost either way.
 */

export const MILLIS_IN_DAY = 86_400_000;
export const DAYS_BETWEEN_1970_2000 = 10_957;
export const MILLIS_BETWEEN_1970_2000 = MILLIS_IN_DAY * DAYS_BETWEEN_1970_2000;
export const NANOS_IN_MILLI = 1_000_000n;
export const NANOS_IN_DAY = 86_400_000_000_000n;

/** Null sentinel of int-based kinds (int, month, date, minute, second, time) */
export const INT_NULL = -2_147_483_648;
/** Null sentinel of long-based kinds (long, timestamp, timespan) */
export const LONG_NULL = -9_223_372_036_854_775_808n;
export const SHORT_NULL = -32_768;

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? q - 1n : q;
}

export function dateFromJs(date: Date | null): number {
  if (date === null) return INT_NULL;
  return Math.floor(date.getTime() / MILLIS_IN_DAY) - DAYS_BETWEEN_1970_2000;
}

export function dateToJs(days: number): Date | null {
  if (days === INT_NULL) return null;
  return new Date((days + DAYS_BETWEEN_1970_2000) * MILLIS_IN_DAY);
}

/**
 * Millisecond precision: sub-millisecond digits of the timestamp are zero.
 */
export function timestampFromJs(date: Date | null): bigint {
  if (date === null) return LONG_NULL;
  return BigInt(date.getTime() - MILLIS_BETWEEN_1970_2000) * NANOS_IN_MILLI;
}

/**
 * Truncates to the millisecond (towards negative infinity).
 */
export function timestampToJs(nanos: bigint): Date | null {
  if (nanos === LONG_NULL) return null;
  return new Date(Number(floorDiv(nanos, NANOS_IN_MILLI)) + MILLIS_BETWEEN_1970_2000);
}

export function datetimeFromJs(date: Date | null): number {
  if (date === null) return Number.NaN;
  return (date.getTime() - MILLIS_BETWEEN_1970_2000) / MILLIS_IN_DAY;
}

export function datetimeToJs(days: number): Date | null {
  if (Number.isNaN(days)) return null;
  return new Date(MILLIS_BETWEEN_1970_2000 + Math.round(days * MILLIS_IN_DAY));
}

/**
 * Month count for a calendar month (1-12).
 */
export function monthFrom(year: number, month: number): number {
  return (year - 2000) * 12 + (month - 1);
}

/**
 * Milliseconds since UTC midnight of the given date.
 */
export function timeFromJs(date: Date | null): number {
  if (date === null) return INT_NULL;
  return ((date.getTime() % MILLIS_IN_DAY) + MILLIS_IN_DAY) % MILLIS_IN_DAY;
}

/**
 * Split a non-negative nanosecond count into day and time-of-day parts.
 */
export function splitNanos(nanos: bigint): { days: bigint; remainder: bigint } {
  return { days: floorDiv(nanos, NANOS_IN_DAY), remainder: ((nanos % NANOS_IN_DAY) + NANOS_IN_DAY) % NANOS_IN_DAY };
}
