/**
 * Apple Messages date conversion utilities.
 *
 * Apple's Core Data timestamps (used in Messages backups) are measured
 * from 2001-01-01 00:00:00 UTC, the "Apple epoch". Backups taken since
 * iOS 11 store these in nanoseconds; older ones used plain seconds.
 */

import { fromUnixTime, isValid } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

/** Seconds between Unix epoch (1970-01-01) and Apple epoch (2001-01-01). */
export const APPLE_EPOCH_OFFSET = 978_307_200;

/**
 * Threshold to distinguish nanosecond timestamps from second timestamps.
 * Any value strictly above this is treated as nanoseconds. It is a
 * magnitude heuristic, not a format tag, and must stay at exactly this
 * value so regenerated sites match earlier runs.
 */
export const NANO_THRESHOLD = APPLE_EPOCH_OFFSET * 1_000_000;

const NANOS_PER_SECOND = 1_000_000_000;

/**
 * Returns true if the given Apple timestamp is in nanoseconds rather
 * than seconds.
 */
export function isNanoseconds(appleTimestamp: number): boolean {
  return appleTimestamp > NANO_THRESHOLD;
}

/**
 * Convert an Apple Core Data timestamp to a whole Unix timestamp
 * (seconds since 1970-01-01 00:00:00 UTC).
 *
 * Handles both nanosecond and second Apple timestamp formats; nanosecond
 * values are floored to the second.
 */
export function appleToUnix(appleTimestamp: number): number {
  return isNanoseconds(appleTimestamp)
    ? Math.floor(appleTimestamp / NANOS_PER_SECOND) + APPLE_EPOCH_OFFSET
    : appleTimestamp + APPLE_EPOCH_OFFSET;
}

/** Convert a Unix timestamp in seconds to a JavaScript Date. */
export function unixToDate(unixSeconds: number): Date {
  return fromUnixTime(unixSeconds);
}

/** Shown in place of a date or time that a JavaScript Date cannot hold. */
export const INVALID_DATE = 'Invalid date';

/**
 * Format a Unix timestamp in the given IANA zone. Timestamps outside the
 * Date range (about 275,000 years either side of 1970) format as
 * INVALID_DATE instead of throwing.
 */
function formatUnix(unixSeconds: number, timeZone: string, pattern: string): string {
  const date = unixToDate(unixSeconds);
  if (!isValid(date)) return INVALID_DATE;
  return formatInTimeZone(date, timeZone, pattern);
}

/**
 * Calendar date (yyyy-MM-dd) of a Unix timestamp in the given IANA zone.
 * Used as the date-bucket key, so chat pages and the index agree.
 */
export function calendarDateKey(unixSeconds: number, timeZone: string): string {
  return formatUnix(unixSeconds, timeZone, 'yyyy-MM-dd');
}

/** 12-hour clock time, e.g. "03:05 PM". */
export function formatClockTime(unixSeconds: number, timeZone: string): string {
  return formatUnix(unixSeconds, timeZone, 'hh:mm a');
}

/** Date and 12-hour time, e.g. "2024-01-15 03:05 PM". */
export function formatDateTime(unixSeconds: number, timeZone: string): string {
  return formatUnix(unixSeconds, timeZone, 'yyyy-MM-dd hh:mm a');
}

/** Returns true if the runtime recognises the IANA time zone name. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}
