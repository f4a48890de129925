import { DateTime } from 'luxon';
import type { ClockPort } from '@strata/core';

export function nowUtc(clock: ClockPort): DateTime {
  return DateTime.fromMillis(clock.nowMs(), { zone: 'utc' });
}

export function isoOf(time: DateTime): string {
  const iso = time.toISO();
  if (iso === null) {
    throw new RangeError(`Invalid timestamp: ${time.invalidExplanation ?? time.invalidReason ?? 'unknown'}`);
  }
  return iso;
}

/**
 * Seconds between two instants, millisecond precision
 */
export function secondsBetween(start: DateTime, end: DateTime): number {
  return Math.round(end.diff(start, 'milliseconds').milliseconds) / 1000;
}
