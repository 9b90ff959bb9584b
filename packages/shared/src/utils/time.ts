/**
 * DST-safe time helpers for exchange-local market data.
 * The timezone is always passed in; nothing here reads the process timezone.
 */

import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Floor a timestamp to a bucket aligned on the session anchor.
 *
 * Buckets start at `anchorMs + k * bucketMs`, so a 06:30 anchor with 5-minute
 * buckets yields 06:30, 06:35, ... Timestamps before the anchor land in
 * negative k buckets.
 *
 * @example
 * floorToSessionBucket(anchor + 7 * 60_000, anchor, 300_000); // anchor + 5m
 */
export function floorToSessionBucket(tsMs: number, anchorMs: number, bucketMs: number): number {
  return anchorMs + Math.floor((tsMs - anchorMs) / bucketMs) * bucketMs;
}

/**
 * Resolve an exchange wall-clock time on a date to epoch ms.
 *
 * @param date - YYYY-MM-DD
 * @param clock - HH:mm
 */
export function zonedWallTimeToUtc(date: string, clock: string, timeZone: string): number {
  return fromZonedTime(`${date}T${clock}:00`, timeZone).getTime();
}

/**
 * ISO-8601 with the exchange offset, e.g. 2024-03-15T06:30:00-07:00
 */
export function formatExchangeTimestamp(tsMs: number, timeZone: string): string {
  return formatInTimeZone(tsMs, timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

export function exchangeDateOf(tsMs: number, timeZone: string): string {
  return formatInTimeZone(tsMs, timeZone, 'yyyy-MM-dd');
}
