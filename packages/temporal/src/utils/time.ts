/**
 * Time Utilities
 */

import type { Granularity } from '../types/temporal.js';
import { GRANULARITIES } from '../types/temporal.js';

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Check that a value is a usable Date. Years are limited to 0000-9999
 * so that stored ISO strings order chronologically.
 */
export function isValidDate(value: Date): boolean {
  const year = value.getUTCFullYear();
  return !Number.isNaN(value.getTime()) && year >= 0 && year <= 9999;
}

/**
 * Seconds between two dates (b - a)
 */
export function secondsBetween(a: Date, b: Date): number {
  return (b.getTime() - a.getTime()) / 1000;
}

/**
 * The coarser of two granularities
 */
export function coarserGranularity(a: Granularity, b: Granularity): Granularity {
  return GRANULARITIES.indexOf(a) >= GRANULARITIES.indexOf(b) ? a : b;
}

/**
 * Truncate a date to the start of its granularity bucket (UTC).
 * Weeks start on Monday.
 */
export function bucketStart(date: Date, granularity: Granularity): number {
  const d = new Date(date.getTime());
  switch (granularity) {
    case 'seconds':
      d.setUTCMilliseconds(0);
      break;
    case 'minutes':
      d.setUTCSeconds(0, 0);
      break;
    case 'hours':
      d.setUTCMinutes(0, 0, 0);
      break;
    case 'days':
      d.setUTCHours(0, 0, 0, 0);
      break;
    case 'weeks': {
      d.setUTCHours(0, 0, 0, 0);
      const daysSinceMonday = (d.getUTCDay() + 6) % 7;
      d.setUTCDate(d.getUTCDate() - daysSinceMonday);
      break;
    }
    case 'months':
      d.setUTCHours(0, 0, 0, 0);
      d.setUTCDate(1);
      break;
    case 'years':
      d.setUTCHours(0, 0, 0, 0);
      d.setUTCMonth(0, 1);
      break;
  }
  return d.getTime();
}

/**
 * Whether two dates fall in the same bucket at a granularity
 */
export function sameBucket(a: Date, b: Date, granularity: Granularity): boolean {
  return bucketStart(a, granularity) === bucketStart(b, granularity);
}

/**
 * Format a timestamp as YYYY-MM-DD HH:mm:ss (UTC)
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
