/**
 * ID and timestamp utilities
 */

import { randomUUID } from 'node:crypto';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Generate a collection ID (UUID v4)
 */
export function generateCollectionId(): string {
  return randomUUID();
}

/**
 * Check whether a string is a UUID
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Current time as an ISO-8601 UTC string
 */
export function utcNow(): string {
  return new Date().toISOString();
}

/**
 * Compact UTC timestamp for file names: `YYYYMMDD_HHMMSS`
 * @param date - The instant to format (default: now)
 */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
