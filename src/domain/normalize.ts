/**
 * Identity and timestamp normalization
 * Nothing here throws on malformed input
 */

import { utc } from '@date-fns/utc';
import { format, isValid, parseISO } from 'date-fns';

/**
 * Case-fold a reviewer identity. Missing values become '' and never match.
 */
export function normalizeIdentity(raw: string | null | undefined): string {
  return (raw ?? '').toLowerCase();
}

/**
 * Parse an ISO-8601-like timestamp as wall-clock time.
 * A trailing "Z" is dropped first; null, empty or malformed input gives null.
 * Parsing and formatting both run in UTC, so no host offset or DST gap
 * shifts the clock reading.
 */
export function parseTimestamp(raw: string | null | undefined): Date | null {
  if (!raw) {
    return null;
  }

  const date = parseISO(raw.trim().replace(/Z$/i, ''), { in: utc });
  return isValid(date) ? date : null;
}

export function formatDay(date: Date): string {
  return format(date, 'yyyy-MM-dd', { in: utc });
}

export function formatMonth(date: Date): string {
  return format(date, 'yyyy-MM', { in: utc });
}

export function formatTimestamp(date: Date): string {
  return format(date, "yyyy-MM-dd'T'HH:mm:ss", { in: utc });
}

/**
 * Check a date against an inclusive YYYY-MM-DD window.
 * Zero-padded fixed-width day strings compare correctly as plain strings.
 */
export function inRange(date: Date | null, start: string, end: string): boolean {
  if (!date) {
    return false;
  }
  const day = formatDay(date);
  return start <= day && day <= end;
}
