import { UTCDate } from '@date-fns/utc';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  formatDay,
  formatMonth,
  formatTimestamp,
  inRange,
  normalizeIdentity,
  parseTimestamp,
} from '../../src/domain/normalize';

describe('normalizeIdentity', () => {
  it('lower-cases identities', () => {
    expect(normalizeIdentity('Alice@Co.com')).toBe('alice@co.com');
  });

  it('maps missing values to an empty string', () => {
    expect(normalizeIdentity(undefined)).toBe('');
    expect(normalizeIdentity(null)).toBe('');
    expect(normalizeIdentity('')).toBe('');
  });
});

describe('parseTimestamp', () => {
  it('reads the wall-clock time and ignores a trailing Z', () => {
    const date = parseTimestamp('2024-03-10T23:30:15Z');
    expect(date).not.toBeNull();
    expect(date && formatTimestamp(date)).toBe('2024-03-10T23:30:15');
  });

  it('gives the same instant with or without the Z designator', () => {
    for (const raw of ['2024-01-31T00:00:00', '2023-12-31T23:59:59.123', '2024-02-29']) {
      expect(parseTimestamp(`${raw}Z`)?.getTime()).toBe(parseTimestamp(raw)?.getTime());
    }
  });

  it('accepts the seven-digit fractions the API returns', () => {
    const date = parseTimestamp('2024-05-06T07:08:09.1234567Z');
    expect(date && formatTimestamp(date)).toBe('2024-05-06T07:08:09');
  });

  describe('on a host in a daylight-saving zone', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('keeps a clock reading that falls in the spring-forward gap', () => {
      vi.stubEnv('TZ', 'America/New_York');

      const date = parseTimestamp('2024-03-10T02:30:00Z');

      expect(date && formatTimestamp(date)).toBe('2024-03-10T02:30:00');
      expect(date && formatDay(date)).toBe('2024-03-10');
    });

    it('keeps the calendar day of a late-evening timestamp', () => {
      vi.stubEnv('TZ', 'Asia/Kolkata');

      const date = parseTimestamp('2024-03-31T23:45:00Z');

      expect(date && formatDay(date)).toBe('2024-03-31');
      expect(inRange(date, '2024-03-01', '2024-03-31')).toBe(true);
    });
  });

  it('returns null for null, empty and malformed input', () => {
    for (const raw of [null, undefined, '', 'not-a-date', '2024-13-45T00:00:00', 'Z']) {
      expect(parseTimestamp(raw)).toBeNull();
    }
  });
});

describe('date formatting', () => {
  it('renders day and month buckets zero-padded', () => {
    const date = new UTCDate(2024, 0, 5, 14, 3, 9);
    expect(formatDay(date)).toBe('2024-01-05');
    expect(formatMonth(date)).toBe('2024-01');
    expect(formatTimestamp(date)).toBe('2024-01-05T14:03:09');
  });
});

describe('inRange', () => {
  const start = '2024-03-01';
  const end = '2024-03-31';

  it('includes both bounds', () => {
    expect(inRange(new UTCDate(2024, 2, 1, 0, 0, 0), start, end)).toBe(true);
    expect(inRange(new UTCDate(2024, 2, 31, 23, 59, 59), start, end)).toBe(true);
  });

  it('excludes days outside the window', () => {
    expect(inRange(new UTCDate(2024, 1, 29, 23, 59, 59), start, end)).toBe(false);
    expect(inRange(new UTCDate(2024, 3, 1, 0, 0, 0), start, end)).toBe(false);
  });

  it('is false for a missing date', () => {
    expect(inRange(null, start, end)).toBe(false);
    expect(inRange(parseTimestamp('garbage'), start, end)).toBe(false);
  });
});
