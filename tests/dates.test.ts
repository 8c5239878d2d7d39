/**
 * Spreadsheet Date & Async Helper Tests
 *
 * FILE LOCATION: tests/dates.test.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  formatTimestamp,
  parseSheetDate,
  retryOnce,
  serialToIsoDate,
  toSheetSerial,
  withTimeout,
} from '../functions/src/utils';

describe('spreadsheet serial dates', () => {
  it('counts days from 1899-12-30', () => {
    expect(serialToIsoDate(2)).toBe('1900-01-01');
    expect(serialToIsoDate(45366)).toBe('2024-03-15');
  });

  it('uses the calendar date of the time zone', () => {
    const lateEvening = new Date('2024-03-15T23:30:00Z');

    expect(toSheetSerial(lateEvening, 'UTC')).toBe(45366);
    expect(toSheetSerial(lateEvening, 'Europe/Helsinki')).toBe(45367);
  });

  it('parses serials, dd.mm.yyyy and ISO dates', () => {
    expect(parseSheetDate(45366.75)).toBe(45366);
    expect(parseSheetDate('1.1.1900')).toBe(2);
    expect(parseSheetDate('15.03.2024')).toBe(45366);
    expect(parseSheetDate('2024-03-15')).toBe(45366);
  });

  it('returns null for anything else', () => {
    expect(parseSheetDate('next week')).toBeNull();
    expect(parseSheetDate('')).toBeNull();
    expect(parseSheetDate(true)).toBeNull();
  });
});

describe('formatTimestamp', () => {
  it('formats local wall-clock time', () => {
    expect(formatTimestamp(new Date('2024-03-15T10:00:00Z'), 'Europe/Helsinki')).toBe('2024-03-15 12:00:00');
  });

  it('follows daylight saving time and writes midnight as 00', () => {
    expect(formatTimestamp(new Date('2024-06-30T21:05:09Z'), 'Europe/Helsinki')).toBe('2024-07-01 00:05:09');
  });
});

describe('retryOnce', () => {
  it('runs a failed operation a second time', async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce('rows');

    await expect(retryOnce(operation)).resolves.toBe('rows');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up after the second failure', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('ECONNRESET'));

    await expect(retryOnce(operation)).rejects.toThrow('ECONNRESET');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors the predicate refuses', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('PERMISSION_DENIED'));

    await expect(retryOnce(operation, () => false)).rejects.toThrow('PERMISSION_DENIED');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('returns the work result when it settles first', async () => {
    await expect(withTimeout(Promise.resolve('parsed'), 1000, () => 'late')).resolves.toBe('parsed');
  });

  it('returns the fallback when time runs out', async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(new Promise<string>(() => undefined), 20000, () => 'late');
      await vi.advanceTimersByTimeAsync(20000);
      await expect(pending).resolves.toBe('late');
    } finally {
      vi.useRealTimers();
    }
  });
});
