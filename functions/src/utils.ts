/**
 * Shared helpers: spreadsheet dates, timestamps, type guards, retry and timeout.
 *
 * FILE LOCATION: functions/src/utils.ts
 */

import type { CellValue } from './sheets';

// ============================================
// SPREADSHEET DATES
// ============================================

// Sheets counts days from 1899-12-30
const SERIAL_EPOCH_UTC = Date.UTC(1899, 11, 30);
const DAY_MS = 24 * 60 * 60 * 1000;

interface LocalParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const localParts = (date: Date, timeZone: string): LocalParts => {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(part => part.type === type)?.value ?? 0);

  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
  };
};

const pad = (value: number): string => String(value).padStart(2, '0');

const serialFromYmd = (year: number, month: number, day: number): number =>
  Math.round((Date.UTC(year, month - 1, day) - SERIAL_EPOCH_UTC) / DAY_MS);

/**
 * Calendar date of `date` in the given time zone as a spreadsheet serial
 */
export const toSheetSerial = (date: Date, timeZone: string): number => {
  const { year, month, day } = localParts(date, timeZone);
  return serialFromYmd(year, month, day);
};

/**
 * Spreadsheet serial to YYYY-MM-DD
 */
export const serialToIsoDate = (serial: number): string =>
  new Date(SERIAL_EPOCH_UTC + Math.floor(serial) * DAY_MS).toISOString().slice(0, 10);

/**
 * Parse a date cell. Accepts serial numbers, dd.mm.yyyy and YYYY-MM-DD.
 */
export const parseSheetDate = (value: CellValue): number | null => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.floor(value);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();

  const finnish = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(text);
  if (finnish) {
    return serialFromYmd(Number(finnish[3]), Number(finnish[2]), Number(finnish[1]));
  }

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (iso) {
    return serialFromYmd(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  return null;
};

/**
 * YYYY-MM-DD HH:mm:ss in the given time zone
 */
export const formatTimestamp = (date: Date, timeZone: string): string => {
  const p = localParts(date, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ============================================
// RETRY / TIMEOUT
// ============================================

/**
 * Run an operation, and run it once more if it throws an error that
 * `shouldRetry` accepts.
 */
export async function retryOnce<T>(
  operation: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (!shouldRetry(error)) {
      throw error;
    }
    return operation();
  }
}

/**
 * Settle with `work`, or with `onTimeout()` when `ms` elapses first.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => T): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>(resolve => {
    timer = setTimeout(() => resolve(onTimeout()), ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
