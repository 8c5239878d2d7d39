/**
 * Google Sheets Tabular Store
 *
 * Row-level access to the league spreadsheet. Worksheets are read whole and
 * addressed by header name; column order is free.
 *
 * Reads are retried once; writes are not (a resent SMS is safe, see
 * resultWriter.ts).
 *
 * FILE LOCATION: functions/src/sheets.ts
 * VERSION: V01.03
 */

import * as functions from 'firebase-functions';
import { google, sheets_v4 } from 'googleapis';
import { StoreUnavailableError, errorMessage } from './errors';
import { retryOnce } from './utils';

const logger = functions.logger;

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

// ============================================
// TYPES
// ============================================

export type CellValue = string | number | boolean;

export interface SheetRow {
  /** 1-based row number in the worksheet (header is row 1) */
  rowNumber: number;
  values: Record<string, CellValue>;
}

export interface SheetTable {
  headers: string[];
  rows: SheetRow[];
}

export interface CellUpdate {
  rowNumber: number;
  /** 0-based column index */
  column: number;
  value: CellValue;
}

/**
 * Minimal tabular store the fixture store and result writer run on
 */
export interface TabularStore {
  readValues(sheet: string): Promise<CellValue[][]>;
  appendValues(sheet: string, rows: CellValue[][]): Promise<void>;
  /** Writes single cells; the rest of each row is left as it is */
  updateCells(sheet: string, updates: CellUpdate[]): Promise<void>;
}

// ============================================
// TABLE HELPERS
// ============================================

export const toCellValue = (value: unknown): CellValue => {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return '';
};

const isBlank = (value: CellValue | undefined): boolean =>
  value === undefined || (typeof value === 'string' && value.trim() === '');

export const toTable = (values: CellValue[][]): SheetTable => {
  const [headerRow = [], ...body] = values;
  const headers = headerRow.map(header => String(header).trim());

  const rows: SheetRow[] = [];
  body.forEach((cells, index) => {
    if (cells.every(cell => isBlank(cell))) return;
    const record: Record<string, CellValue> = {};
    headers.forEach((header, column) => {
      record[header] = cells[column] ?? '';
    });
    rows.push({ rowNumber: index + 2, values: record });
  });

  return { headers, rows };
};

export const rowFromRecord = (headers: string[], record: Record<string, CellValue>): CellValue[] =>
  headers.map(header => record[header] ?? '');

export async function readTable(store: TabularStore, sheet: string): Promise<SheetTable> {
  return toTable(await store.readValues(sheet));
}

export const cellText = (value: CellValue | undefined): string =>
  value === undefined ? '' : String(value).trim();

export const cellNumber = (value: CellValue | undefined): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

// ============================================
// GOOGLE SHEETS IMPLEMENTATION
// ============================================

const quoteSheet = (sheet: string): string => `'${sheet.replace(/'/g, "''")}'`;

/** A1 column letters: 0 -> A, 25 -> Z, 26 -> AA */
export const columnLetter = (column: number): string => {
  let letters = '';
  for (let n = column + 1; n > 0; n = Math.floor((n - 1) / 26)) {
    letters = String.fromCharCode(65 + ((n - 1) % 26)) + letters;
  }
  return letters;
};

export class GoogleSheetsStore implements TabularStore {
  private readonly api: sheets_v4.Sheets;

  constructor(private readonly spreadsheetId: string, api?: sheets_v4.Sheets) {
    this.api = api ?? google.sheets({ version: 'v4', auth: new google.auth.GoogleAuth({ scopes: SCOPES }) });
  }

  async readValues(sheet: string): Promise<CellValue[][]> {
    try {
      const response = await retryOnce(() =>
        this.api.spreadsheets.values.get({
          spreadsheetId: this.spreadsheetId,
          range: quoteSheet(sheet),
          valueRenderOption: 'UNFORMATTED_VALUE',
          dateTimeRenderOption: 'SERIAL_NUMBER',
        })
      );
      const values: unknown[][] = response.data.values ?? [];
      return values.map(row => row.map(toCellValue));
    } catch (error) {
      logger.error('[Sheets] Read failed', { sheet, error: errorMessage(error) });
      throw new StoreUnavailableError(`Could not read sheet ${sheet}`, { cause: error });
    }
  }

  async appendValues(sheet: string, rows: CellValue[][]): Promise<void> {
    if (rows.length === 0) return;
    try {
      await this.api.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range: `${quoteSheet(sheet)}!A1`,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: rows },
      });
    } catch (error) {
      logger.error('[Sheets] Append failed', { sheet, rows: rows.length, error: errorMessage(error) });
      throw new StoreUnavailableError(`Could not append to sheet ${sheet}`, { cause: error });
    }
  }

  async updateCells(sheet: string, updates: CellUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    try {
      await this.api.spreadsheets.values.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          valueInputOption: 'RAW',
          data: updates.map(update => ({
            range: `${quoteSheet(sheet)}!${columnLetter(update.column)}${update.rowNumber}`,
            values: [[update.value]],
          })),
        },
      });
    } catch (error) {
      logger.error('[Sheets] Update failed', { sheet, cells: updates.length, error: errorMessage(error) });
      throw new StoreUnavailableError(`Could not update sheet ${sheet}`, { cause: error });
    }
  }
}
