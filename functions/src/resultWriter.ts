/**
 * Result Writer
 *
 * Records a validated score report in the spreadsheet:
 * 1. Re-reads the fixture (cache dropped) and refuses unknown or completed ones
 * 2. Appends one `_breaks` row per break not yet stored for the fixture
 * 3. Writes the result cells of the fixture row, which completes it. Other
 *    cells of the row (formulas, notes kept by hand) are not written.
 *
 * Steps 2 and 3 are separate API calls. If step 3 fails, the fixture is still
 * unplayed and a resend goes through again; the break rows already tagged
 * with the fixture id are counted and only the missing tail is appended.
 *
 * Known limitation: two submissions for the same fixture arriving together
 * can both pass the completion check, and the later row update wins.
 *
 * FILE LOCATION: functions/src/resultWriter.ts
 * VERSION: V01.03
 */

import * as functions from 'firebase-functions';
import { StoreUnavailableError, WriteError, errorMessage } from './errors';
import {
  BREAKS_SHEET,
  BREAK_COLUMNS,
  MATCHES_SHEET,
  MATCH_COLUMNS,
  normalizeFixtureId,
} from './fixtureStore';
import type { FixtureRecord, SheetFixtureStore } from './fixtureStore';
import { cellText, rowFromRecord } from './sheets';
import type { CellUpdate, CellValue, SheetTable, TabularStore } from './sheets';
import type { Fixture, ScoreReport } from './types';
import { formatTimestamp, serialToIsoDate, toSheetSerial } from './utils';

const logger = functions.logger;

// ============================================
// TYPES
// ============================================

export interface CommitMeta {
  /** Where the result came from, e.g. "sms:+358401234567" or "api" */
  source: string;
  /** Original message text, kept in the log columns */
  passage?: string;
  receivedAt: Date;
}

export interface CommitAck {
  /** The fixture as it now stands in the sheet */
  fixture: Fixture;
  breaksWritten: number;
  /** Break rows found from an earlier, partially failed commit */
  breaksAlreadyStored: number;
}

export interface ResultWriter {
  commit(fixtureId: string, report: ScoreReport, meta: CommitMeta): Promise<CommitAck>;
}

export const winnerOf = (fixture: Fixture, report: ScoreReport): string | null => {
  if (report.player1Score > report.player2Score) return fixture.player1;
  if (report.player2Score > report.player1Score) return fixture.player2;
  return null;
};

// ============================================
// SHEET WRITER
// ============================================

export class SheetResultWriter implements ResultWriter {
  constructor(
    private readonly store: TabularStore,
    private readonly fixtures: SheetFixtureStore,
    private readonly options: { timeZone: string }
  ) {}

  async commit(fixtureId: string, report: ScoreReport, meta: CommitMeta): Promise<CommitAck> {
    const id = normalizeFixtureId(fixtureId);
    this.fixtures.invalidate();

    let record: FixtureRecord | null;
    let breaksTable: SheetTable;
    try {
      record = await this.fixtures.findFixtureRecord(id);
      breaksTable = await this.fixtures.table(BREAKS_SHEET);
    } catch (error) {
      throw this.storeFailure(id, error);
    }

    if (!record) {
      throw new WriteError('fixture_not_found', id, `Fixture ${id} not found`);
    }
    const { fixture } = record;
    if (fixture.state === 'complete') {
      throw new WriteError('already_complete', id, `Fixture ${id} already has a result`);
    }

    const serial = toSheetSerial(meta.receivedAt, this.options.timeZone);
    const timestamp = formatTimestamp(meta.receivedAt, this.options.timeZone);
    const winner = winnerOf(fixture, report);

    const alreadyStored = breaksTable.rows.filter(
      row => normalizeFixtureId(cellText(row.values[BREAK_COLUMNS.matchId])) === id
    ).length;
    const pending = report.breaks.slice(alreadyStored);

    const breakRows = pending.map(brk =>
      rowFromRecord(breaksTable.headers, {
        [BREAK_COLUMNS.timestamp]: timestamp,
        [BREAK_COLUMNS.source]: meta.source,
        [BREAK_COLUMNS.passage]: meta.passage ?? '',
        [BREAK_COLUMNS.player]: fixture[brk.player],
        [BREAK_COLUMNS.points]: brk.points,
        [BREAK_COLUMNS.date]: serial,
        [BREAK_COLUMNS.round]: fixture.round,
        [BREAK_COLUMNS.matchId]: id,
      })
    );

    const resultCells = this.resultCells(record, {
      [MATCH_COLUMNS.date]: serial,
      [MATCH_COLUMNS.player1Score]: report.player1Score,
      [MATCH_COLUMNS.player2Score]: report.player2Score,
      [MATCH_COLUMNS.winner]: winner ?? '',
      [MATCH_COLUMNS.log]: meta.passage ? `${meta.source}: ${meta.passage}` : meta.source,
    });

    try {
      await this.store.appendValues(BREAKS_SHEET, breakRows);
      await this.store.updateCells(MATCHES_SHEET, resultCells);
    } catch (error) {
      throw this.storeFailure(id, error);
    } finally {
      this.fixtures.invalidate();
    }

    logger.info('[Writer] Result recorded', {
      fixtureId: id,
      scoreline: `${report.player1Score}-${report.player2Score}`,
      breaksWritten: pending.length,
      breaksAlreadyStored: alreadyStored,
      source: meta.source,
    });

    return {
      fixture: {
        ...fixture,
        state: 'complete',
        outcome: {
          player1Score: report.player1Score,
          player2Score: report.player2Score,
          winner,
          date: serialToIsoDate(serial),
        },
      },
      breaksWritten: pending.length,
      breaksAlreadyStored: alreadyStored,
    };
  }

  private resultCells(record: FixtureRecord, values: Record<string, CellValue>): CellUpdate[] {
    return Object.entries(values).map(([header, value]) => {
      const column = record.headers.indexOf(header);
      if (column < 0) {
        throw new WriteError('store_unavailable', record.fixture.id, `Sheet ${MATCHES_SHEET} has no column ${header}`);
      }
      return { rowNumber: record.row.rowNumber, column, value };
    });
  }

  private storeFailure(id: string, error: unknown): WriteError {
    if (error instanceof WriteError) return error;
    logger.error('[Writer] Store failure', { fixtureId: id, error: errorMessage(error) });
    const message = error instanceof StoreUnavailableError ? error.message : `Store failure: ${errorMessage(error)}`;
    return new WriteError('store_unavailable', id, message, { cause: error });
  }
}
