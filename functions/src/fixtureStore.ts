/**
 * Fixture Store
 *
 * Read-only view of the league spreadsheet: fixtures, rounds and players.
 * Sheets are fetched once per store instance and kept for `maxAgeMs`;
 * `invalidate()` drops the cache (the result writer calls it around writes).
 * A store is built per request, so staleness never outlives one message.
 *
 * Worksheet and header names below are shared with the people maintaining
 * the spreadsheet. Do not rename them.
 *
 * FILE LOCATION: functions/src/fixtureStore.ts
 * VERSION: V01.04
 */

import { cellNumber, cellText, readTable } from './sheets';
import type { CellValue, SheetRow, SheetTable, TabularStore } from './sheets';
import type { Fixture, FixtureState, MatchFormat, MatchOutcome, Player } from './types';
import { parseSheetDate, serialToIsoDate, toSheetSerial } from './utils';

// ============================================
// SPREADSHEET LAYOUT
// ============================================

export const MATCHES_SHEET = '_matches';
export const BREAKS_SHEET = '_breaks';
export const PLAYERS_SHEET = '_players';
export const ROUNDS_SHEET = '_rounds';

export const MATCH_COLUMNS = {
  id: 'id',
  round: 'round',
  group: 'group',
  player1: 'player1',
  player2: 'player2',
  bestOf: 'best_of',
  reds: 'reds',
  date: 'date',
  player1Score: 'player1_score',
  player2Score: 'player2_score',
  winner: 'winner',
  log: 'log',
} as const;

export const BREAK_COLUMNS = {
  timestamp: 'timestamp',
  source: 'source',
  passage: 'passage',
  player: 'player',
  points: 'break',
  date: 'date',
  round: 'round',
  matchId: 'match_id',
} as const;

const PLAYER_COLUMNS = { name: 'name', group: 'group', phone: 'phone' } as const;
const ROUND_COLUMNS = { round: 'round', start: 'start' } as const;

// ============================================
// TYPES
// ============================================

export interface FixtureFilter {
  round?: number;
  group?: string;
  state?: FixtureState;
}

export interface FixtureStore {
  getFixture(id: string): Promise<Fixture | null>;
  listOpenFixtures(round?: number): Promise<Fixture[]>;
  listFixtures(filter?: FixtureFilter): Promise<Fixture[]>;
  currentRound(): Promise<number | null>;
  currentPlayers(): Promise<Player[]>;
  findPlayerByPhone(phone: string): Promise<Player | null>;
  invalidate(): void;
}

/** A fixture together with the worksheet row it was read from */
export interface FixtureRecord {
  fixture: Fixture;
  row: SheetRow;
  headers: string[];
}

export interface SheetFixtureStoreOptions {
  /** Format for fixtures whose best_of / reds cells are empty */
  defaultFormat: MatchFormat;
  timeZone: string;
  maxAgeMs?: number;
  now?: () => Date;
}

// ============================================
// ROW MAPPING
// ============================================

export const normalizeFixtureId = (id: string): string => id.trim().toLowerCase();

/**
 * Canonical `+<digits>` form. Sheets stores a typed `+358...` as the number
 * 358..., so the plus sign and a `00` prefix are both dropped before comparing.
 */
export const normalizePhone = (phone: string): string => {
  const digits = phone.replace(/\D/g, '');
  if (!digits) return '';
  return `+${digits.startsWith('00') ? digits.slice(2) : digits}`;
};

const readOutcome = (values: Record<string, CellValue>): MatchOutcome | null => {
  const player1Score = cellNumber(values[MATCH_COLUMNS.player1Score]);
  const player2Score = cellNumber(values[MATCH_COLUMNS.player2Score]);
  if (player1Score === null || player2Score === null) {
    return null;
  }
  const serial = parseSheetDate(values[MATCH_COLUMNS.date] ?? '');
  const winner = cellText(values[MATCH_COLUMNS.winner]);
  return {
    player1Score,
    player2Score,
    winner: winner || null,
    date: serial === null ? null : serialToIsoDate(serial),
  };
};

export const fixtureFromRow = (values: Record<string, CellValue>, defaultFormat: MatchFormat): Fixture | null => {
  const id = normalizeFixtureId(cellText(values[MATCH_COLUMNS.id]));
  if (!id) return null;

  const outcome = readOutcome(values);
  return {
    id,
    round: cellNumber(values[MATCH_COLUMNS.round]) ?? 0,
    group: cellText(values[MATCH_COLUMNS.group]),
    player1: cellText(values[MATCH_COLUMNS.player1]),
    player2: cellText(values[MATCH_COLUMNS.player2]),
    format: {
      bestOf: cellNumber(values[MATCH_COLUMNS.bestOf]) ?? defaultFormat.bestOf,
      reds: cellNumber(values[MATCH_COLUMNS.reds]) ?? defaultFormat.reds,
    },
    state: outcome ? 'complete' : 'unplayed',
    outcome,
  };
};

// ============================================
// SHEET-BACKED STORE
// ============================================

const DEFAULT_MAX_AGE_MS = 30_000;

export class SheetFixtureStore implements FixtureStore {
  private readonly cache = new Map<string, { table: SheetTable; fetchedAt: number }>();
  private readonly maxAgeMs: number;
  private readonly now: () => Date;

  constructor(private readonly store: TabularStore, private readonly options: SheetFixtureStoreOptions) {
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
    this.now = options.now ?? (() => new Date());
  }

  get defaultFormat(): MatchFormat {
    return this.options.defaultFormat;
  }

  invalidate(): void {
    this.cache.clear();
  }

  async table(sheet: string): Promise<SheetTable> {
    const nowMs = this.now().getTime();
    const cached = this.cache.get(sheet);
    if (cached && nowMs - cached.fetchedAt <= this.maxAgeMs) {
      return cached.table;
    }
    const table = await readTable(this.store, sheet);
    this.cache.set(sheet, { table, fetchedAt: nowMs });
    return table;
  }

  private async records(): Promise<FixtureRecord[]> {
    const table = await this.table(MATCHES_SHEET);
    const records: FixtureRecord[] = [];
    for (const row of table.rows) {
      const fixture = fixtureFromRow(row.values, this.options.defaultFormat);
      if (fixture) records.push({ fixture, row, headers: table.headers });
    }
    return records;
  }

  async findFixtureRecord(id: string): Promise<FixtureRecord | null> {
    const wanted = normalizeFixtureId(id);
    const records = await this.records();
    return records.find(record => record.fixture.id === wanted) ?? null;
  }

  async getFixture(id: string): Promise<Fixture | null> {
    const record = await this.findFixtureRecord(id);
    return record ? record.fixture : null;
  }

  async listFixtures(filter: FixtureFilter = {}): Promise<Fixture[]> {
    const records = await this.records();
    return records
      .map(record => record.fixture)
      .filter(fixture =>
        (filter.round === undefined || fixture.round === filter.round) &&
        (filter.group === undefined || fixture.group === filter.group) &&
        (filter.state === undefined || fixture.state === filter.state)
      );
  }

  async listOpenFixtures(round?: number): Promise<Fixture[]> {
    return this.listFixtures({ round, state: 'unplayed' });
  }

  /**
   * Latest round whose start date has passed. Falls back to the highest
   * round present among fixtures when no round has started.
   */
  async currentRound(): Promise<number | null> {
    const rounds = await this.table(ROUNDS_SHEET);
    const today = toSheetSerial(this.now(), this.options.timeZone);

    let current: number | null = null;
    for (const row of rounds.rows) {
      const round = cellNumber(row.values[ROUND_COLUMNS.round]);
      const start = parseSheetDate(row.values[ROUND_COLUMNS.start] ?? '');
      if (round === null || start === null || start > today) continue;
      if (current === null || round > current) current = round;
    }
    if (current !== null) return current;

    const fixtures = await this.listFixtures();
    return fixtures.reduce<number | null>(
      (highest, fixture) => (highest === null || fixture.round > highest ? fixture.round : highest),
      null
    );
  }

  async currentPlayers(): Promise<Player[]> {
    const table = await this.table(PLAYERS_SHEET);
    return table.rows
      .map(row => {
        const phone = cellText(row.values[PLAYER_COLUMNS.phone]);
        const player: Player = {
          name: cellText(row.values[PLAYER_COLUMNS.name]),
          group: cellText(row.values[PLAYER_COLUMNS.group]),
        };
        if (phone) player.phone = normalizePhone(phone);
        return player;
      })
      .filter(player => player.name.length > 0);
  }

  async findPlayerByPhone(phone: string): Promise<Player | null> {
    const wanted = normalizePhone(phone);
    if (!wanted) return null;
    const players = await this.currentPlayers();
    return players.find(player => player.phone === wanted) ?? null;
  }
}
