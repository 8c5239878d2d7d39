/**
 * Test Utilities
 *
 * In-memory spreadsheet, scripted language model and a small league to run
 * the relay against.
 *
 * FILE LOCATION: tests/utils.ts
 */

import type { ConversationOutcome } from '../functions/src/conversation';
import { StoreUnavailableError } from '../functions/src/errors';
import type { HttpRequest, HttpResponse } from '../functions/src/http';
import type { InboundLog } from '../functions/src/inboundLog';
import type { JsonGenerationRequest, LanguageModel } from '../functions/src/scoreExtraction';
import type { CellUpdate, CellValue, TabularStore } from '../functions/src/sheets';
import type { InboundMessage, MatchFormat } from '../functions/src/types';

// ============================================
// In-memory tabular store
// ============================================

export class MemoryTabularStore implements TabularStore {
  readonly sheets = new Map<string, CellValue[][]>();
  readonly reads: string[] = [];
  readonly cellUpdates: Array<CellUpdate & { sheet: string }> = [];
  failReads = false;
  failAppends = false;
  failUpdates = false;

  constructor(initial: Record<string, CellValue[][]> = {}) {
    for (const [sheet, rows] of Object.entries(initial)) {
      this.sheets.set(sheet, rows.map(row => [...row]));
    }
  }

  async readValues(sheet: string): Promise<CellValue[][]> {
    this.reads.push(sheet);
    if (this.failReads) throw new StoreUnavailableError(`Could not read sheet ${sheet}`);
    return (this.sheets.get(sheet) ?? []).map(row => [...row]);
  }

  async appendValues(sheet: string, rows: CellValue[][]): Promise<void> {
    if (this.failAppends) throw new StoreUnavailableError(`Could not append to sheet ${sheet}`);
    const data = this.sheets.get(sheet) ?? [];
    data.push(...rows.map(row => [...row]));
    this.sheets.set(sheet, data);
  }

  async updateCells(sheet: string, updates: CellUpdate[]): Promise<void> {
    if (this.failUpdates) throw new StoreUnavailableError(`Could not update sheet ${sheet}`);
    const data = this.sheets.get(sheet) ?? [];
    for (const update of updates) {
      const row = data[update.rowNumber - 1] ?? [];
      while (row.length < update.column) row.push('');
      row[update.column] = update.value;
      data[update.rowNumber - 1] = row;
      this.cellUpdates.push({ sheet, ...update });
    }
    this.sheets.set(sheet, data);
  }

  /** Data rows (header excluded) */
  rows(sheet: string): CellValue[][] {
    return (this.sheets.get(sheet) ?? []).slice(1);
  }
}

// ============================================
// League fixtures
// ============================================

export const MATCH_HEADERS = [
  'id', 'round', 'group', 'player1', 'player2', 'best_of', 'reds',
  'date', 'player1_score', 'player2_score', 'winner', 'log',
];
export const BREAK_HEADERS = ['timestamp', 'source', 'passage', 'player', 'break', 'date', 'round', 'match_id'];
export const PLAYER_HEADERS = ['name', 'group', 'phone'];
export const ROUND_HEADERS = ['round', 'start', 'end'];

/** 2024-03-15 12:00 in Helsinki */
export const NOW = new Date('2024-03-15T10:00:00Z');
export const NOW_SERIAL = 45366;
export const TIME_ZONE = 'Europe/Helsinki';
export const DEFAULT_FORMAT: MatchFormat = { bestOf: 3, reds: 15 };

export interface MatchRowInput {
  id: string;
  round?: number;
  group?: string;
  player1?: string;
  player2?: string;
  bestOf?: CellValue;
  reds?: CellValue;
  date?: CellValue;
  player1Score?: CellValue;
  player2Score?: CellValue;
  winner?: string;
  log?: string;
}

export const matchRow = (input: MatchRowInput): CellValue[] => [
  input.id,
  input.round ?? 1,
  input.group ?? 'A',
  input.player1 ?? 'Virtanen Aatos',
  input.player2 ?? 'Mäkinen Joonas',
  input.bestOf ?? 3,
  input.reds ?? 15,
  input.date ?? '',
  input.player1Score ?? '',
  input.player2Score ?? '',
  input.winner ?? '',
  input.log ?? '',
];

export const LEAGUE_MATCHES: MatchRowInput[] = [
  { id: 'y98ad', round: 2, group: 'A', player1: 'Virtanen Aatos', player2: 'Mäkinen Joonas' },
  { id: 'k2m7q', round: 2, group: 'B', player1: 'Laine Sinikka', player2: 'Tuomi Kari' },
  {
    id: 'p4r8s', round: 1, group: 'A', player1: 'Virtanen Aatos', player2: 'Nikula Eero',
    date: 45356, player1Score: 2, player2Score: 0, winner: 'Virtanen Aatos', log: 'api',
  },
  { id: 't6v3w', round: 2, group: 'A', player1: 'Mäkinen Joonas', player2: 'Nikula Eero' },
  { id: 'z9x1c', round: 3, group: 'B', player1: 'Laine Sinikka', player2: 'Tuomi Kari' },
];

export const LEAGUE_PLAYERS: CellValue[][] = [
  ['Virtanen Aatos', 'A', '+358 40 111 1111'],
  ['Mäkinen Joonas', 'A', '+358402222222'],
  ['Laine Sinikka', 'B', '00358403333333'],
  ['Tuomi Kari', 'B', '+358404444444'],
  ['Nikula Eero', 'A', ''],
];

export const LEAGUE_ROUNDS: CellValue[][] = [
  [1, '01.03.2024', '10.03.2024'],
  [2, 45362, 45371],
  [3, '2024-03-21', '2024-03-31'],
];

export interface LeagueInput {
  matches?: MatchRowInput[];
  breaks?: CellValue[][];
  players?: CellValue[][];
  rounds?: CellValue[][];
}

export const createLeagueStore = (input: LeagueInput = {}): MemoryTabularStore =>
  new MemoryTabularStore({
    _matches: [MATCH_HEADERS, ...(input.matches ?? LEAGUE_MATCHES).map(matchRow)],
    _breaks: [BREAK_HEADERS, ...(input.breaks ?? [])],
    _players: [PLAYER_HEADERS, ...(input.players ?? LEAGUE_PLAYERS)],
    _rounds: [ROUND_HEADERS, ...(input.rounds ?? LEAGUE_ROUNDS)],
  });

// ============================================
// Scripted language model
// ============================================

export type ScriptedResponse = string | Error | (() => Promise<string>);

export class FakeLanguageModel implements LanguageModel {
  readonly requests: JsonGenerationRequest[] = [];

  constructor(private readonly responses: ScriptedResponse[]) {}

  async generateJson(request: JsonGenerationRequest): Promise<string> {
    this.requests.push(request);
    const next = this.responses.shift();
    if (next === undefined) throw new Error('No scripted response left');
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next();
    return next;
  }
}

export const scoreJson = (
  player1Score: number,
  player2Score: number,
  breaks: Array<{ player: string; points: number }> = []
): string => JSON.stringify({ player1_score: player1Score, player2_score: player2Score, breaks });

// ============================================
// Inbound log
// ============================================

export class MemoryInboundLog implements InboundLog {
  readonly entries: Array<{ message: InboundMessage; outcome: ConversationOutcome }> = [];

  async record(message: InboundMessage, outcome: ConversationOutcome): Promise<void> {
    this.entries.push({ message, outcome });
  }
}

// ============================================
// HTTP request / response
// ============================================

export const createRequest = (overrides: Partial<HttpRequest> = {}): HttpRequest => ({
  method: 'GET',
  path: '/',
  headers: {},
  body: undefined,
  query: {},
  ...overrides,
});

export class FakeResponse implements HttpResponse {
  statusCode = 200;
  body: unknown = undefined;
  text: string | undefined = undefined;
  contentType: string | undefined = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  send(body: string): this {
    this.text = body;
    return this;
  }

  type(contentType: string): this {
    this.contentType = contentType;
    return this;
  }
}
