/**
 * Scores Query API
 *
 * Routes (all require the shared secret):
 * - GET  /fixtures          open fixtures of the current round
 * - GET  /matches           all fixtures, ?round=&group=&unplayed=&completed=
 * - GET  /matches/:id       one fixture, with its outcome once complete
 * - POST /scores            record a result, id in the body
 * - POST /scores/:id        record a result, id in the path
 *
 * The secret is accepted as the raw Authorization header, a Bearer token, or
 * the password of Basic auth.
 *
 * FILE LOCATION: functions/src/scoresApi.ts
 * VERSION: V01.04
 */

import * as functions from 'firebase-functions';
import * as crypto from 'crypto';
import { StoreUnavailableError, WriteError, errorMessage } from './errors';
import type { FixtureFilter, FixtureStore } from './fixtureStore';
import { headerValue } from './http';
import type { HttpRequest, HttpResponse } from './http';
import type { ResultWriter } from './resultWriter';
import { parseScorePayload, validateScores } from './scoreValidation';
import type { Fixture } from './types';
import { isRecord } from './utils';

const logger = functions.logger;

export interface ScoresApiDeps {
  fixtures: FixtureStore;
  writer: ResultWriter;
  secret: string;
  now?: () => Date;
}

// ============================================
// AUTH
// ============================================

const credentialFrom = (header: string): string => {
  const [scheme, ...rest] = header.trim().split(/\s+/);
  const token = rest.join(' ');
  if (/^bearer$/i.test(scheme) && token) {
    return token;
  }
  if (/^basic$/i.test(scheme) && token) {
    const decoded = Buffer.from(token, 'base64').toString('utf8');
    const separator = decoded.indexOf(':');
    return separator >= 0 ? decoded.slice(separator + 1) : decoded;
  }
  return header.trim();
};

export function isAuthorized(header: string | undefined, secret: string): boolean {
  if (!secret || !header) return false;
  const given = Buffer.from(credentialFrom(header));
  const expected = Buffer.from(secret);
  return given.length === expected.length && crypto.timingSafeEqual(given, expected);
}

// ============================================
// SERIALIZATION
// ============================================

export const matchJson = (fixture: Fixture) => ({
  id: fixture.id,
  round: fixture.round,
  format: { reds: fixture.format.reds, bestOf: fixture.format.bestOf },
  group: fixture.group,
  player1: fixture.player1,
  player2: fixture.player2,
  state: fixture.state,
  ...(fixture.outcome
    ? {
        outcome: {
          player1_score: fixture.outcome.player1Score,
          player2_score: fixture.outcome.player2Score,
          winner: fixture.outcome.winner,
          date: fixture.outcome.date,
        },
      }
    : {}),
});

class HttpError extends Error {
  constructor(readonly status: number, message: string, readonly extra: Record<string, unknown> = {}) {
    super(message);
    this.name = 'HttpError';
  }
}

const WRITE_ERROR_STATUS: Record<WriteError['kind'], number> = {
  already_complete: 409,
  fixture_not_found: 404,
  store_unavailable: 503,
};

const isTruthyFlag = (value: unknown): boolean =>
  typeof value === 'string' && ['1', 'true', 'yes'].includes(value.toLowerCase());

// ============================================
// ROUTES
// ============================================

async function listCurrentFixtures(deps: ScoresApiDeps) {
  const round = await deps.fixtures.currentRound();
  const matches = round === null ? [] : await deps.fixtures.listOpenFixtures(round);
  return { round, matches: matches.map(matchJson) };
}

async function listMatches(req: HttpRequest, deps: ScoresApiDeps) {
  const filter: FixtureFilter = {};
  const { round, group, unplayed, completed } = req.query;

  if (typeof round === 'string' && round !== '') {
    const parsed = Number(round);
    if (!Number.isInteger(parsed)) {
      throw new HttpError(400, `Invalid round "${round}"`);
    }
    filter.round = parsed;
  }
  if (typeof group === 'string' && group !== '') {
    filter.group = group;
  }
  const wantUnplayed = isTruthyFlag(unplayed);
  const wantCompleted = isTruthyFlag(completed);
  if (wantUnplayed !== wantCompleted) {
    filter.state = wantUnplayed ? 'unplayed' : 'complete';
  }

  const matches = await deps.fixtures.listFixtures(filter);
  return { matches: matches.map(matchJson) };
}

const decodeSegment = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, `Malformed path segment "${segment}"`);
  }
};

async function getMatch(id: string, deps: ScoresApiDeps) {
  const fixture = await deps.fixtures.getFixture(id);
  if (!fixture) {
    throw new HttpError(404, `Match ${id} not found`);
  }
  return matchJson(fixture);
}

const parseBody = (body: unknown): Record<string, unknown> => {
  if (isRecord(body)) return body;
  if (typeof body === 'string' && body.trim()) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new HttpError(400, 'Request body is not valid JSON');
    }
    if (isRecord(parsed)) return parsed;
  }
  throw new HttpError(400, 'Request body must be a JSON object');
};

async function postScores(req: HttpRequest, pathId: string | undefined, deps: ScoresApiDeps) {
  const body = parseBody(req.body);
  const id = pathId ?? (typeof body.id === 'string' ? body.id : undefined);
  if (!id) {
    throw new HttpError(400, 'Missing match id');
  }

  const candidate = parseScorePayload(body);
  if (!candidate) {
    throw new HttpError(400, 'player1_score and player2_score must be numbers, breaks a list of {player, points}');
  }

  const fixture = await deps.fixtures.getFixture(id);
  if (!fixture) {
    throw new HttpError(404, `Match ${id} not found`);
  }
  if (fixture.state === 'complete') {
    throw new HttpError(409, `Match ${fixture.id} already has a result`);
  }

  const validation = validateScores(fixture.id, candidate, fixture.format);
  if (!validation.ok) {
    throw new HttpError(400, validation.violation.message, { rule: validation.violation.rule });
  }

  const ack = await deps.writer.commit(fixture.id, validation.report, {
    source: 'api',
    receivedAt: deps.now ? deps.now() : new Date(),
  });
  return matchJson(ack.fixture);
}

// ============================================
// HANDLER
// ============================================

export async function handleApiRequest(req: HttpRequest, res: HttpResponse, deps: ScoresApiDeps): Promise<void> {
  if (!isAuthorized(headerValue(req.headers.authorization), deps.secret)) {
    logger.warn('[API] Unauthorized request', { method: req.method, path: req.path });
    res.status(401).json({ detail: 'Missing or invalid credentials' });
    return;
  }

  try {
    const segments = req.path.split('/').filter(segment => segment.length > 0).map(decodeSegment);
    const [resource, id, ...extra] = segments;

    if (extra.length === 0 && resource === 'fixtures' && id === undefined) {
      if (req.method !== 'GET') throw new HttpError(405, 'Method not allowed');
      res.status(200).json(await listCurrentFixtures(deps));
      return;
    }
    if (extra.length === 0 && resource === 'matches') {
      if (req.method !== 'GET') throw new HttpError(405, 'Method not allowed');
      res.status(200).json(id === undefined ? await listMatches(req, deps) : await getMatch(id, deps));
      return;
    }
    if (extra.length === 0 && resource === 'scores') {
      if (req.method !== 'POST') throw new HttpError(405, 'Method not allowed');
      const match = await postScores(req, id, deps);
      logger.info('[API] Result recorded', { fixtureId: match.id });
      res.status(201).json(match);
      return;
    }
    throw new HttpError(404, `No route for ${req.method} ${req.path}`);
  } catch (error) {
    if (error instanceof HttpError) {
      res.status(error.status).json({ detail: error.message, ...error.extra });
      return;
    }
    if (error instanceof WriteError) {
      res.status(WRITE_ERROR_STATUS[error.kind]).json({ detail: error.message });
      return;
    }
    if (error instanceof StoreUnavailableError) {
      res.status(503).json({ detail: error.message });
      return;
    }
    logger.error('[API] Request failed', { method: req.method, path: req.path, error: errorMessage(error) });
    res.status(500).json({ detail: 'Internal error' });
  }
}
