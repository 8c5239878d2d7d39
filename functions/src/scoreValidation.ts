/**
 * Score Validation
 *
 * Deterministic rules every score report passes before it is written,
 * whether it came from the language model or from the scores API.
 *
 * FILE LOCATION: functions/src/scoreValidation.ts
 * VERSION: V01.02
 */

import type { RuleViolation } from './errors';
import { PLAYER_LABELS } from './types';
import type { BreakFlag, MatchFormat, PlayerLabel, ScoreReport } from './types';
import { isRecord } from './utils';

// ============================================
// SNOOKER LIMITS
// ============================================

/**
 * Highest break possible with `reds` on the table: every red followed by
 * the black, then the six colours (2+3+4+5+6+7).
 */
export const maximumBreak = (reds: number): number => reds * 8 + 27;

/** Most frames one player can take in a best-of-N match */
export const maxFramesPerPlayer = (bestOf: number): number => Math.ceil(bestOf / 2);

// ============================================
// PAYLOAD PARSING
// ============================================

/** Score report as received, before any rule is applied */
export interface ScoreCandidate {
  player1Score: number;
  player2Score: number;
  breaks: Array<{ player: string; points: number }>;
}

/**
 * Structural check of a `{player1_score, player2_score, breaks}` payload.
 * Returns null when a field is missing or has the wrong type.
 */
export function parseScorePayload(value: unknown): ScoreCandidate | null {
  if (!isRecord(value)) return null;

  const { player1_score: player1Score, player2_score: player2Score } = value;
  if (typeof player1Score !== 'number' || typeof player2Score !== 'number') {
    return null;
  }

  const rawBreaks = value.breaks ?? [];
  if (!Array.isArray(rawBreaks)) return null;

  const breaks: ScoreCandidate['breaks'] = [];
  for (const item of rawBreaks) {
    if (!isRecord(item) || typeof item.player !== 'string' || typeof item.points !== 'number') {
      return null;
    }
    breaks.push({ player: item.player, points: item.points });
  }

  return { player1Score, player2Score, breaks };
}

// ============================================
// RULES
// ============================================

export type ValidationResult =
  | { ok: true; report: ScoreReport; flags: BreakFlag[] }
  | { ok: false; violation: RuleViolation };

const fail = (violation: RuleViolation): ValidationResult => ({ ok: false, violation });

const isPlayerLabel = (value: string): value is PlayerLabel =>
  PLAYER_LABELS.some(label => label === value);

export function validateScores(
  fixtureId: string,
  candidate: ScoreCandidate,
  format: MatchFormat
): ValidationResult {
  const { player1Score, player2Score } = candidate;
  const scoreline = `${player1Score}-${player2Score}`;

  for (const score of [player1Score, player2Score]) {
    if (!Number.isInteger(score)) {
      return fail({ rule: 'score-not-integer', message: `Scoreline ${scoreline} must use whole frames` });
    }
    if (score < 0) {
      return fail({ rule: 'score-negative', message: `Scoreline ${scoreline} has a negative frame count` });
    }
  }

  if (player1Score + player2Score > format.bestOf) {
    return fail({
      rule: 'frames-exceed-best-of',
      message: `Scoreline ${scoreline} has ${player1Score + player2Score} frames, a best-of-${format.bestOf} match has at most ${format.bestOf}`,
    });
  }

  const limit = maxFramesPerPlayer(format.bestOf);
  if (player1Score > limit || player2Score > limit) {
    return fail({
      rule: 'frames-exceed-winning-total',
      message: `Scoreline ${scoreline}: nobody wins more than ${limit} frames in a best-of-${format.bestOf} match`,
    });
  }

  const maximum = maximumBreak(format.reds);
  const flags: BreakFlag[] = [];
  const breaks: ScoreReport['breaks'] = [];

  for (const [index, brk] of candidate.breaks.entries()) {
    if (!isPlayerLabel(brk.player)) {
      return fail({ rule: 'break-unknown-player', message: `Break ${brk.points} belongs to an unknown player "${brk.player}"` });
    }
    if (!Number.isInteger(brk.points)) {
      return fail({ rule: 'break-not-integer', message: `Break ${brk.points} must be whole points` });
    }
    if (brk.points < 0) {
      return fail({ rule: 'break-negative', message: `Break ${brk.points} is negative` });
    }
    if (brk.points > maximum) {
      flags.push({ index, player: brk.player, points: brk.points, maximum });
    }
    breaks.push({ player: brk.player, points: brk.points });
  }

  return {
    ok: true,
    report: { fixtureId, player1Score, player2Score, breaks },
    flags,
  };
}
