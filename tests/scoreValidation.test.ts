/**
 * Score Validation Tests
 *
 * FILE LOCATION: tests/scoreValidation.test.ts
 */

import { describe, it, expect } from 'vitest';
import {
  maximumBreak,
  maxFramesPerPlayer,
  parseScorePayload,
  validateScores,
} from '../functions/src/scoreValidation';
import type { ScoreCandidate } from '../functions/src/scoreValidation';
import type { MatchFormat } from '../functions/src/types';

// ============================================
// Test Fixtures
// ============================================

const BEST_OF_3: MatchFormat = { bestOf: 3, reds: 15 };

const candidate = (overrides: Partial<ScoreCandidate> = {}): ScoreCandidate => ({
  player1Score: 2,
  player2Score: 1,
  breaks: [],
  ...overrides,
});

// ============================================
// Format limits
// ============================================

describe('maximumBreak', () => {
  it('is 147 with 15 reds', () => {
    expect(maximumBreak(15)).toBe(147);
  });

  it('is 107 with 10 reds', () => {
    expect(maximumBreak(10)).toBe(107);
  });

  it('is 75 in six-red', () => {
    expect(maximumBreak(6)).toBe(75);
  });
});

describe('maxFramesPerPlayer', () => {
  it('rounds half of an odd best-of up', () => {
    expect(maxFramesPerPlayer(3)).toBe(2);
    expect(maxFramesPerPlayer(7)).toBe(4);
  });

  it('is half of an even best-of', () => {
    expect(maxFramesPerPlayer(4)).toBe(2);
  });
});

// ============================================
// parseScorePayload
// ============================================

describe('parseScorePayload', () => {
  it('reads scores and breaks', () => {
    expect(
      parseScorePayload({ player1_score: 2, player2_score: 1, breaks: [{ player: 'player1', points: 50 }] })
    ).toEqual({ player1Score: 2, player2Score: 1, breaks: [{ player: 'player1', points: 50 }] });
  });

  it('defaults missing breaks to an empty list', () => {
    expect(parseScorePayload({ player1_score: 0, player2_score: 2 })).toEqual({
      player1Score: 0,
      player2Score: 2,
      breaks: [],
    });
  });

  it('rejects non-objects', () => {
    expect(parseScorePayload(null)).toBeNull();
    expect(parseScorePayload('2-1')).toBeNull();
    expect(parseScorePayload([2, 1])).toBeNull();
  });

  it('rejects scores given as strings', () => {
    expect(parseScorePayload({ player1_score: '2', player2_score: 1 })).toBeNull();
  });

  it('rejects a break without numeric points', () => {
    expect(
      parseScorePayload({ player1_score: 2, player2_score: 1, breaks: [{ player: 'player1', points: 'fifty' }] })
    ).toBeNull();
  });

  it('rejects breaks that are not a list', () => {
    expect(parseScorePayload({ player1_score: 2, player2_score: 1, breaks: { player: 'player1' } })).toBeNull();
  });
});

// ============================================
// validateScores
// ============================================

describe('validateScores', () => {
  it.each([
    [2, 0],
    [2, 1],
    [1, 2],
    [0, 2],
    [1, 1],
    [0, 0],
  ])('accepts %i-%i in a best-of-3 match', (player1Score, player2Score) => {
    const result = validateScores('y98ad', candidate({ player1Score, player2Score }), BEST_OF_3);
    expect(result.ok).toBe(true);
  });

  it('returns the report with its breaks in order', () => {
    const result = validateScores(
      'y98ad',
      candidate({ breaks: [{ player: 'player1', points: 50 }, { player: 'player2', points: 30 }] }),
      BEST_OF_3
    );

    expect(result).toEqual({
      ok: true,
      report: {
        fixtureId: 'y98ad',
        player1Score: 2,
        player2Score: 1,
        breaks: [{ player: 'player1', points: 50 }, { player: 'player2', points: 30 }],
      },
      flags: [],
    });
  });

  it('rejects more frames than the best-of allows', () => {
    const result = validateScores('y98ad', candidate({ player1Score: 4, player2Score: 1 }), BEST_OF_3);

    expect(result).toEqual({
      ok: false,
      violation: {
        rule: 'frames-exceed-best-of',
        message: 'Scoreline 4-1 has 5 frames, a best-of-3 match has at most 3',
      },
    });
  });

  it('rejects a player taking more than the winning total', () => {
    const result = validateScores('y98ad', candidate({ player1Score: 3, player2Score: 0 }), BEST_OF_3);

    expect(result).toEqual({
      ok: false,
      violation: {
        rule: 'frames-exceed-winning-total',
        message: 'Scoreline 3-0: nobody wins more than 2 frames in a best-of-3 match',
      },
    });
  });

  it('rejects fractional frames', () => {
    const result = validateScores('y98ad', candidate({ player1Score: 1.5 }), BEST_OF_3);
    expect(result.ok === false && result.violation.rule).toBe('score-not-integer');
  });

  it('rejects negative frames', () => {
    const result = validateScores('y98ad', candidate({ player2Score: -1 }), BEST_OF_3);
    expect(result.ok === false && result.violation.message).toBe('Scoreline 2--1 has a negative frame count');
  });

  it('rejects a break for someone outside the match', () => {
    const result = validateScores('y98ad', candidate({ breaks: [{ player: 'referee', points: 40 }] }), BEST_OF_3);

    expect(result).toEqual({
      ok: false,
      violation: { rule: 'break-unknown-player', message: 'Break 40 belongs to an unknown player "referee"' },
    });
  });

  it('rejects negative and fractional breaks', () => {
    const negative = validateScores('y98ad', candidate({ breaks: [{ player: 'player1', points: -5 }] }), BEST_OF_3);
    const fractional = validateScores('y98ad', candidate({ breaks: [{ player: 'player1', points: 20.5 }] }), BEST_OF_3);

    expect(negative.ok === false && negative.violation.rule).toBe('break-negative');
    expect(fractional.ok === false && fractional.violation.rule).toBe('break-not-integer');
  });

  it('flags a break above the maximum without rejecting it', () => {
    const result = validateScores(
      'y98ad',
      candidate({ breaks: [{ player: 'player1', points: 40 }, { player: 'player2', points: 110 }] }),
      { bestOf: 3, reds: 10 }
    );

    expect(result.ok).toBe(true);
    expect(result.ok && result.flags).toEqual([{ index: 1, player: 'player2', points: 110, maximum: 107 }]);
    expect(result.ok && result.report.breaks[1]).toEqual({ player: 'player2', points: 110 });
  });

  it('accepts a 147', () => {
    const result = validateScores('y98ad', candidate({ breaks: [{ player: 'player1', points: 147 }] }), BEST_OF_3);
    expect(result.ok && result.flags).toEqual([]);
  });

  it('accepts a drawn even best-of', () => {
    const result = validateScores('y98ad', candidate({ player1Score: 2, player2Score: 2 }), { bestOf: 4, reds: 15 });
    expect(result.ok).toBe(true);
  });
});
