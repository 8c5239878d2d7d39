/**
 * Score Relay Types
 *
 * Fixtures, score reports and breaks as they flow through the SMS pipeline
 * and the query API.
 *
 * FILE LOCATION: functions/src/types.ts
 * VERSION: V01.02
 */

// ============================================
// MATCH FORMAT
// ============================================

export interface MatchFormat {
  /** Maximum number of frames contested */
  bestOf: number;

  /** Red balls on the table (15, 10, or 6 for six-red) */
  reds: number;
}

// ============================================
// PLAYERS
// ============================================

export interface Player {
  /** Full name as written in the players sheet ("Lastname Firstname") */
  name: string;
  group: string;
  /** E.164 phone number the player reports scores from */
  phone?: string;
}

// ============================================
// FIXTURES
// ============================================

export type FixtureState = 'unplayed' | 'complete';

export interface MatchOutcome {
  player1Score: number;
  player2Score: number;
  /** Winner's name, null for a drawn even-frame match */
  winner: string | null;
  /** YYYY-MM-DD */
  date: string | null;
}

export interface Fixture {
  id: string;
  round: number;
  group: string;
  player1: string;
  player2: string;
  format: MatchFormat;
  state: FixtureState;
  outcome: MatchOutcome | null;
}

// ============================================
// SCORE REPORTS
// ============================================

/** Which side of the fixture a break belongs to */
export type PlayerLabel = 'player1' | 'player2';

export const PLAYER_LABELS: readonly PlayerLabel[] = ['player1', 'player2'];

export interface Break {
  player: PlayerLabel;
  points: number;
}

export interface ScoreReport {
  fixtureId: string;
  player1Score: number;
  player2Score: number;
  breaks: Break[];
}

/** A break above the theoretical maximum for the reds in play */
export interface BreakFlag {
  index: number;
  player: PlayerLabel;
  points: number;
  maximum: number;
}

// ============================================
// INBOUND MESSAGES
// ============================================

export interface InboundMessage {
  /** Sender phone number (Twilio `From`) */
  sender: string;
  /** Free-text message body (Twilio `Body`) */
  body: string;
  receivedAt: Date;
}
