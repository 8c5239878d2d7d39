/**
 * SMS Reply Messages (English / Finnish)
 *
 * FILE LOCATION: functions/src/messages.ts
 */

import type { RuleViolation, ValidationRule } from './errors';
import { maxFramesPerPlayer } from './scoreValidation';
import type { BreakFlag, Fixture, MatchFormat, ScoreReport } from './types';

export type ReplyLanguage = 'eng' | 'fin';

export const REPLY_LANGUAGES: readonly ReplyLanguage[] = ['eng', 'fin'];

export interface RecordedSummary {
  fixture: Fixture;
  report: ScoreReport;
  flags: BreakFlag[];
  sheetUrl?: string;
}

export interface ReplyMessages {
  recorded(summary: RecordedSummary): string;
  notUnderstood(): string;
  inconsistent(fixture: Fixture, violation: RuleViolation): string;
  timeout(): string;
  modelUnavailable(): string;
  fixtureNotFound(): string;
  ambiguous(fixtureIds: string[]): string;
  alreadyComplete(fixture: Fixture): string;
  unknownFixtureId(fixtureId: string): string;
  storeUnavailable(): string;
}

/** Names are stored "Lastname Firstname"; replies use the first name */
export const givenName = (name: string): string => {
  const parts = name.trim().split(/\s+/);
  return parts[parts.length - 1] ?? name;
};

const pairing = (fixture: Fixture): string => `${fixture.player1} - ${fixture.player2}`;

const scoreline = (report: ScoreReport): string => `${report.player1Score}-${report.player2Score}`;

const breakList = (fixture: Fixture, report: ScoreReport): string =>
  report.breaks.map(brk => `${givenName(fixture[brk.player])} ${brk.points}`).join(', ');

// ============================================
// ENGLISH
// ============================================

const ENGLISH_RULES: Record<ValidationRule, (format: MatchFormat) => string> = {
  'score-not-integer': () => 'frame counts must be whole numbers',
  'score-negative': () => 'frame counts cannot be negative',
  'frames-exceed-best-of': f => `a best-of-${f.bestOf} match has at most ${f.bestOf} frames`,
  'frames-exceed-winning-total': f =>
    `nobody wins more than ${maxFramesPerPlayer(f.bestOf)} frames in a best-of-${f.bestOf} match`,
  'break-unknown-player': () => 'every break must belong to one of the two players',
  'break-not-integer': () => 'breaks must be whole points',
  'break-negative': () => 'breaks cannot be negative',
};

const ENGLISH: ReplyMessages = {
  recorded: ({ fixture, report, flags, sheetUrl }) => {
    const lines = [
      'Thank you, match was recorded as:',
      `Round ${fixture.round}: ${pairing(fixture)} ${scoreline(report)}.` +
        (report.breaks.length > 0 ? ` Breaks: ${breakList(fixture, report)}.` : ''),
    ];
    for (const flag of flags) {
      lines.push(
        `Please check: break ${flag.points} by ${givenName(fixture[flag.player])} is above the maximum of ${flag.maximum}.`
      );
    }
    if (sheetUrl) lines.push(sheetUrl);
    return lines.join('\n');
  },
  notUnderstood: () =>
    'Sorry, I could not understand the message. Please resend the result, e.g. "Virtanen - Mäkinen 2-1, break 45 Virtanen".',
  inconsistent: (fixture, violation) =>
    `Sorry, the result for ${pairing(fixture)} does not add up: ${ENGLISH_RULES[violation.rule](fixture.format)}. ` +
    'Please resend the corrected score.',
  timeout: () => 'Sorry, reading your message took too long. Please send it again.',
  modelUnavailable: () => 'Sorry, results cannot be read right now. Please try again later.',
  fixtureNotFound: () =>
    'Sorry, I could not find an open match for your message. Please resend it with the match ID.',
  ambiguous: ids => `Your message fits several matches (${ids.join(', ')}). Please resend it with the match ID.`,
  alreadyComplete: fixture => `Match ${pairing(fixture)} (round ${fixture.round}) has already been recorded.`,
  unknownFixtureId: id => `Match ${id} was not found. Please check the match ID and resend.`,
  storeUnavailable: () => 'The score sheet is unavailable right now. Please try again later.',
};

// ============================================
// FINNISH
// ============================================

const FINNISH_RULES: Record<ValidationRule, (format: MatchFormat) => string> = {
  'score-not-integer': () => 'erien määrän on oltava kokonaisluku',
  'score-negative': () => 'erien määrä ei voi olla negatiivinen',
  'frames-exceed-best-of': f => `paras ${f.bestOf}:stä -ottelussa pelataan enintään ${f.bestOf} erää`,
  'frames-exceed-winning-total': f =>
    `kukaan ei voita yli ${maxFramesPerPlayer(f.bestOf)} erää paras ${f.bestOf}:stä -ottelussa`,
  'break-unknown-player': () => 'jokaisen breikin on kuuluttava jommallekummalle pelaajalle',
  'break-not-integer': () => 'breikin on oltava kokonaisluku',
  'break-negative': () => 'breikki ei voi olla negatiivinen',
};

const FINNISH: ReplyMessages = {
  recorded: ({ fixture, report, flags, sheetUrl }) => {
    const lines = [
      'Kiitos, ottelu kirjattiin:',
      `Kierros ${fixture.round}: ${pairing(fixture)} ${scoreline(report)}.` +
        (report.breaks.length > 0 ? ` Breikit: ${breakList(fixture, report)}.` : ''),
    ];
    for (const flag of flags) {
      lines.push(
        `Tarkista: breikki ${flag.points} (${givenName(fixture[flag.player])}) ylittää maksimin ${flag.maximum}.`
      );
    }
    if (sheetUrl) lines.push(sheetUrl);
    return lines.join('\n');
  },
  notUnderstood: () =>
    'En ymmärtänyt viestiä, pahoittelut. Lähetä tulos esimerkiksi muodossa "Virtanen - Mäkinen 2-1, breikki Virtanen 45".',
  inconsistent: (fixture, violation) =>
    `Tulos ottelulle ${pairing(fixture)} ei täsmää: ${FINNISH_RULES[violation.rule](fixture.format)}. ` +
    'Lähetä korjattu tulos.',
  timeout: () => 'Viestin käsittely kesti liian kauan. Lähetä viesti uudelleen.',
  modelUnavailable: () => 'Tuloksia ei juuri nyt voida lukea. Yritä myöhemmin uudelleen.',
  fixtureNotFound: () =>
    'En löytänyt viestiisi sopivaa avointa ottelua. Lähetä tulos uudelleen ottelun tunnuksen kanssa.',
  ambiguous: ids => `Viestisi sopii useaan otteluun (${ids.join(', ')}). Lähetä tulos uudelleen ottelun tunnuksen kanssa.`,
  alreadyComplete: fixture => `Ottelu ${pairing(fixture)} (kierros ${fixture.round}) on jo kirjattu.`,
  unknownFixtureId: id => `Ottelua ${id} ei löytynyt. Tarkista ottelun tunnus ja lähetä uudelleen.`,
  storeUnavailable: () => 'Tulostaulukko ei ole juuri nyt käytettävissä. Yritä myöhemmin uudelleen.',
};

export const getMessages = (language: ReplyLanguage): ReplyMessages =>
  language === 'eng' ? ENGLISH : FINNISH;
