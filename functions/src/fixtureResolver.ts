/**
 * Fixture Resolution
 *
 * Decides which fixture an inbound SMS reports on:
 * 1. A fixture id written in the message wins
 * 2. Otherwise the fixtures of the sender (phone registered in the players
 *    sheet), or every fixture for an unknown sender
 * 3. Narrowed to the fixtures whose player names the message mentions most,
 *    open before completed, then to the latest round
 *
 * Completed fixtures stay in the running so that a resent result is matched
 * to the fixture it was sent for and answered with "already recorded".
 *
 * FILE LOCATION: functions/src/fixtureResolver.ts
 */

import { LookupError } from './errors';
import type { FixtureStore } from './fixtureStore';
import type { Fixture, InboundMessage, Player } from './types';

export interface ResolvedFixture {
  fixture: Fixture;
  via: 'explicit_id' | 'sender' | 'mention';
}

// Fixture ids are five characters; shorter tokens are scores or noise
const MIN_ID_LENGTH = 4;
const MIN_NAME_PART_LENGTH = 3;

export const tokenize = (text: string): string[] =>
  text.normalize('NFC').toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

// Finnish messages inflect names ("Joonas" -> "Joonaksen"): compare stems
const stem = (part: string): string => part.slice(0, Math.max(MIN_NAME_PART_LENGTH, part.length - 2));

export const mentionsPlayer = (words: string[], name: string): boolean =>
  tokenize(name)
    .filter(part => part.length >= MIN_NAME_PART_LENGTH)
    .some(part => words.some(word => word.startsWith(stem(part))));

const involves = (fixture: Fixture, player: Player): boolean =>
  fixture.player1 === player.name || fixture.player2 === player.name;

/**
 * Names of a fixture that count as a mention. A registered sender's own name
 * says nothing about which of their matches is meant, so only the opponent counts.
 */
const mentionable = (fixture: Fixture, sender: Player | null): string[] => {
  if (!sender) return [fixture.player1, fixture.player2];
  return [fixture.player1, fixture.player2].filter(name => name !== sender.name);
};

const latestRound = (fixtures: Fixture[]): Fixture[] => {
  const latest = fixtures.reduce((max, fixture) => Math.max(max, fixture.round), -Infinity);
  return fixtures.filter(fixture => fixture.round === latest);
};

// Open fixtures win ties
const preferOpen = (fixtures: Fixture[]): Fixture[] => {
  const open = fixtures.filter(fixture => fixture.state === 'unplayed');
  return latestRound(open.length > 0 ? open : fixtures);
};

function pickCandidates(pool: Fixture[], words: string[], sender: Player | null): Fixture[] {
  const scored = pool.map(fixture => ({
    fixture,
    mentions: mentionable(fixture, sender).filter(name => mentionsPlayer(words, name)).length,
  }));
  const best = scored.reduce((max, entry) => Math.max(max, entry.mentions), 0);

  if (best > 0) {
    return preferOpen(scored.filter(entry => entry.mentions === best).map(entry => entry.fixture));
  }
  // Nobody named: only a registered sender's own fixtures are a safe guess
  return sender ? preferOpen(pool) : [];
}

export async function resolveFixture(store: FixtureStore, message: InboundMessage): Promise<ResolvedFixture> {
  const words = tokenize(message.body);
  const fixtures = await store.listFixtures();

  const explicit = fixtures.filter(fixture => fixture.id.length >= MIN_ID_LENGTH && words.includes(fixture.id));
  if (explicit.length === 1) {
    return { fixture: explicit[0], via: 'explicit_id' };
  }
  if (explicit.length > 1) {
    throw new LookupError('ambiguous', 'Message names several fixture ids', explicit.map(f => f.id));
  }

  const player = await store.findPlayerByPhone(message.sender);
  const pool = player ? fixtures.filter(fixture => involves(fixture, player)) : fixtures;
  const candidates = pickCandidates(pool, words, player);

  if (candidates.length === 0) {
    throw new LookupError('not_found', `No fixture matches the message from ${message.sender}`);
  }
  if (candidates.length > 1) {
    throw new LookupError('ambiguous', 'Message matches several fixtures', candidates.map(f => f.id));
  }
  return { fixture: candidates[0], via: player ? 'sender' : 'mention' };
}
