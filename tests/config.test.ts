/**
 * Configuration Tests
 *
 * FILE LOCATION: tests/config.test.ts
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  defaultMatchFormat,
  parseReplyLanguage,
  parseTournamentConfig,
} from '../functions/src/config';

describe('parseTournamentConfig', () => {
  it('accepts 15 and 10 reds', () => {
    expect(parseTournamentConfig({ redsCount: 15, sixRedVariant: false, bestOf: 3 })).toEqual({
      redsCount: 15,
      sixRedVariant: false,
      bestOf: 3,
    });
    expect(parseTournamentConfig({ redsCount: 10, sixRedVariant: false, bestOf: 5 }).redsCount).toBe(10);
  });

  it('rejects other reds counts', () => {
    expect(() => parseTournamentConfig({ redsCount: 6, sixRedVariant: true, bestOf: 3 })).toThrow(
      'REDS_COUNT must be 10 or 15, got 6'
    );
  });

  it('rejects a best-of that is not a positive integer', () => {
    expect(() => parseTournamentConfig({ redsCount: 15, sixRedVariant: false, bestOf: 0 })).toThrow(ConfigError);
    expect(() => parseTournamentConfig({ redsCount: 15, sixRedVariant: false, bestOf: 2.5 })).toThrow(
      'BEST_OF must be a positive integer, got 2.5'
    );
  });
});

describe('defaultMatchFormat', () => {
  it('uses the configured reds', () => {
    expect(defaultMatchFormat({ redsCount: 10, sixRedVariant: false, bestOf: 5 })).toEqual({ bestOf: 5, reds: 10 });
  });

  it('plays six reds in the six-red variant', () => {
    expect(defaultMatchFormat({ redsCount: 15, sixRedVariant: true, bestOf: 3 })).toEqual({ bestOf: 3, reds: 6 });
  });
});

describe('parseReplyLanguage', () => {
  it('accepts eng and fin in any case', () => {
    expect(parseReplyLanguage('ENG')).toBe('eng');
    expect(parseReplyLanguage(' fin ')).toBe('fin');
  });

  it('rejects other languages', () => {
    expect(() => parseReplyLanguage('swe')).toThrow('REPLY_LANGUAGE must be one of eng, fin, got "swe"');
  });
});
