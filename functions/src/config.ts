/**
 * Runtime configuration
 *
 * Parameters are declared with firebase-functions/params and read into a
 * Settings struct inside each request handler (params have no value at
 * deploy/analysis time).
 *
 * FILE LOCATION: functions/src/config.ts
 */

import { defineBoolean, defineInt, defineSecret, defineString } from 'firebase-functions/params';
import { REPLY_LANGUAGES } from './messages';
import type { ReplyLanguage } from './messages';
import type { MatchFormat } from './types';

// ============================================
// PARAMS
// ============================================

const SHEET_ID = defineString('SHEET_ID');
const SHEET_URL = defineString('SHEET_URL', { default: '' });
const REPLY_LANGUAGE = defineString('REPLY_LANGUAGE', { default: 'fin' });
const LLM_MODEL = defineString('LLM_MODEL', { default: 'gemini-2.5-flash' });
const MODEL_TIMEOUT_MS = defineInt('MODEL_TIMEOUT_MS', { default: 20000 });
const BEST_OF = defineInt('BEST_OF', { default: 3 });
const REDS_COUNT = defineInt('REDS_COUNT', { default: 15 });
const SIX_RED_VARIANT = defineBoolean('SIX_RED_VARIANT', { default: false });
const TIME_ZONE = defineString('TIME_ZONE', { default: 'Europe/Helsinki' });
const SMS_WEBHOOK_URL = defineString('SMS_WEBHOOK_URL', { default: '' });

export const GEMINI_API_KEY = defineSecret('GEMINI_API_KEY');
export const TWILIO_AUTH_TOKEN = defineSecret('TWILIO_AUTH_TOKEN');
export const SCORES_API_SECRET = defineSecret('SCORES_API_SECRET');

// ============================================
// TOURNAMENT FORMAT
// ============================================

export type RedsCount = 10 | 15;

export interface TournamentConfig {
  redsCount: RedsCount;
  sixRedVariant: boolean;
  bestOf: number;
}

export const SIX_RED_REDS = 6;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseTournamentConfig(input: { redsCount: number; sixRedVariant: boolean; bestOf: number }): TournamentConfig {
  const { redsCount, sixRedVariant, bestOf } = input;
  if (redsCount !== 10 && redsCount !== 15) {
    throw new ConfigError(`REDS_COUNT must be 10 or 15, got ${redsCount}`);
  }
  if (!Number.isInteger(bestOf) || bestOf < 1) {
    throw new ConfigError(`BEST_OF must be a positive integer, got ${bestOf}`);
  }
  return { redsCount, sixRedVariant, bestOf };
}

/** Format for fixtures that do not set their own */
export const defaultMatchFormat = (config: TournamentConfig): MatchFormat => ({
  bestOf: config.bestOf,
  reds: config.sixRedVariant ? SIX_RED_REDS : config.redsCount,
});

export const parseReplyLanguage = (value: string): ReplyLanguage => {
  const language = REPLY_LANGUAGES.find(candidate => candidate === value.trim().toLowerCase());
  if (!language) {
    throw new ConfigError(`REPLY_LANGUAGE must be one of ${REPLY_LANGUAGES.join(', ')}, got "${value}"`);
  }
  return language;
};

// ============================================
// SETTINGS
// ============================================

export interface Settings {
  sheetId: string;
  sheetUrl: string;
  replyLanguage: ReplyLanguage;
  llmModel: string;
  modelTimeoutMs: number;
  tournament: TournamentConfig;
  timeZone: string;
  smsWebhookUrl: string;
}

export function loadSettings(): Settings {
  const sheetId = SHEET_ID.value();
  if (!sheetId) {
    throw new ConfigError('SHEET_ID is not configured');
  }
  return {
    sheetId,
    sheetUrl: SHEET_URL.value(),
    replyLanguage: parseReplyLanguage(REPLY_LANGUAGE.value()),
    llmModel: LLM_MODEL.value(),
    modelTimeoutMs: MODEL_TIMEOUT_MS.value(),
    tournament: parseTournamentConfig({
      redsCount: REDS_COUNT.value(),
      sixRedVariant: SIX_RED_VARIANT.value(),
      bestOf: BEST_OF.value(),
    }),
    timeZone: TIME_ZONE.value(),
    smsWebhookUrl: SMS_WEBHOOK_URL.value(),
  };
}
