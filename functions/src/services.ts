/**
 * Per-request wiring of stores, extractor, writer and conversation handler.
 *
 * FILE LOCATION: functions/src/services.ts
 */

import { GoogleGenAI } from '@google/genai';
import { defaultMatchFormat } from './config';
import type { Settings } from './config';
import { ConversationHandler } from './conversation';
import { SheetFixtureStore } from './fixtureStore';
import { getMessages } from './messages';
import { SheetResultWriter } from './resultWriter';
import { GeminiLanguageModel, LlmScoreExtractor } from './scoreExtraction';
import type { LanguageModel } from './scoreExtraction';
import { GoogleSheetsStore } from './sheets';
import type { TabularStore } from './sheets';

export interface RelayServices {
  fixtures: SheetFixtureStore;
  writer: SheetResultWriter;
}

export function createRelayServices(settings: Settings, store?: TabularStore): RelayServices {
  const tabular = store ?? new GoogleSheetsStore(settings.sheetId);
  const fixtures = new SheetFixtureStore(tabular, {
    defaultFormat: defaultMatchFormat(settings.tournament),
    timeZone: settings.timeZone,
  });
  const writer = new SheetResultWriter(tabular, fixtures, { timeZone: settings.timeZone });
  return { fixtures, writer };
}

export function createConversationHandler(
  settings: Settings,
  options: { geminiApiKey: string; store?: TabularStore; model?: LanguageModel }
): ConversationHandler {
  const { fixtures, writer } = createRelayServices(settings, options.store);
  const model =
    options.model ?? new GeminiLanguageModel(new GoogleGenAI({ apiKey: options.geminiApiKey }), settings.llmModel);

  return new ConversationHandler({
    fixtures,
    extractor: new LlmScoreExtractor(model),
    writer,
    messages: getMessages(settings.replyLanguage),
    modelTimeoutMs: settings.modelTimeoutMs,
    sheetUrl: settings.sheetUrl || undefined,
  });
}
