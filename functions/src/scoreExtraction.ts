/**
 * Score Extraction Engine
 *
 * Turns a free-text SMS ("Nikula won 2-1, breaks 50 and 30") into a score
 * report for a known fixture. Model output goes through parseScorePayload
 * (shape) and validateScores (rules) before it is returned.
 *
 * Retry policy:
 * - Output that is not valid JSON of the schema shape: one retry with a
 *   stricter prompt, then model_output_invalid
 * - Model call throws: one retry, then model_unavailable
 * - Rule violations are never retried (inconsistent_with_format)
 *
 * FILE LOCATION: functions/src/scoreExtraction.ts
 * VERSION: V01.05
 */

import * as functions from 'firebase-functions';
import { GoogleGenAI, Type } from '@google/genai';
import type { Schema } from '@google/genai';
import { ExtractionError, errorMessage } from './errors';
import { maximumBreak, parseScorePayload, validateScores } from './scoreValidation';
import type { BreakFlag, MatchFormat, ScoreReport } from './types';

const logger = functions.logger;

// ============================================
// LANGUAGE MODEL
// ============================================

export interface JsonGenerationRequest {
  systemInstruction: string;
  prompt: string;
  schema: Schema;
}

export interface LanguageModel {
  /** Raw response text, expected to be JSON */
  generateJson(request: JsonGenerationRequest): Promise<string>;
}

export class GeminiLanguageModel implements LanguageModel {
  constructor(private readonly ai: GoogleGenAI, private readonly model: string) {}

  async generateJson(request: JsonGenerationRequest): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: request.prompt,
      config: {
        systemInstruction: request.systemInstruction,
        responseMimeType: 'application/json',
        responseSchema: request.schema,
        temperature: 0,
      },
    });
    return response.text ?? '';
  }
}

// ============================================
// PROMPT & SCHEMA
// ============================================

export const SCORE_REPORT_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    player1_score: { type: Type.INTEGER, description: 'Frames won by player1' },
    player2_score: { type: Type.INTEGER, description: 'Frames won by player2' },
    breaks: {
      type: Type.ARRAY,
      description: 'Breaks mentioned in the message, in the order mentioned',
      items: {
        type: Type.OBJECT,
        properties: {
          player: { type: Type.STRING, enum: ['player1', 'player2'] },
          points: { type: Type.INTEGER },
        },
        required: ['player', 'points'],
      },
    },
  },
  required: ['player1_score', 'player2_score', 'breaks'],
  propertyOrdering: ['player1_score', 'player2_score', 'breaks'],
};

export const SYSTEM_INSTRUCTION = [
  'You read SMS messages that report the result of one snooker match.',
  'The match, its two players and its format are given. Players may be named by first name, last name or an inflected form of either.',
  'Return the frames won by each player and every break the message mentions.',
  'Refer to players only as "player1" or "player2" as defined for the match.',
  'If a break does not name its player, attribute it to the winner of the match.',
  'Do not invent breaks. If no breaks are mentioned, return an empty breaks list.',
].join('\n');

const EXAMPLES = `Match: Virtanen Aatos (player1) vs Mäkinen Joonas (player2), best of 3 frames
Message: Aatos voitti Joonaksen 2-1, breikit Aatos 25 ja Joonas 18
JSON: {"player1_score":2,"player2_score":1,"breaks":[{"player":"player1","points":25},{"player":"player2","points":18}]}

Match: Laine Sinikka (player1) vs Tuomi Kari (player2), best of 3 frames
Message: Kari 2 - 0 Sinikka
JSON: {"player1_score":0,"player2_score":2,"breaks":[]}`;

const STRICT_SUFFIX =
  'Your previous answer could not be used. Reply with one JSON object and nothing else: ' +
  'no prose and no code fences. player1_score and player2_score are integers; every break ' +
  'has "player" set to exactly "player1" or "player2" and integer "points".';

export interface ExtractionContext {
  fixtureId: string;
  player1: string;
  player2: string;
  format: MatchFormat;
}

export function buildPrompt(rawText: string, context: ExtractionContext, strict = false): string {
  const { player1, player2, format } = context;
  const lines = [
    EXAMPLES,
    '',
    `Match: ${player1} (player1) vs ${player2} (player2), best of ${format.bestOf} frames, ` +
      `${format.reds} reds (maximum break ${maximumBreak(format.reds)})`,
    `Message: ${rawText.trim()}`,
    'JSON:',
  ];
  if (strict) lines.push('', STRICT_SUFFIX);
  return lines.join('\n');
}

/**
 * JSON.parse that tolerates ```json fences. Returns undefined for
 * anything that is not JSON.
 */
export function parseModelJson(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?/gi, '').trim();
  if (!unfenced) return undefined;
  try {
    return JSON.parse(unfenced);
  } catch {
    return undefined;
  }
}

// ============================================
// EXTRACTOR
// ============================================

export type ExtractionResult =
  | { ok: true; report: ScoreReport; flags: BreakFlag[] }
  | { ok: false; error: ExtractionError };

export interface ScoreExtractor {
  extract(rawText: string, context: ExtractionContext): Promise<ExtractionResult>;
}

export class LlmScoreExtractor implements ScoreExtractor {
  constructor(private readonly model: LanguageModel) {}

  async extract(rawText: string, context: ExtractionContext): Promise<ExtractionResult> {
    for (const attempt of [0, 1]) {
      const prompt = buildPrompt(rawText, context, attempt > 0);

      let output: string;
      try {
        output = await this.model.generateJson({
          systemInstruction: SYSTEM_INSTRUCTION,
          prompt,
          schema: SCORE_REPORT_SCHEMA,
        });
      } catch (error) {
        logger.warn('[Extraction] Model call failed', { fixtureId: context.fixtureId, attempt, error: errorMessage(error) });
        if (attempt === 0) continue;
        return {
          ok: false,
          error: new ExtractionError('model_unavailable', `Language model unavailable: ${errorMessage(error)}`),
        };
      }

      const candidate = parseScorePayload(parseModelJson(output));
      if (!candidate) {
        logger.warn('[Extraction] Output does not match schema', { fixtureId: context.fixtureId, attempt, output });
        continue;
      }

      const validation = validateScores(context.fixtureId, candidate, context.format);
      if (!validation.ok) {
        logger.info('[Extraction] Scores rejected', { fixtureId: context.fixtureId, rule: validation.violation.rule });
        return { ok: false, error: ExtractionError.inconsistent(validation.violation) };
      }

      return validation;
    }

    return {
      ok: false,
      error: new ExtractionError('model_output_invalid', 'Model output did not match the score schema'),
    };
  }
}
