/**
 * Conversation Handler
 *
 * Drives one inbound SMS through the result pipeline:
 *
 *   received -> extracting -> committing -> done
 *        \           \             \
 *         +-----------+-------------+--> failed
 *
 * Every path ends with exactly one reply for the sender. Nothing is written
 * unless extraction produced a validated report.
 *
 * FILE LOCATION: functions/src/conversation.ts
 * VERSION: V01.02
 */

import * as functions from 'firebase-functions';
import { ExtractionError, LookupError, StoreUnavailableError, WriteError } from './errors';
import { resolveFixture } from './fixtureResolver';
import type { ResolvedFixture } from './fixtureResolver';
import type { FixtureStore } from './fixtureStore';
import type { ReplyMessages } from './messages';
import type { ResultWriter } from './resultWriter';
import type { ExtractionResult, ScoreExtractor } from './scoreExtraction';
import type { Fixture, InboundMessage, ScoreReport } from './types';
import { withTimeout } from './utils';

const logger = functions.logger;

// ============================================
// TYPES
// ============================================

export type ConversationState = 'received' | 'extracting' | 'committing' | 'done' | 'failed';

export type ConversationFailure =
  | { stage: 'lookup'; error: LookupError }
  | { stage: 'store'; error: StoreUnavailableError }
  | { stage: 'extraction'; error: ExtractionError }
  | { stage: 'commit'; error: WriteError };

export interface ConversationOutcome {
  state: 'done' | 'failed';
  reply: string;
  /** States visited, in order */
  transitions: ConversationState[];
  fixture?: Fixture;
  report?: ScoreReport;
  failure?: ConversationFailure;
}

export interface ConversationDeps {
  fixtures: FixtureStore;
  extractor: ScoreExtractor;
  writer: ResultWriter;
  messages: ReplyMessages;
  modelTimeoutMs: number;
  /** Appended to the confirmation reply when set */
  sheetUrl?: string;
}

// ============================================
// HANDLER
// ============================================

export class ConversationHandler {
  constructor(private readonly deps: ConversationDeps) {}

  async handle(message: InboundMessage): Promise<ConversationOutcome> {
    const { messages } = this.deps;
    const transitions: ConversationState[] = ['received'];

    const fail = (failure: ConversationFailure, reply: string, fixture?: Fixture): ConversationOutcome => {
      transitions.push('failed');
      logger.info('[SMS] Message not recorded', {
        sender: message.sender,
        stage: failure.stage,
        kind: 'kind' in failure.error ? failure.error.kind : undefined,
        fixtureId: fixture?.id,
        error: failure.error.message,
      });
      return { state: 'failed', reply, transitions, fixture, failure };
    };

    // received: which fixture is this about?
    let resolved: ResolvedFixture;
    try {
      resolved = await resolveFixture(this.deps.fixtures, message);
    } catch (error) {
      if (error instanceof LookupError) {
        const reply = error.kind === 'ambiguous' ? messages.ambiguous(error.candidates) : messages.fixtureNotFound();
        return fail({ stage: 'lookup', error }, reply);
      }
      if (error instanceof StoreUnavailableError) {
        return fail({ stage: 'store', error }, messages.storeUnavailable());
      }
      throw error;
    }

    const { fixture } = resolved;
    if (fixture.state === 'complete') {
      const error = new WriteError('already_complete', fixture.id, `Fixture ${fixture.id} already has a result`);
      return fail({ stage: 'commit', error }, messages.alreadyComplete(fixture), fixture);
    }

    // extracting
    transitions.push('extracting');
    const { modelTimeoutMs } = this.deps;
    const extraction = await withTimeout(
      this.deps.extractor.extract(message.body, {
        fixtureId: fixture.id,
        player1: fixture.player1,
        player2: fixture.player2,
        format: fixture.format,
      }),
      modelTimeoutMs,
      (): ExtractionResult => ({
        ok: false,
        error: new ExtractionError('timeout', `No extraction result within ${modelTimeoutMs} ms`),
      })
    );

    if (!extraction.ok) {
      return fail({ stage: 'extraction', error: extraction.error }, this.extractionReply(extraction.error, fixture), fixture);
    }
    const { report, flags } = extraction;

    // committing
    transitions.push('committing');
    try {
      const ack = await this.deps.writer.commit(fixture.id, report, {
        source: `sms:${message.sender}`,
        passage: message.body,
        receivedAt: message.receivedAt,
      });
      transitions.push('done');
      logger.info('[SMS] Result recorded', {
        sender: message.sender,
        fixtureId: fixture.id,
        via: resolved.via,
        flaggedBreaks: flags.length,
      });
      return {
        state: 'done',
        reply: messages.recorded({ fixture: ack.fixture, report, flags, sheetUrl: this.deps.sheetUrl }),
        transitions,
        fixture: ack.fixture,
        report,
      };
    } catch (error) {
      if (error instanceof WriteError) {
        return fail({ stage: 'commit', error }, this.writeReply(error, fixture), fixture);
      }
      throw error;
    }
  }

  private extractionReply(error: ExtractionError, fixture: Fixture): string {
    const { messages } = this.deps;
    switch (error.kind) {
      case 'inconsistent_with_format':
        return error.violation ? messages.inconsistent(fixture, error.violation) : messages.notUnderstood();
      case 'timeout':
        return messages.timeout();
      case 'model_unavailable':
        return messages.modelUnavailable();
      case 'model_output_invalid':
        return messages.notUnderstood();
    }
  }

  private writeReply(error: WriteError, fixture: Fixture): string {
    const { messages } = this.deps;
    switch (error.kind) {
      case 'already_complete':
        return messages.alreadyComplete(fixture);
      case 'fixture_not_found':
        return messages.unknownFixtureId(fixture.id);
      case 'store_unavailable':
        return messages.storeUnavailable();
    }
  }
}
