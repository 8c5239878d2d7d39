/**
 * Inbound SMS log (Firestore `sms_inbound`)
 *
 * One document per received message with the outcome of its conversation.
 * Logging is best-effort: a Firestore failure is logged and never changes
 * the reply the sender gets.
 *
 * FILE LOCATION: functions/src/inboundLog.ts
 */

import * as functions from 'firebase-functions';
import * as admin from 'firebase-admin';
import type { ConversationOutcome } from './conversation';
import { errorMessage } from './errors';
import type { InboundMessage } from './types';

const logger = functions.logger;

export const INBOUND_COLLECTION = 'sms_inbound';

export interface InboundLogEntry {
  from: string;
  body: string;
  receivedAt: Date;
  state: ConversationOutcome['state'];
  reply: string;
  fixtureId: string | null;
  failureStage: string | null;
  failureKind: string | null;
}

export interface InboundLog {
  record(message: InboundMessage, outcome: ConversationOutcome): Promise<void>;
}

export const toLogEntry = (message: InboundMessage, outcome: ConversationOutcome): InboundLogEntry => {
  const failure = outcome.failure;
  return {
    from: message.sender,
    body: message.body,
    receivedAt: message.receivedAt,
    state: outcome.state,
    reply: outcome.reply,
    fixtureId: outcome.fixture?.id ?? null,
    failureStage: failure?.stage ?? null,
    failureKind: failure && 'kind' in failure.error ? failure.error.kind : null,
  };
};

export class FirestoreInboundLog implements InboundLog {
  constructor(private readonly db: admin.firestore.Firestore) {}

  async record(message: InboundMessage, outcome: ConversationOutcome): Promise<void> {
    try {
      await this.db.collection(INBOUND_COLLECTION).add({
        ...toLogEntry(message, outcome),
        createdAt: admin.firestore.FieldValue.serverTimestamp(),
      });
    } catch (error) {
      logger.error('[SMS] Failed to log inbound message (continuing anyway)', {
        from: message.sender,
        error: errorMessage(error),
      });
    }
  }
}
