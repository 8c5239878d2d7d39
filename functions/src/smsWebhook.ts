/**
 * Inbound SMS webhook (Twilio)
 *
 * Twilio posts each received SMS as a form (`From`, `Body`, ...). The message
 * runs through the conversation handler and the reply is returned in the same
 * response as TwiML, so Twilio sends it back to the player.
 *
 * FILE LOCATION: functions/src/smsWebhook.ts
 * VERSION: V01.02
 */

import * as functions from 'firebase-functions';
import twilio from 'twilio';
import type { ConversationOutcome } from './conversation';
import { errorMessage } from './errors';
import { headerValue } from './http';
import type { HttpRequest, HttpResponse } from './http';
import type { InboundLog } from './inboundLog';
import type { InboundMessage } from './types';
import { isRecord } from './utils';

const logger = functions.logger;

export type SignatureVerifier = (req: HttpRequest, params: Record<string, string>) => boolean;

export interface SmsWebhookDeps {
  conversation: { handle(message: InboundMessage): Promise<ConversationOutcome> };
  log: InboundLog;
  /** Omit to accept unsigned requests */
  verifySignature?: SignatureVerifier;
  now?: () => Date;
}

// ============================================
// HELPERS
// ============================================

/** Form fields of the webhook post, string values only */
export const formParams = (body: unknown): Record<string, string> => {
  const params: Record<string, string> = {};
  if (typeof body === 'string') {
    new URLSearchParams(body).forEach((value, key) => {
      params[key] = value;
    });
    return params;
  }
  if (isRecord(body)) {
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === 'string') params[key] = value;
    }
  }
  return params;
};

export const twimlReply = (text: string): string => {
  const response = new twilio.twiml.MessagingResponse();
  response.message(text);
  return response.toString();
};

/**
 * Checks `X-Twilio-Signature` against the auth token. Twilio signs the
 * public URL it posted to; pass it as `webhookUrl` when the function sits
 * behind a rewrite, otherwise it is rebuilt from the Host header.
 */
export const twilioSignatureVerifier =
  (authToken: string, webhookUrl: string): SignatureVerifier =>
  (req, params) => {
    const signature = headerValue(req.headers['x-twilio-signature']);
    if (!signature) return false;
    const url = webhookUrl || `https://${headerValue(req.headers.host) ?? ''}${req.originalUrl ?? req.path}`;
    return twilio.validateRequest(authToken, signature, url, params);
  };

// ============================================
// HANDLER
// ============================================

export async function handleInboundSms(req: HttpRequest, res: HttpResponse, deps: SmsWebhookDeps): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).send('Method not allowed');
    return;
  }

  const params = formParams(req.body);
  if (deps.verifySignature && !deps.verifySignature(req, params)) {
    logger.warn('[SMS] Rejected request with invalid Twilio signature', { from: params.From });
    res.status(403).send('Invalid signature');
    return;
  }

  const sender = params.From?.trim();
  const body = params.Body;
  if (!sender || body === undefined) {
    res.status(400).send('Missing From or Body');
    return;
  }

  const message: InboundMessage = { sender, body, receivedAt: deps.now ? deps.now() : new Date() };
  logger.info('[SMS] Message received', { from: sender, length: body.length });

  try {
    const outcome = await deps.conversation.handle(message);
    await deps.log.record(message, outcome);
    res.status(200).type('text/xml').send(twimlReply(outcome.reply));
  } catch (error) {
    logger.error('[SMS] Failed to process message', { from: sender, error: errorMessage(error) });
    res.status(500).send('Internal error');
  }
}
