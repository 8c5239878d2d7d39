/**
 * HTTPS Cloud Functions
 *
 * - sms_scores: Twilio inbound SMS webhook, replies with TwiML
 * - api: scores query API behind the shared secret
 *
 * FILE LOCATION: functions/src/endpoints.ts
 */

import * as functions from 'firebase-functions';
import * as admin from 'firebase-admin';
import { GEMINI_API_KEY, SCORES_API_SECRET, TWILIO_AUTH_TOKEN, loadSettings } from './config';
import type { Settings } from './config';
import { errorMessage } from './errors';
import { FirestoreInboundLog } from './inboundLog';
import { createConversationHandler, createRelayServices } from './services';
import { handleInboundSms, twilioSignatureVerifier } from './smsWebhook';
import { handleApiRequest } from './scoresApi';

const logger = functions.logger;

const REGION = 'europe-west1';

export const sms_scores = functions
  .region(REGION)
  .runWith({ secrets: [GEMINI_API_KEY, TWILIO_AUTH_TOKEN], timeoutSeconds: 60 })
  .https.onRequest(async (req, res) => {
    let settings: Settings;
    try {
      settings = loadSettings();
    } catch (error) {
      logger.error('[SMS] Invalid configuration', { error: errorMessage(error) });
      res.status(500).send('Service misconfigured');
      return;
    }

    const authToken = TWILIO_AUTH_TOKEN.value();
    if (!authToken) {
      logger.warn('[SMS] TWILIO_AUTH_TOKEN not set, accepting unsigned requests');
    }

    await handleInboundSms(req, res, {
      conversation: createConversationHandler(settings, { geminiApiKey: GEMINI_API_KEY.value() }),
      log: new FirestoreInboundLog(admin.firestore()),
      verifySignature: authToken ? twilioSignatureVerifier(authToken, settings.smsWebhookUrl) : undefined,
    });
  });

export const api = functions
  .region(REGION)
  .runWith({ secrets: [SCORES_API_SECRET] })
  .https.onRequest(async (req, res) => {
    let settings: Settings;
    try {
      settings = loadSettings();
    } catch (error) {
      logger.error('[API] Invalid configuration', { error: errorMessage(error) });
      res.status(500).json({ detail: 'Service misconfigured' });
      return;
    }

    const { fixtures, writer } = createRelayServices(settings);
    await handleApiRequest(req, res, { fixtures, writer, secret: SCORES_API_SECRET.value() });
  });
