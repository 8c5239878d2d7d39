/**
 * Firebase Cloud Functions - Main Entry Point
 *
 * FILE LOCATION: functions/src/index.ts
 */

import * as admin from 'firebase-admin';

// Initialize Firebase Admin
admin.initializeApp();

// ============================================
// SCORE RELAY FUNCTIONS
// ============================================

export {
  // Twilio inbound SMS webhook
  sms_scores,

  // Fixtures / scores query API
  api,
} from './endpoints';
