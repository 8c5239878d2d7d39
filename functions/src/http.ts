/**
 * The slice of the Express request/response the HTTPS handlers use.
 * `functions.https.Request` and `express.Response` satisfy these.
 *
 * FILE LOCATION: functions/src/http.ts
 */

import type { IncomingHttpHeaders } from 'http';

export interface HttpRequest {
  method: string;
  path: string;
  originalUrl?: string;
  headers: IncomingHttpHeaders;
  body: unknown;
  query: Record<string, unknown>;
}

export interface HttpResponse {
  status(code: number): HttpResponse;
  json(body: unknown): unknown;
  send(body: string): unknown;
  type(contentType: string): HttpResponse;
}

export const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;
