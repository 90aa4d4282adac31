import type { ServerResponse } from 'http';
import type { WindowGuardError } from '@window-guard/core';

export function sendJson(
  res: ServerResponse,
  data: unknown,
  status: number = 200,
  headers: Record<string, string> = {},
): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    ...headers,
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
    'Cache-Control': 'no-store',
  });
  res.end(body);
}

export function sendError(
  res: ServerResponse,
  message: string,
  status: number = 500,
): void {
  sendJson(res, { error: message }, status);
}

export function sendNotFound(res: ServerResponse): void {
  sendError(res, 'Not found', 404);
}

export function sendMethodNotAllowed(res: ServerResponse): void {
  sendError(res, 'Method not allowed', 405);
}

/**
 * Envelope relayed to clients for a refused request:
 * `{ code, message, data: { status, ...error.data } }`.
 */
export function errorEnvelope(error: WindowGuardError) {
  return {
    code: error.code,
    message: error.message,
    data: { status: error.statusCode, ...error.data },
  };
}

/** Extra headers for a refused request (`Retry-After` on a denial). */
export function errorHeaders(error: WindowGuardError): Record<string, string> {
  const retryAfter = error.data?.['retryAfterSeconds'];
  return typeof retryAfter === 'number'
    ? { 'Retry-After': String(retryAfter) }
    : {};
}

export function sendWindowGuardError(
  res: ServerResponse,
  error: WindowGuardError,
): void {
  sendJson(res, errorEnvelope(error), error.statusCode, errorHeaders(error));
}
