import { decisionToError, type WindowGuardError } from '@window-guard/core';
import {
  resolveLimiter,
  validateMiddlewareOptions,
  type RateLimitHandlerOptions,
} from '../config.js';
import { enforceRateLimit } from './rate-limit-guard.js';
import { headersToBag } from './request-helpers.js';
import { errorEnvelope, errorHeaders } from './response-helpers.js';

export type FetchHandler = (request: Request) => Promise<Response>;

const JSON_HEADERS = {
  'Content-Type': 'application/json',
  'Cache-Control': 'no-store',
} as const;

export function jsonResponse(
  data: unknown,
  status: number = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { ...headers, ...JSON_HEADERS },
  });
}

export function errorResponse(
  message: string,
  status: number = 500,
): Response {
  return jsonResponse({ error: message }, status);
}

export function windowGuardErrorResponse(error: WindowGuardError): Response {
  return jsonResponse(
    errorEnvelope(error),
    error.statusCode,
    errorHeaders(error),
  );
}

/**
 * Wrap a Fetch API handler so each request is checked first.
 *
 * Fetch requests carry no peer address, so anonymous callers are identified
 * from forwarding headers alone (falling back to the loopback address).
 */
export function withRateLimit(
  handler: FetchHandler,
  options: RateLimitHandlerOptions,
): FetchHandler {
  const { resolveUser, ...opts } = validateMiddlewareOptions(options);
  const limiter = resolveLimiter(opts);

  return async (request: Request): Promise<Response> => {
    try {
      const userId = resolveUser ? await resolveUser(request) : undefined;
      const decision = await enforceRateLimit(
        limiter,
        { userId, headers: headersToBag(request.headers) },
        opts,
      );
      const error = decisionToError(decision);
      if (error) {
        return windowGuardErrorResponse(error);
      }
    } catch (err) {
      return errorResponse(
        err instanceof Error ? err.message : 'Unknown error',
      );
    }

    return handler(request);
  };
}
