import type { IncomingMessage, ServerResponse } from 'http';
import { decisionToError } from '@window-guard/core';
import {
  resolveLimiter,
  validateMiddlewareOptions,
  type RateLimitMiddlewareOptions,
} from '../config.js';
import { enforceRateLimit } from './rate-limit-guard.js';
import { toRequester } from './request-helpers.js';
import { sendError, sendWindowGuardError } from './response-helpers.js';

export type RateLimitMiddleware = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void,
) => void;

/**
 * Connect-style middleware that checks each request against one action's
 * window. Allowed requests continue to `next`; refused ones receive a 429 or
 * 401 JSON envelope.
 */
export function createRateLimitMiddleware(
  options: RateLimitMiddlewareOptions,
): RateLimitMiddleware {
  const { resolveUser, ...opts } = validateMiddlewareOptions(options);
  const limiter = resolveLimiter(opts);

  const guard = async (req: IncomingMessage) => {
    const userId = resolveUser ? await resolveUser(req) : undefined;
    return enforceRateLimit(limiter, toRequester(req, userId), opts);
  };

  return (req: IncomingMessage, res: ServerResponse, next: () => void) => {
    guard(req)
      .then(
        (decision) => {
          const error = decisionToError(decision);
          if (error) {
            sendWindowGuardError(res, error);
            return false;
          }
          return true;
        },
        (err: unknown) => {
          sendError(res, err instanceof Error ? err.message : 'Unknown error');
          return false;
        },
      )
      .then((allowed) => {
        if (allowed) next();
      })
      // Downstream failures; the response may already be on the wire.
      .catch((err: unknown) => {
        if (!res.headersSent) {
          sendError(res, err instanceof Error ? err.message : 'Unknown error');
        }
      });
  };
}
