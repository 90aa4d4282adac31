import type { IncomingMessage, ServerResponse } from 'http';
import { decisionToError } from '@window-guard/core';
import {
  resolveLimiter,
  validateRouterOptions,
  type GuardedRouterOptions,
} from '../config.js';
import { enforceRateLimit } from './rate-limit-guard.js';
import { matchPath, toRequester } from './request-helpers.js';
import {
  sendError,
  sendMethodNotAllowed,
  sendWindowGuardError,
} from './response-helpers.js';

/**
 * Handles the request and resolves `true`, or resolves `false` when no
 * route claims `pathname`.
 */
export type RequestRouter = (
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string,
) => Promise<boolean>;

/**
 * Router whose routes each declare the action and window they are limited
 * by. The check runs before the route handler; a refused request never
 * reaches it.
 */
export function createGuardedRouter(
  options: GuardedRouterOptions,
): RequestRouter {
  const { resolveUser, routes, defaultPolicy, defaultMode, logger, ...source } =
    validateRouterOptions(options);
  const limiter = resolveLimiter(source);

  return async (req, res, pathname) => {
    /* v8 ignore next -- req.method is always present in Node.js HTTP */
    const method = req.method?.toUpperCase() ?? 'GET';
    let pathMatched = false;

    for (const route of routes) {
      const params = matchPath(pathname, route.path);
      if (!params) continue;
      pathMatched = true;
      if (route.method !== method) continue;

      try {
        const userId = resolveUser ? await resolveUser(req) : undefined;
        const decision = await enforceRateLimit(
          limiter,
          toRequester(req, userId),
          {
            action: route.action,
            policy: route.policy ?? defaultPolicy,
            mode: route.mode ?? defaultMode,
            logger,
          },
        );

        const error = decisionToError(decision);
        if (error) {
          sendWindowGuardError(res, error);
          return true;
        }

        await route.handler(req, res, params);
      } catch (err) {
        if (!res.headersSent) {
          sendError(res, err instanceof Error ? err.message : 'Unknown error');
        }
      }
      return true;
    }

    if (pathMatched) {
      sendMethodNotAllowed(res);
      return true;
    }

    return false;
  };
}
