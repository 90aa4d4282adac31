import type { TtlStore } from '@window-guard/core';
import type { AdminAuthorizer } from '../config.js';
import type { RequestRouter } from './guarded-router.js';
import { handleHealth } from './handlers/health.js';
import {
  handleDeleteRateLimitEntry,
  handleRateLimitEntries,
  handleRateLimitStats,
} from './handlers/rate-limit.js';
import { parseUrl } from './request-helpers.js';
import {
  sendError,
  sendMethodNotAllowed,
  sendNotFound,
} from './response-helpers.js';

export interface AdminRouterOptions {
  store: TtlStore;
  authorize: AdminAuthorizer;
}

/**
 * Operator API over the limiter's store: health, counter stats, counter
 * listing and manual reset of a single counter. Every `/api/` request goes
 * through `authorize` first.
 */
export function createAdminRouter({
  store,
  authorize,
}: AdminRouterOptions): RequestRouter {
  return async (req, res, pathname) => {
    if (!pathname.startsWith('/api/')) {
      return false;
    }

    if (!(await authorize(req))) {
      sendError(res, 'Forbidden', 403);
      return true;
    }

    /* v8 ignore next -- req.method is always present in Node.js HTTP */
    const method = req.method?.toUpperCase() ?? 'GET';

    if (pathname === '/api/health' && method === 'GET') {
      handleHealth(res, store);
      return true;
    }

    if (pathname === '/api/rate-limit/stats' && method === 'GET') {
      await handleRateLimitStats(res, store);
      return true;
    }

    if (pathname === '/api/rate-limit/entries' && method === 'GET') {
      await handleRateLimitEntries(res, store, parseUrl(req, '/').query);
      return true;
    }

    const isSingleEntry =
      pathname.startsWith('/api/rate-limit/entries/') &&
      pathname.split('/').length === 5;

    if (isSingleEntry && method === 'DELETE') {
      await handleDeleteRateLimitEntry(res, store, pathname);
      return true;
    }

    if (isSingleEntry) {
      sendMethodNotAllowed(res);
      return true;
    }

    // No API route matched
    sendNotFound(res);
    return true;
  };
}
