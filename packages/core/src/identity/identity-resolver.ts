import type { RateLimitMode } from '../rate-limit/decision.js';
import {
  ipIdentity,
  userIdentity,
  type UserId,
} from '../rate-limit/rate-limit-key.js';
import { getClientIp, type ClientIpOptions, type HeaderBag } from './client-ip.js';

/**
 * What the HTTP layer knows about the caller of a request.
 */
export interface Requester {
  /** Authenticated user, if any. `0` and `''` count as anonymous. */
  userId?: UserId | null;
  headers?: HeaderBag;
  remoteAddress?: string;
}

function hasUser(userId: UserId | null | undefined): userId is UserId {
  return userId !== undefined && userId !== null && userId !== 0 && userId !== '';
}

/**
 * Produce the identity string for a requester, or `undefined` when the mode
 * requires an authenticated user and there is none.
 */
export function resolveIdentity(
  requester: Requester,
  mode: RateLimitMode,
  options: ClientIpOptions = {},
): string | undefined {
  if (hasUser(requester.userId)) {
    return userIdentity(requester.userId);
  }
  if (mode === 'authenticated') {
    return undefined;
  }
  return ipIdentity(
    getClientIp(requester.headers ?? {}, requester.remoteAddress, options),
  );
}
