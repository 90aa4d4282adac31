import { InvalidPolicyError } from '../errors/rate-limit-errors.js';
import {
  trustedProxyList,
  type ClientIpOptions,
} from '../identity/client-ip.js';
import { resolveIdentity, type Requester } from '../identity/identity-resolver.js';
import { isAtomicTtlStore, type TtlStore } from '../stores/ttl-store.js';
import type { RateLimitDecision, RateLimitMode } from './decision.js';
import { validatePolicy, type RateLimitPolicy } from './policy.js';
import { composeRateLimitKey } from './rate-limit-key.js';

export interface RateLimiterOptions {
  store: TtlStore;
  /**
   * Use the store's `incrementBelow` so concurrent checks for one key cannot
   * overshoot the limit. Requires an `AtomicTtlStore`.
   */
  atomic?: boolean;
  /** Applied when resolving client addresses in `checkRequest`. */
  clientIp?: ClientIpOptions;
}

/**
 * Fixed-window request counter.
 *
 * Holds no state of its own; every counter lives in the store. Each allowed
 * request rewrites the counter with a fresh TTL, so the window is measured
 * from the most recent allowed request.
 *
 * Without `atomic`, the read and the write are separate store calls and two
 * concurrent checks for the same key may both be allowed at `maxRequests - 1`.
 */
export class RateLimiter {
  private readonly store: TtlStore;
  private readonly atomic: boolean;
  private readonly clientIp: ClientIpOptions;

  constructor({ store, atomic = false, clientIp = {} }: RateLimiterOptions) {
    if (atomic && !isAtomicTtlStore(store)) {
      throw new InvalidPolicyError(
        'Atomic rate limiting requires a store that implements incrementBelow',
      );
    }
    if (clientIp.trustedProxies) {
      trustedProxyList(clientIp.trustedProxies);
    }
    this.store = store;
    this.atomic = atomic;
    this.clientIp = clientIp;
  }

  /**
   * Test and record one request for `(action, identity)`.
   */
  async check(
    action: string,
    identity: string,
    policy: RateLimitPolicy,
  ): Promise<RateLimitDecision> {
    const { maxRequests, windowSeconds, cachePrefix } = validatePolicy(policy);
    const key = composeRateLimitKey(cachePrefix, action, identity);

    if (this.atomic && isAtomicTtlStore(this.store)) {
      const count = await this.store.incrementBelow(
        key,
        maxRequests,
        windowSeconds,
      );
      return count === undefined
        ? { outcome: 'denied', key, retryAfterSeconds: windowSeconds }
        : { outcome: 'allowed', key, count };
    }

    const current = (await this.store.get(key)) ?? 0;
    if (current >= maxRequests) {
      return { outcome: 'denied', key, retryAfterSeconds: windowSeconds };
    }

    const count = current + 1;
    await this.store.set(key, count, windowSeconds);
    return { outcome: 'allowed', key, count };
  }

  /**
   * Resolve the requester's identity for `mode`, then `check`.
   * In `authenticated` mode an anonymous requester yields `no-identity`
   * without touching the store.
   */
  async checkRequest(
    action: string,
    requester: Requester,
    policy: RateLimitPolicy,
    mode: RateLimitMode = 'best-effort',
  ): Promise<RateLimitDecision> {
    const identity = resolveIdentity(requester, mode, this.clientIp);
    if (identity === undefined) {
      return { outcome: 'no-identity' };
    }
    return this.check(action, identity, policy);
  }
}
