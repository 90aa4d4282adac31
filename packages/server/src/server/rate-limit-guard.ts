import type {
  RateLimitDecision,
  RateLimitMode,
  RateLimitPolicy,
  RateLimiter,
  Requester,
} from '@window-guard/core';
import type { SecurityLogger } from '../config.js';

export type SecurityEvent = 'rate_limit_exceeded' | 'rate_limit_no_user';

export interface GuardSettings {
  action: string;
  policy: RateLimitPolicy;
  mode: RateLimitMode;
  logger: SecurityLogger;
}

export function logSecurityEvent(
  logger: SecurityLogger,
  event: SecurityEvent,
  context: Record<string, unknown>,
): void {
  const logData = {
    ...context,
    event,
    timestamp: new Date().toISOString(),
  };
  logger.warn(`[SECURITY] ${event}: ${JSON.stringify(logData)}`);
}

function firstHeader(value: string | Array<string> | undefined): string {
  return (Array.isArray(value) ? value[0] : value) ?? '';
}

/**
 * Run one limiter check for a request and log refusals as security events.
 */
export async function enforceRateLimit(
  limiter: RateLimiter,
  requester: Requester,
  { action, policy, mode, logger }: GuardSettings,
): Promise<RateLimitDecision> {
  const decision = await limiter.checkRequest(action, requester, policy, mode);

  const userAgent = firstHeader(requester.headers?.['user-agent']);
  switch (decision.outcome) {
    case 'denied':
      logSecurityEvent(logger, 'rate_limit_exceeded', {
        action,
        key: decision.key,
        retryAfterSeconds: decision.retryAfterSeconds,
        userAgent,
      });
      break;
    case 'no-identity':
      logSecurityEvent(logger, 'rate_limit_no_user', { action, userAgent });
      break;
    case 'allowed':
      break;
  }

  return decision;
}
