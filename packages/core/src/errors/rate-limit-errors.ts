import { HTTP_TOO_MANY_REQUESTS, HTTP_UNAUTHORIZED } from '../constants.js';
import type { RateLimitDecision } from '../rate-limit/decision.js';
import { WindowGuardError } from './window-guard-error.js';

export function formatRetryMessage(retryAfterSeconds: number): string {
  return `Rate limit exceeded. Try again in ${retryAfterSeconds} seconds.`;
}

export class RateLimitExceededError extends WindowGuardError {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super(
      formatRetryMessage(retryAfterSeconds),
      'rate_limit_exceeded',
      HTTP_TOO_MANY_REQUESTS,
      { data: { retryAfterSeconds } },
    );
    this.name = 'RateLimitExceededError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class UnauthenticatedError extends WindowGuardError {
  constructor() {
    super('User not authenticated', 'rate_limit_no_user', HTTP_UNAUTHORIZED);
    this.name = 'UnauthenticatedError';
  }
}

/** Thrown for invalid limiter configuration, never for a limiter outcome. */
export class InvalidPolicyError extends WindowGuardError {
  constructor(message: string) {
    super(message, 'invalid_policy', 500);
    this.name = 'InvalidPolicyError';
  }
}

/**
 * Map a decision onto the error the HTTP layer should relay.
 * Returns `undefined` for an allowed request.
 */
export function decisionToError(
  decision: RateLimitDecision,
): RateLimitExceededError | UnauthenticatedError | undefined {
  switch (decision.outcome) {
    case 'allowed':
      return undefined;
    case 'denied':
      return new RateLimitExceededError(decision.retryAfterSeconds);
    case 'no-identity':
      return new UnauthenticatedError();
  }
}
