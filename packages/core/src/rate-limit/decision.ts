export type RateLimitMode = 'authenticated' | 'best-effort';

export interface RateLimitAllowed {
  outcome: 'allowed';
  key: string;
  /** Counter value written for this request. */
  count: number;
}

export interface RateLimitDenied {
  outcome: 'denied';
  key: string;
  /** Always the policy's full window length. */
  retryAfterSeconds: number;
}

export interface RateLimitNoIdentity {
  outcome: 'no-identity';
}

export type RateLimitDecision =
  | RateLimitAllowed
  | RateLimitDenied
  | RateLimitNoIdentity;
