import { z } from 'zod';
import { InvalidPolicyError } from '../errors/rate-limit-errors.js';

export const RateLimitPolicySchema = z.object({
  /** Requests allowed per window */
  maxRequests: z.number().int().positive(),
  /** Window length in seconds */
  windowSeconds: z.number().int().positive(),
  /** Namespace keeping unrelated features apart in a shared store */
  cachePrefix: z.string(),
});

export type RateLimitPolicy = z.infer<typeof RateLimitPolicySchema>;

export const DEFAULT_CACHE_PREFIX = 'window_guard_rate_limit_';

/**
 * Default REST policy: 30 requests per minute.
 */
export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  maxRequests: 30,
  windowSeconds: 60,
  cachePrefix: DEFAULT_CACHE_PREFIX,
};

export const EDITOR_SETTINGS_RATE_LIMIT_POLICY: RateLimitPolicy = {
  maxRequests: 30,
  windowSeconds: 60,
  cachePrefix: 'window_guard_rate_limit_editor_settings_',
};

/** Form submissions: 10 attempts per five minutes. */
export const FORM_SUBMISSION_RATE_LIMIT_POLICY: RateLimitPolicy = {
  maxRequests: 10,
  windowSeconds: 300,
  cachePrefix: 'window_guard_form_rate_limit_',
};

export function validatePolicy(policy: RateLimitPolicy): RateLimitPolicy {
  const result = RateLimitPolicySchema.safeParse(policy);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : '';
    throw new InvalidPolicyError(`Invalid rate limit policy (${detail})`);
  }
  return result.data;
}
