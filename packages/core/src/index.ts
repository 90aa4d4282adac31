export { RateLimiter } from './rate-limit/rate-limiter.js';
export type { RateLimiterOptions } from './rate-limit/rate-limiter.js';
export type {
  RateLimitAllowed,
  RateLimitDecision,
  RateLimitDenied,
  RateLimitMode,
  RateLimitNoIdentity,
} from './rate-limit/decision.js';
export {
  DEFAULT_CACHE_PREFIX,
  DEFAULT_RATE_LIMIT_POLICY,
  EDITOR_SETTINGS_RATE_LIMIT_POLICY,
  FORM_SUBMISSION_RATE_LIMIT_POLICY,
  RateLimitPolicySchema,
  validatePolicy,
} from './rate-limit/policy.js';
export type { RateLimitPolicy } from './rate-limit/policy.js';
export {
  composeRateLimitKey,
  ipIdentity,
  userIdentity,
} from './rate-limit/rate-limit-key.js';
export type { UserId } from './rate-limit/rate-limit-key.js';
export {
  CLIENT_IP_HEADERS,
  getClientIp,
  isPublicIp,
} from './identity/client-ip.js';
export type { ClientIpOptions, HeaderBag } from './identity/client-ip.js';
export { resolveIdentity } from './identity/identity-resolver.js';
export type { Requester } from './identity/identity-resolver.js';
export { WindowGuardError } from './errors/window-guard-error.js';
export type { WindowGuardErrorOptions } from './errors/window-guard-error.js';
export {
  InvalidPolicyError,
  RateLimitExceededError,
  UnauthenticatedError,
  decisionToError,
  formatRetryMessage,
} from './errors/rate-limit-errors.js';
export {
  isAtomicTtlStore,
  isInspectableTtlStore,
} from './stores/ttl-store.js';
export type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlEntryInfo,
  TtlStore,
  TtlStoreStats,
} from './stores/ttl-store.js';
export { PrefixedTtlStore } from './stores/prefixed-ttl-store.js';
export type { PrefixedTtlStoreOptions } from './stores/prefixed-ttl-store.js';
export {
  HTTP_TOO_MANY_REQUESTS,
  HTTP_UNAUTHORIZED,
  LOOPBACK_IP,
} from './constants.js';
