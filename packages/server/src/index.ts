export { createRateLimitMiddleware } from './server/middleware.js';
export type { RateLimitMiddleware } from './server/middleware.js';
export { withRateLimit } from './server/web-handler.js';
export type { FetchHandler } from './server/web-handler.js';
export { createGuardedRouter } from './server/guarded-router.js';
export type { RequestRouter } from './server/guarded-router.js';
export { createAdminRouter } from './server/api-router.js';
export type { AdminRouterOptions } from './server/api-router.js';
export { startServer } from './server/standalone.js';
export type { WindowGuardServer } from './server/standalone.js';
export { logSecurityEvent } from './server/rate-limit-guard.js';
export type { SecurityEvent } from './server/rate-limit-guard.js';
export { loadServerOptionsFromEnv } from './config.js';
export type {
  AdminAuthorizer,
  GuardedRoute,
  GuardedRouteHandler,
  GuardedRouterOptions,
  LimiterSource,
  RateLimitHandlerOptions,
  RateLimitMiddlewareOptions,
  ResolveUser,
  SecurityLogger,
  ServerEnvOptions,
  ServerOptions,
} from './config.js';
