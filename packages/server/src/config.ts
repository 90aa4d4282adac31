import type { IncomingMessage, ServerResponse } from 'http';
import {
  DEFAULT_RATE_LIMIT_POLICY,
  InvalidPolicyError,
  RateLimiter,
  RateLimitPolicySchema,
  validatePolicy,
  type RateLimitPolicy,
  type TtlStore,
  type UserId,
} from '@window-guard/core';
import { z } from 'zod';

/** Sink for security events and server lifecycle messages. */
export type SecurityLogger = Pick<Console, 'info' | 'warn'>;

/**
 * Returns the authenticated user behind a request, or nothing for an
 * anonymous caller.
 */
export type ResolveUser<TRequest> = (
  request: TRequest,
) => UserId | null | undefined | Promise<UserId | null | undefined>;

/**
 * Decides whether a request may use the admin API. Admin routes answer 403
 * when it returns false.
 */
export type AdminAuthorizer = (
  request: IncomingMessage,
) => boolean | Promise<boolean>;

const ACTION_REGEX = /^[a-zA-Z0-9_.:-]+$/;

const storeSchema = z.custom<TtlStore>(
  (val) =>
    val != null &&
    typeof val === 'object' &&
    'get' in val &&
    'set' in val &&
    'delete' in val,
  'Must be a TtlStore',
);

const limiterSchema = z.custom<RateLimiter>(
  (val) => val instanceof RateLimiter,
  'Must be a RateLimiter instance',
);

const loggerSchema = z.custom<SecurityLogger>(
  (val) =>
    val != null &&
    typeof val === 'object' &&
    'info' in val &&
    typeof val.info === 'function' &&
    'warn' in val &&
    typeof val.warn === 'function',
  'Logger must provide info and warn',
);

const modeSchema = z.enum(['authenticated', 'best-effort']);

const actionSchema = z
  .string()
  .min(1, 'Action must not be empty')
  .regex(ACTION_REGEX, 'Action must be key-safe (a-z, 0-9, _, ., :, -)');

/**
 * Where the limiter comes from: an existing `RateLimiter`, or a store the
 * limiter is built on (optionally atomic and behind trusted proxies).
 */
const LimiterSourceSchema = z
  .object({
    limiter: limiterSchema.optional(),
    store: storeSchema.optional(),
    atomic: z.boolean().optional(),
    trustedProxies: z.array(z.string().min(1)).optional(),
  })
  .refine(
    (data) => (data.limiter === undefined) !== (data.store === undefined),
    { message: 'Provide either a limiter or a store' },
  )
  .refine(
    (data) =>
      data.limiter === undefined ||
      (data.atomic === undefined && data.trustedProxies === undefined),
    {
      message:
        'atomic and trustedProxies only apply when the limiter is built ' +
        'from a store',
    },
  );

const RateLimitMiddlewareOptionsSchema = z
  .object({
    action: actionSchema,
    policy: RateLimitPolicySchema.default(DEFAULT_RATE_LIMIT_POLICY),
    mode: modeSchema.default('authenticated'),
    logger: loggerSchema.default(console),
  })
  .and(LimiterSourceSchema);

const GuardedRouteSchema = z.object({
  method: z
    .string()
    .min(1)
    .transform((method) => method.toUpperCase()),
  path: z.string().startsWith('/', 'Route path must start with /'),
  action: actionSchema,
  policy: RateLimitPolicySchema.optional(),
  mode: modeSchema.optional(),
  handler: z.custom<GuardedRouteHandler>(
    (val) => typeof val === 'function',
    'Route handler must be a function',
  ),
});

const GuardedRouterOptionsSchema = z
  .object({
    routes: z.array(GuardedRouteSchema),
    defaultPolicy: RateLimitPolicySchema.default(DEFAULT_RATE_LIMIT_POLICY),
    defaultMode: modeSchema.default('authenticated'),
    logger: loggerSchema.default(console),
  })
  .and(LimiterSourceSchema);

const authorizerSchema = z.custom<AdminAuthorizer>(
  (val) => typeof val === 'function',
  'authorizeAdmin must be a function',
);

const ServerOptionsSchema = z
  .object({
    port: z.number().int().nonnegative().default(4000),
    host: z.string().default('localhost'),
    basePath: z.string().startsWith('/').default('/'),
    routes: z.array(GuardedRouteSchema).default([]),
    defaultPolicy: RateLimitPolicySchema.default(DEFAULT_RATE_LIMIT_POLICY),
    defaultMode: modeSchema.default('authenticated'),
    admin: z.boolean().default(false),
    authorizeAdmin: authorizerSchema.optional(),
    logger: loggerSchema.default(console),
    store: storeSchema,
    atomic: z.boolean().default(false),
    trustedProxies: z.array(z.string().min(1)).optional(),
  })
  .refine((data) => !data.admin || data.authorizeAdmin !== undefined, {
    message: 'The admin API requires authorizeAdmin',
  });

const ServerEnvSchema = z.object({
  WINDOW_GUARD_PORT: z.coerce.number().int().nonnegative().optional(),
  WINDOW_GUARD_HOST: z.string().min(1).optional(),
  WINDOW_GUARD_MAX_REQUESTS: z.coerce.number().int().positive().optional(),
  WINDOW_GUARD_WINDOW_SECONDS: z.coerce.number().int().positive().optional(),
});

export type GuardedRouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  params: Record<string, string>,
) => void | Promise<void>;

type WithResolveUser<T, TRequest> = T & {
  resolveUser?: ResolveUser<TRequest>;
};

type MiddlewareOptionsInput = z.input<typeof RateLimitMiddlewareOptionsSchema>;

export type LimiterSource = z.input<typeof LimiterSourceSchema>;
export type RateLimitMiddlewareOptions = WithResolveUser<
  MiddlewareOptionsInput,
  IncomingMessage
>;
export type RateLimitHandlerOptions = WithResolveUser<
  MiddlewareOptionsInput,
  Request
>;
export type GuardedRoute = z.input<typeof GuardedRouteSchema>;
export type GuardedRouterOptions = WithResolveUser<
  z.input<typeof GuardedRouterOptionsSchema>,
  IncomingMessage
>;
export type ServerOptions = WithResolveUser<
  z.input<typeof ServerOptionsSchema>,
  IncomingMessage
>;

export function validateMiddlewareOptions<TRequest>(
  options: WithResolveUser<MiddlewareOptionsInput, TRequest>,
) {
  const { resolveUser, ...rest } = options;
  return { ...RateLimitMiddlewareOptionsSchema.parse(rest), resolveUser };
}

export function validateRouterOptions(options: GuardedRouterOptions) {
  const { resolveUser, ...rest } = options;
  return { ...GuardedRouterOptionsSchema.parse(rest), resolveUser };
}

export function validateServerOptions(options: ServerOptions) {
  const { resolveUser, ...rest } = options;
  return { ...ServerOptionsSchema.parse(rest), resolveUser };
}

/**
 * Build the limiter an options object describes.
 */
export function resolveLimiter(
  source: z.output<typeof LimiterSourceSchema>,
): RateLimiter {
  if (source.limiter) {
    return source.limiter;
  }
  if (!source.store) {
    throw new InvalidPolicyError('Provide either a limiter or a store');
  }
  return new RateLimiter({
    store: source.store,
    atomic: source.atomic,
    clientIp: { trustedProxies: source.trustedProxies },
  });
}

export interface ServerEnvOptions {
  port?: number;
  host?: string;
  defaultPolicy: RateLimitPolicy;
}

/**
 * Read the standalone server's settings from `WINDOW_GUARD_*` variables.
 * Unset variables fall back to the server defaults and the default policy.
 */
export function loadServerOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ServerEnvOptions {
  const parsed = ServerEnvSchema.parse(env);
  return {
    port: parsed.WINDOW_GUARD_PORT,
    host: parsed.WINDOW_GUARD_HOST,
    defaultPolicy: validatePolicy({
      ...DEFAULT_RATE_LIMIT_POLICY,
      maxRequests:
        parsed.WINDOW_GUARD_MAX_REQUESTS ??
        DEFAULT_RATE_LIMIT_POLICY.maxRequests,
      windowSeconds:
        parsed.WINDOW_GUARD_WINDOW_SECONDS ??
        DEFAULT_RATE_LIMIT_POLICY.windowSeconds,
    }),
  };
}
