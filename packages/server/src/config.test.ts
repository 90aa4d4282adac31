import {
  DEFAULT_RATE_LIMIT_POLICY,
  InvalidPolicyError,
  RateLimiter,
  type TtlStore,
} from '@window-guard/core';
import { describe, it, expect, vi } from 'vitest';
import {
  loadServerOptionsFromEnv,
  resolveLimiter,
  validateMiddlewareOptions,
  validateRouterOptions,
  validateServerOptions,
} from './config.js';

function makeStore(): TtlStore {
  return {
    get: vi.fn(async () => undefined),
    set: vi.fn(async () => undefined),
    delete: vi.fn(async () => undefined),
  };
}

describe('validateMiddlewareOptions', () => {
  it('should apply defaults', () => {
    const opts = validateMiddlewareOptions({
      action: 'sections',
      store: makeStore(),
    });
    expect(opts.policy).toEqual(DEFAULT_RATE_LIMIT_POLICY);
    expect(opts.mode).toBe('authenticated');
    expect(opts.logger).toBe(console);
    expect(opts.resolveUser).toBeUndefined();
  });

  it('should keep resolveUser as given', () => {
    const resolveUser = () => 1;
    const opts = validateMiddlewareOptions({
      action: 'sections',
      store: makeStore(),
      resolveUser,
    });
    expect(opts.resolveUser).toBe(resolveUser);
  });

  it('should reject an empty action', () => {
    expect(() =>
      validateMiddlewareOptions({ action: '', store: makeStore() }),
    ).toThrow('Action must not be empty');
  });

  it('should reject actions that are not key-safe', () => {
    expect(() =>
      validateMiddlewareOptions({ action: 'a b', store: makeStore() }),
    ).toThrow('Action must be key-safe');
  });

  it('should reject a non-positive window', () => {
    expect(() =>
      validateMiddlewareOptions({
        action: 'sections',
        store: makeStore(),
        policy: { maxRequests: 1, windowSeconds: 0, cachePrefix: 'rl_' },
      }),
    ).toThrow();
  });

  it('should require a limiter or a store', () => {
    expect(() => validateMiddlewareOptions({ action: 'sections' })).toThrow(
      'Provide either a limiter or a store',
    );
  });

  it('should reject store-only settings next to a limiter', () => {
    expect(() =>
      validateMiddlewareOptions({
        action: 'sections',
        limiter: new RateLimiter({ store: makeStore() }),
        trustedProxies: ['10.0.0.1'],
      }),
    ).toThrow('atomic and trustedProxies only apply');
  });
});

describe('validateRouterOptions', () => {
  it('should upper-case route methods', () => {
    const opts = validateRouterOptions({
      store: makeStore(),
      routes: [
        { method: 'post', path: '/a', action: 'a', handler: () => undefined },
      ],
    });
    expect(opts.routes[0]?.method).toBe('POST');
    expect(opts.defaultMode).toBe('authenticated');
  });

  it('should reject relative route paths', () => {
    expect(() =>
      validateRouterOptions({
        store: makeStore(),
        routes: [
          { method: 'GET', path: 'a', action: 'a', handler: () => undefined },
        ],
      }),
    ).toThrow('Route path must start with /');
  });
});

describe('validateServerOptions', () => {
  it('should apply defaults', () => {
    const opts = validateServerOptions({ store: makeStore() });
    expect(opts.port).toBe(4000);
    expect(opts.host).toBe('localhost');
    expect(opts.basePath).toBe('/');
    expect(opts.admin).toBe(false);
    expect(opts.atomic).toBe(false);
    expect(opts.routes).toEqual([]);
  });

  it('should require authorizeAdmin when the admin API is enabled', () => {
    expect(() =>
      validateServerOptions({ store: makeStore(), admin: true }),
    ).toThrow('The admin API requires authorizeAdmin');
  });

  it('should accept the admin API with an authorizer', () => {
    const authorizeAdmin = () => false;
    const opts = validateServerOptions({
      store: makeStore(),
      admin: true,
      authorizeAdmin,
    });
    expect(opts.admin).toBe(true);
    expect(opts.authorizeAdmin).toBe(authorizeAdmin);
  });

  it('should reject a negative port', () => {
    expect(() =>
      validateServerOptions({ store: makeStore(), port: -1 }),
    ).toThrow();
  });
});

describe('resolveLimiter', () => {
  it('should return the given limiter', () => {
    const limiter = new RateLimiter({ store: makeStore() });
    expect(resolveLimiter({ limiter })).toBe(limiter);
  });

  it('should build a limiter from a store', () => {
    expect(resolveLimiter({ store: makeStore() })).toBeInstanceOf(RateLimiter);
  });

  it('should refuse atomic mode on a store without incrementBelow', () => {
    expect(() => resolveLimiter({ store: makeStore(), atomic: true })).toThrow(
      InvalidPolicyError,
    );
  });
});

describe('loadServerOptionsFromEnv', () => {
  it('should fall back to defaults', () => {
    expect(loadServerOptionsFromEnv({})).toEqual({
      port: undefined,
      host: undefined,
      defaultPolicy: DEFAULT_RATE_LIMIT_POLICY,
    });
  });

  it('should read WINDOW_GUARD_* variables', () => {
    expect(
      loadServerOptionsFromEnv({
        WINDOW_GUARD_PORT: '8080',
        WINDOW_GUARD_HOST: '0.0.0.0',
        WINDOW_GUARD_MAX_REQUESTS: '10',
        WINDOW_GUARD_WINDOW_SECONDS: '300',
        UNRELATED: 'x',
      }),
    ).toEqual({
      port: 8080,
      host: '0.0.0.0',
      defaultPolicy: {
        maxRequests: 10,
        windowSeconds: 300,
        cachePrefix: 'window_guard_rate_limit_',
      },
    });
  });

  it('should reject malformed numbers', () => {
    expect(() =>
      loadServerOptionsFromEnv({ WINDOW_GUARD_MAX_REQUESTS: 'lots' }),
    ).toThrow();
  });
});
