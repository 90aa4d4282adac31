import type { IncomingMessage } from 'http';
import { InMemoryTtlStore } from '@window-guard/store-memory';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { sendJson } from './response-helpers.js';
import type { ServerOptions } from '../config.js';
import { startServer, type WindowGuardServer } from './standalone.js';

describe('startServer', () => {
  let running: WindowGuardServer | undefined;
  let store: InMemoryTtlStore | undefined;
  const logger = { info: vi.fn(), warn: vi.fn() };

  afterEach(async () => {
    if (running) {
      await running.close();
      running = undefined;
    }
    store?.destroy();
    store = undefined;
    logger.info.mockReset();
  });

  async function start(
    overrides: Pick<ServerOptions, 'admin' | 'authorizeAdmin' | 'basePath'> = {},
  ) {
    store = new InMemoryTtlStore({ cleanupIntervalMs: 0 });
    running = await startServer({
      store,
      logger,
      port: 0, // Random available port
      host: '127.0.0.1',
      defaultMode: 'best-effort',
      defaultPolicy: { maxRequests: 1, windowSeconds: 60, cachePrefix: 'rl_' },
      routes: [
        {
          method: 'GET',
          path: '/api/sections',
          action: 'sections',
          handler: (_req, res) => sendJson(res, { sections: [] }),
        },
      ],
      ...overrides,
    });
    return running;
  }

  const adminOptions = {
    admin: true,
    authorizeAdmin: (req: IncomingMessage) =>
      req.headers['x-admin-token'] === 'test-admin-token',
  };

  it('serves guarded routes and the authorized admin API', async () => {
    const { url } = await start(adminOptions);

    const first = await fetch(`${url}/api/sections`);
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({ sections: [] });

    const second = await fetch(`${url}/api/sections`);
    expect(second.status).toBe(429);

    const health = await fetch(`${url}/api/health`, {
      headers: { 'x-admin-token': 'test-admin-token' },
    });
    expect(health.status).toBe(200);
    expect((await health.json()).status).toBe('ok');
  });

  it('logs the listening URL', async () => {
    const { url } = await start();
    expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(logger.info).toHaveBeenCalledWith(`window-guard listening at ${url}`);
  });

  it('answers 404 for unrouted paths', async () => {
    const { url } = await start();
    const res = await fetch(`${url}/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('omits the admin API by default', async () => {
    const { url } = await start();
    const res = await fetch(`${url}/api/health`);
    expect(res.status).toBe(404);
  });

  it('does not let a refused caller reset its own counter', async () => {
    const key = encodeURIComponent('rl_sections_ip_127.0.0.1');

    for (const options of [{}, adminOptions]) {
      const { url } = await start(options);
      expect((await fetch(`${url}/api/sections`)).status).toBe(200);
      expect((await fetch(`${url}/api/sections`)).status).toBe(429);

      const reset = await fetch(`${url}/api/rate-limit/entries/${key}`, {
        method: 'DELETE',
      });
      expect(reset.status).toBe(options === adminOptions ? 403 : 404);
      expect((await fetch(`${url}/api/sections`)).status).toBe(429);

      await running?.close();
      running = undefined;
      store?.destroy();
    }
  });

  it('mounts routes under basePath', async () => {
    const { url } = await start({ basePath: '/guard' });
    const res = await fetch(`${url}/guard/api/sections`);
    expect(res.status).toBe(200);
  });

  it('should reject on close error when server is already closed', async () => {
    const server = await start();

    await new Promise<void>((resolve) => {
      server.server.close(() => resolve());
    });

    await expect(server.close()).rejects.toThrow();
    running = undefined; // Prevent double-close in afterEach
  });
});
