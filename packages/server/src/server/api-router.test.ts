import { createServer, type Server } from 'http';
import type { TtlStore } from '@window-guard/core';
import { InMemoryTtlStore } from '@window-guard/store-memory';
import { describe, it, expect, afterEach, vi } from 'vitest';
import type { AdminAuthorizer } from '../config.js';
import { createAdminRouter } from './api-router.js';
import { parseUrl } from './request-helpers.js';

function startAdmin(
  store: TtlStore,
  authorize: AdminAuthorizer = () => true,
): Promise<{ server: Server; port: number }> {
  const router = createAdminRouter({ store, authorize });
  return new Promise((resolve) => {
    const server = createServer((req, res) => {
      const { pathname } = parseUrl(req, '/');
      router(req, res, pathname)
        .then((handled) => {
          if (!handled) {
            res.writeHead(418);
            res.end();
          }
        })
        .catch(() => {
          res.writeHead(500);
          res.end();
        });
    });
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr ? addr.port : 0;
      resolve({ server, port });
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

describe('createAdminRouter', () => {
  let server: Server | undefined;
  let memory: InMemoryTtlStore | undefined;

  afterEach(async () => {
    if (server) {
      await closeServer(server);
      server = undefined;
    }
    memory?.destroy();
    memory = undefined;
  });

  async function fetchJson(port: number, path: string, init?: RequestInit) {
    const res = await fetch(`http://127.0.0.1:${port}${path}`, init);
    return { status: res.status, body: await res.json() };
  }

  describe('with an inspectable store', () => {
    async function setup() {
      memory = new InMemoryTtlStore({ cleanupIntervalMs: 0 });
      await memory.set('rl_posts_user_1', 3, 60);
      await memory.set('form_contact_ip_203.0.113.9', 1, 300);
      const result = await startAdmin(memory);
      server = result.server;
      return result.port;
    }

    it('GET /api/health reports store capabilities', async () => {
      const port = await setup();
      const { status, body } = await fetchJson(port, '/api/health');
      expect(status).toBe(200);
      expect(body).toEqual({
        status: 'ok',
        store: { capabilities: { atomic: true, inspectable: true } },
      });
    });

    it('GET /api/rate-limit/stats returns counts', async () => {
      const port = await setup();
      const { status, body } = await fetchJson(port, '/api/rate-limit/stats');
      expect(status).toBe(200);
      expect(body.stats).toEqual({ totalEntries: 2, expiredEntries: 0 });
    });

    it('GET /api/rate-limit/entries filters by prefix', async () => {
      const port = await setup();
      const { status, body } = await fetchJson(
        port,
        '/api/rate-limit/entries?prefix=rl_',
      );
      expect(status).toBe(200);
      expect(body.entries).toHaveLength(1);
      expect(body.entries[0].key).toBe('rl_posts_user_1');
      expect(body.entries[0].value).toBe(3);
    });

    it('DELETE /api/rate-limit/entries/:key resets one counter', async () => {
      const port = await setup();
      const { status, body } = await fetchJson(
        port,
        `/api/rate-limit/entries/${encodeURIComponent('rl_posts_user_1')}`,
        { method: 'DELETE' },
      );
      expect(status).toBe(200);
      expect(body).toEqual({ deleted: true, key: 'rl_posts_user_1' });
      await expect(memory?.get('rl_posts_user_1')).resolves.toBeUndefined();
    });

    it('GET on a single entry returns 405', async () => {
      const port = await setup();
      const { status } = await fetchJson(port, '/api/rate-limit/entries/x');
      expect(status).toBe(405);
    });

    it('unknown /api paths return 404 and others are not handled', async () => {
      const port = await setup();
      expect((await fetchJson(port, '/api/nope')).status).toBe(404);
      const res = await fetch(`http://127.0.0.1:${port}/elsewhere`);
      expect(res.status).toBe(418);
    });
  });

  describe('authorization', () => {
    const authorize = vi.fn<AdminAuthorizer>(
      (req) => req.headers['x-admin-token'] === 'test-admin-token',
    );

    async function setup() {
      authorize.mockClear();
      memory = new InMemoryTtlStore({ cleanupIntervalMs: 0 });
      await memory.set('rl_posts_ip_203.0.113.9', 1, 60);
      const result = await startAdmin(memory, authorize);
      server = result.server;
      return result.port;
    }

    it('refuses admin requests the authorizer rejects', async () => {
      const port = await setup();
      const { status, body } = await fetchJson(
        port,
        `/api/rate-limit/entries/${encodeURIComponent('rl_posts_ip_203.0.113.9')}`,
        { method: 'DELETE' },
      );
      expect(status).toBe(403);
      expect(body).toEqual({ error: 'Forbidden' });
      await expect(memory?.get('rl_posts_ip_203.0.113.9')).resolves.toBe(1);
    });

    it('serves admin requests the authorizer accepts', async () => {
      const port = await setup();
      const { status } = await fetchJson(port, '/api/rate-limit/stats', {
        headers: { 'x-admin-token': 'test-admin-token' },
      });
      expect(status).toBe(200);
    });

    it('does not consult the authorizer outside /api/', async () => {
      const port = await setup();
      const res = await fetch(`http://127.0.0.1:${port}/elsewhere`);
      expect(res.status).toBe(418);
      expect(authorize).not.toHaveBeenCalled();
    });
  });

  describe('with a minimal store', () => {
    const store: TtlStore = {
      get: vi.fn(async () => undefined),
      set: vi.fn(async () => undefined),
      delete: vi.fn(async () => undefined),
    };

    it('reports unsupported inspection operations', async () => {
      const result = await startAdmin(store);
      server = result.server;

      const stats = await fetchJson(result.port, '/api/rate-limit/stats');
      expect(stats.status).toBe(404);
      expect(stats.body).toEqual({
        error: 'Rate limit store does not support stats',
      });

      const entries = await fetchJson(result.port, '/api/rate-limit/entries');
      expect(entries.body).toEqual({
        error: 'Rate limit store does not support listing entries',
      });

      const health = await fetchJson(result.port, '/api/health');
      expect(health.body.store.capabilities).toEqual({
        atomic: false,
        inspectable: false,
      });
    });

    it('still deletes entries', async () => {
      const result = await startAdmin(store);
      server = result.server;

      const { status } = await fetchJson(
        result.port,
        '/api/rate-limit/entries/rl_a_user_1',
        { method: 'DELETE' },
      );
      expect(status).toBe(200);
      expect(store.delete).toHaveBeenCalledWith('rl_a_user_1');
    });
  });
});
