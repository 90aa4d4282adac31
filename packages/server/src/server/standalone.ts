import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'http';
import { validateServerOptions, type ServerOptions } from '../config.js';
import { createAdminRouter } from './api-router.js';
import { createGuardedRouter, type RequestRouter } from './guarded-router.js';
import { parseUrl } from './request-helpers.js';
import { sendError, sendNotFound } from './response-helpers.js';

export interface WindowGuardServer {
  server: Server;
  url: string;
  close(): Promise<void>;
}

/**
 * Serve the guarded routes and, when `admin` is set, the admin API behind
 * `authorizeAdmin`.
 * Requests neither router claims get a 404.
 */
export async function startServer(
  options: ServerOptions,
): Promise<WindowGuardServer> {
  const opts = validateServerOptions(options);

  const routers: Array<RequestRouter> = [
    createGuardedRouter({
      routes: opts.routes,
      defaultPolicy: opts.defaultPolicy,
      defaultMode: opts.defaultMode,
      logger: opts.logger,
      resolveUser: opts.resolveUser,
      store: opts.store,
      atomic: opts.atomic,
      trustedProxies: opts.trustedProxies,
    }),
  ];
  if (opts.admin && opts.authorizeAdmin) {
    routers.push(
      createAdminRouter({ store: opts.store, authorize: opts.authorizeAdmin }),
    );
  }

  const route = async (
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> => {
    const { pathname } = parseUrl(req, opts.basePath);
    for (const router of routers) {
      if (await router(req, res, pathname)) return;
    }
    sendNotFound(res);
  };

  const server = createServer((req, res) => {
    route(req, res)
      /* v8 ignore start -- routers answer their own errors */
      .catch(() => {
        if (!res.headersSent) {
          sendError(res, 'Internal server error');
        }
      });
    /* v8 ignore stop */
  });

  return new Promise((resolve, reject) => {
    server.on('error', reject);

    server.listen(opts.port, opts.host, () => {
      const addr = server.address();
      /* v8 ignore next 2 -- addr is string only for Unix sockets */
      const url =
        typeof addr === 'string'
          ? addr
          : `http://${opts.host}:${addr?.port ?? opts.port}`;

      opts.logger.info(`window-guard listening at ${url}`);

      resolve({
        server,
        url,
        async close() {
          return new Promise<void>((res, rej) => {
            server.close((err) => {
              if (err) rej(err);
              else res();
            });
          });
        },
      });
    });
  });
}
