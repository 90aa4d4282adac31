import type { IncomingMessage } from 'http';
import type { HeaderBag, Requester, UserId } from '@window-guard/core';

export function parseUrl(
  req: IncomingMessage,
  basePath: string,
): { pathname: string; query: URLSearchParams } {
  const raw = req.url ?? '/';
  const url = new URL(raw, 'http://localhost');

  return {
    pathname: stripBasePath(url.pathname, basePath),
    query: url.searchParams,
  };
}

export function stripBasePath(pathname: string, basePath: string): string {
  if (
    basePath !== '/' &&
    pathname.startsWith(basePath) &&
    (pathname.length === basePath.length || pathname[basePath.length] === '/')
  ) {
    return pathname.slice(basePath.length) || '/';
  }
  return pathname;
}

/**
 * Match `pathname` against a pattern like `/api/rate-limit/entries/:key`.
 * Returns the decoded named segments, or `undefined` when it does not match.
 */
export function matchPath(
  pathname: string,
  pattern: string,
): Record<string, string> | undefined {
  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');

  if (patternParts.length !== pathParts.length) return undefined;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const pp = patternParts[i] ?? '';
    const part = pathParts[i] ?? '';
    if (pp.startsWith(':')) {
      if (part === '') return undefined;
      try {
        params[pp.slice(1)] = decodeURIComponent(part);
      } catch {
        // Malformed percent-encoding
        return undefined;
      }
      continue;
    }
    if (pp !== part) return undefined;
  }

  return params;
}

export function extractParam(
  pathname: string,
  pattern: string,
): string | undefined {
  const params = matchPath(pathname, pattern);
  if (!params) return undefined;
  const name = pattern.split('/').find((p) => p.startsWith(':'));
  return name ? params[name.slice(1)] : undefined;
}

export function toRequester(
  req: IncomingMessage,
  userId: UserId | null | undefined,
): Requester {
  return {
    userId,
    headers: req.headers,
    remoteAddress: req.socket.remoteAddress,
  };
}

export function headersToBag(headers: Headers): HeaderBag {
  const bag: HeaderBag = {};
  headers.forEach((value, name) => {
    bag[name] = value;
  });
  return bag;
}
