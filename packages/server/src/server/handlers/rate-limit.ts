import type { ServerResponse } from 'http';
import { isInspectableTtlStore, type TtlStore } from '@window-guard/core';
import { extractParam } from '../request-helpers.js';
import { sendJson, sendError, sendNotFound } from '../response-helpers.js';

function sendUnsupported(res: ServerResponse, operation: string): void {
  sendError(res, `Rate limit store does not support ${operation}`, 404);
}

export async function handleRateLimitStats(
  res: ServerResponse,
  store: TtlStore,
): Promise<void> {
  if (!isInspectableTtlStore(store)) {
    sendUnsupported(res, 'stats');
    return;
  }
  try {
    const stats = await store.getStats();
    sendJson(res, { stats });
  } catch (err) {
    sendError(res, err instanceof Error ? err.message : 'Unknown error');
  }
}

export async function handleRateLimitEntries(
  res: ServerResponse,
  store: TtlStore,
  query: URLSearchParams,
): Promise<void> {
  if (!isInspectableTtlStore(store)) {
    sendUnsupported(res, 'listing entries');
    return;
  }
  try {
    const prefix = query.get('prefix') ?? '';
    const entries = await store.listEntries();
    sendJson(res, {
      entries: entries.filter((entry) => entry.key.startsWith(prefix)),
    });
  } catch (err) {
    sendError(res, err instanceof Error ? err.message : 'Unknown error');
  }
}

export async function handleDeleteRateLimitEntry(
  res: ServerResponse,
  store: TtlStore,
  pathname: string,
): Promise<void> {
  try {
    const key = extractParam(pathname, '/api/rate-limit/entries/:key');
    if (!key) {
      sendNotFound(res);
      return;
    }
    await store.delete(key);
    sendJson(res, { deleted: true, key });
  } catch (err) {
    sendError(res, err instanceof Error ? err.message : 'Unknown error');
  }
}
