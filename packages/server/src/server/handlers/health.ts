import type { ServerResponse } from 'http';
import {
  isAtomicTtlStore,
  isInspectableTtlStore,
  type TtlStore,
} from '@window-guard/core';
import { sendJson } from '../response-helpers.js';

export function storeCapabilities(store: TtlStore) {
  return {
    atomic: isAtomicTtlStore(store),
    inspectable: isInspectableTtlStore(store),
  };
}

export function handleHealth(res: ServerResponse, store: TtlStore): void {
  sendJson(res, {
    status: 'ok',
    store: { capabilities: storeCapabilities(store) },
  });
}
