export { SQLiteTtlStore } from './sqlite-ttl-store.js';
export type { SQLiteTtlStoreOptions } from './sqlite-ttl-store.js';
export * from './schema.js';

// Re-export the store interfaces from the core package for convenience
export type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlStore,
} from '@window-guard/core';
