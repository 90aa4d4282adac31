export { InMemoryTtlStore } from './in-memory-ttl-store.js';
export type { InMemoryTtlStoreOptions } from './in-memory-ttl-store.js';

// Re-export the store interfaces from the core package for convenience
export type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlStore,
} from '@window-guard/core';
