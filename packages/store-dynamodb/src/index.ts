export { DynamoDBTtlStore } from './dynamodb-ttl-store.js';
export type { DynamoDBTtlStoreOptions } from './dynamodb-ttl-store.js';
export {
  DEFAULT_TABLE_NAME,
  TTL_ATTRIBUTE,
  createTable,
  ensureTable,
} from './table.js';
export type { TableWaitOptions } from './table.js';

// Re-export the store interfaces from the core package for convenience
export type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlStore,
} from '@window-guard/core';
