/**
 * Key-value store with a per-key expiry, used to hold rate-limit counters.
 *
 * Implementations own expiry: once `ttlSeconds` have elapsed since the last
 * `set`, `get` must report the key as absent.
 */
export interface TtlStore {
  /** Current value, or `undefined` when the key is absent or expired. */
  get(key: string): Promise<number | undefined>;
  /** Write `value` and restart the key's expiry at `now + ttlSeconds`. */
  set(key: string, value: number, ttlSeconds: number): Promise<void>;
  /** Remove a key. The limiter itself never calls this. */
  delete(key: string): Promise<void>;
}

/**
 * A store that can perform the limiter's read-compare-write as one step.
 */
export interface AtomicTtlStore extends TtlStore {
  /**
   * Increment the live counter at `key` unless it has already reached `max`.
   *
   * @returns the new count, or `undefined` when the counter was at or above
   *          `max` (nothing is written in that case)
   */
  incrementBelow(
    key: string,
    max: number,
    ttlSeconds: number,
  ): Promise<number | undefined>;
}

export interface TtlEntryInfo {
  key: string;
  value: number;
  expiresAt: number;
}

export interface TtlStoreStats {
  totalEntries: number;
  expiredEntries: number;
}

/** Optional capabilities a store may expose for inspection. */
export interface InspectableTtlStore extends TtlStore {
  getStats(): Promise<TtlStoreStats>;
  listEntries(): Promise<Array<TtlEntryInfo>>;
}

export function isAtomicTtlStore(store: TtlStore): store is AtomicTtlStore {
  return (
    'incrementBelow' in store && typeof store.incrementBelow === 'function'
  );
}

export function isInspectableTtlStore(
  store: TtlStore,
): store is InspectableTtlStore {
  return (
    'getStats' in store &&
    typeof store.getStats === 'function' &&
    'listEntries' in store &&
    typeof store.listEntries === 'function'
  );
}
