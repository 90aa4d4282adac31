import type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlEntryInfo,
  TtlStoreStats,
} from '@window-guard/core';

export interface InMemoryTtlStoreOptions {
  /** Interval for sweeping expired entries. `0` disables the sweep. */
  cleanupIntervalMs?: number;
  /** Maximum number of live keys; the least recently written key is evicted. */
  maxItems?: number;
}

interface TtlEntry {
  value: number;
  expiresAt: number;
}

export class InMemoryTtlStore implements AtomicTtlStore, InspectableTtlStore {
  private readonly entries = new Map<string, TtlEntry>();
  private readonly maxItems: number;
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({
    cleanupIntervalMs = 60_000,
    maxItems = 10_000,
  }: InMemoryTtlStoreOptions = {}) {
    this.maxItems = maxItems;

    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanup();
      }, cleanupIntervalMs);
      // Don't keep the process alive just for the sweep
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<number | undefined> {
    this.assertUsable();
    return this.readLive(key)?.value;
  }

  async set(key: string, value: number, ttlSeconds: number): Promise<void> {
    this.assertUsable();
    this.write(key, value, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    this.assertUsable();
    this.entries.delete(key);
  }

  async incrementBelow(
    key: string,
    max: number,
    ttlSeconds: number,
  ): Promise<number | undefined> {
    this.assertUsable();
    const current = this.readLive(key)?.value ?? 0;
    if (current >= max) {
      return undefined;
    }
    this.write(key, current + 1, ttlSeconds);
    return current + 1;
  }

  async getStats(): Promise<TtlStoreStats> {
    this.assertUsable();
    const now = Date.now();
    let expiredEntries = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt <= now) expiredEntries++;
    }
    return { totalEntries: this.entries.size, expiredEntries };
  }

  async listEntries(): Promise<Array<TtlEntryInfo>> {
    this.assertUsable();
    const now = Date.now();
    const live: Array<TtlEntryInfo> = [];
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt > now) {
        live.push({ key, value: entry.value, expiresAt: entry.expiresAt });
      }
    }
    return live;
  }

  /** Remove every expired entry. Returns how many were removed. */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.assertUsable();
    this.entries.clear();
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.entries.clear();
    this.isDestroyed = true;
  }

  private readLive(key: string): TtlEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private write(key: string, value: number, ttlSeconds: number): void {
    // Re-insert so Map order tracks write recency
    this.entries.delete(key);
    if (this.entries.size >= this.maxItems) {
      this.cleanup();
    }
    if (this.entries.size >= this.maxItems) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new Error('TTL store has been destroyed');
    }
  }
}
