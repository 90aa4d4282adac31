import type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlEntryInfo,
  TtlStoreStats,
} from '@window-guard/core';
import Database from 'better-sqlite3';
import { and, count, eq, gt, lte } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';
import { CREATE_TTL_ENTRIES_SQL, ttlEntryTable } from './schema.js';

export interface SQLiteTtlStoreOptions {
  /** File path or existing `better-sqlite3` connection. Defaults to `':memory:'`. */
  database?: string | Database.Database;
  /** Interval for deleting expired rows. `0` disables the sweep. */
  cleanupIntervalMs?: number;
}

export class SQLiteTtlStore implements AtomicTtlStore, InspectableTtlStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  /** Whether this store opened the connection and must close it. */
  private readonly isConnectionManaged: boolean;
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({
    database = ':memory:',
    cleanupIntervalMs = 60_000,
  }: SQLiteTtlStoreOptions = {}) {
    if (typeof database === 'string') {
      this.sqlite = new Database(database);
      this.isConnectionManaged = true;
    } else {
      this.sqlite = database;
      this.isConnectionManaged = false;
    }

    this.sqlite.exec(CREATE_TTL_ENTRIES_SQL);
    this.db = drizzle(this.sqlite);

    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanup();
      }, cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<number | undefined> {
    this.assertUsable();
    return this.readLive(key);
  }

  async set(key: string, value: number, ttlSeconds: number): Promise<void> {
    this.assertUsable();
    this.write(this.db, key, value, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    this.assertUsable();
    this.db.delete(ttlEntryTable).where(eq(ttlEntryTable.key, key)).run();
  }

  async incrementBelow(
    key: string,
    max: number,
    ttlSeconds: number,
  ): Promise<number | undefined> {
    this.assertUsable();
    return this.db.transaction((tx) => {
      const row = tx
        .select({ value: ttlEntryTable.value })
        .from(ttlEntryTable)
        .where(
          and(
            eq(ttlEntryTable.key, key),
            gt(ttlEntryTable.expiresAt, Date.now()),
          ),
        )
        .get();
      const current = row?.value ?? 0;
      if (current >= max) {
        return undefined;
      }
      this.write(tx, key, current + 1, ttlSeconds);
      return current + 1;
    });
  }

  async getStats(): Promise<TtlStoreStats> {
    this.assertUsable();
    const total = this.db
      .select({ count: count() })
      .from(ttlEntryTable)
      .get();
    const expired = this.db
      .select({ count: count() })
      .from(ttlEntryTable)
      .where(lte(ttlEntryTable.expiresAt, Date.now()))
      .get();
    return {
      totalEntries: total?.count ?? 0,
      expiredEntries: expired?.count ?? 0,
    };
  }

  async listEntries(): Promise<Array<TtlEntryInfo>> {
    this.assertUsable();
    return this.db
      .select()
      .from(ttlEntryTable)
      .where(gt(ttlEntryTable.expiresAt, Date.now()))
      .orderBy(ttlEntryTable.key)
      .all();
  }

  /** Delete expired rows. Returns how many were removed. */
  cleanup(): number {
    if (this.isDestroyed) return 0;
    const result = this.db
      .delete(ttlEntryTable)
      .where(lte(ttlEntryTable.expiresAt, Date.now()))
      .run();
    return result.changes;
  }

  async clear(): Promise<void> {
    this.assertUsable();
    this.db.delete(ttlEntryTable).run();
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    if (!this.isDestroyed && this.isConnectionManaged) {
      this.sqlite.close();
    }
    this.isDestroyed = true;
  }

  private readLive(key: string): number | undefined {
    const row = this.db
      .select({ value: ttlEntryTable.value })
      .from(ttlEntryTable)
      .where(
        and(eq(ttlEntryTable.key, key), gt(ttlEntryTable.expiresAt, Date.now())),
      )
      .get();
    return row?.value;
  }

  private write(
    db: Pick<BetterSQLite3Database, 'insert'>,
    key: string,
    value: number,
    ttlSeconds: number,
  ): void {
    const expiresAt = Date.now() + ttlSeconds * 1000;
    db.insert(ttlEntryTable)
      .values({ key, value, expiresAt })
      .onConflictDoUpdate({
        target: ttlEntryTable.key,
        set: { value, expiresAt },
      })
      .run();
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new Error('TTL store has been destroyed');
    }
  }
}
