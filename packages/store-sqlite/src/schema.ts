import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const ttlEntryTable = sqliteTable(
  'ttl_entries',
  {
    key: text('key').primaryKey(),
    value: integer('value').notNull(),
    /** Expiry as epoch milliseconds */
    expiresAt: integer('expires_at').notNull(),
  },
  (table) => ({
    expiresAtIdx: index('idx_ttl_entries_expires_at').on(table.expiresAt),
  }),
);

export type TtlEntryRow = typeof ttlEntryTable.$inferSelect;

export const CREATE_TTL_ENTRIES_SQL = `
  CREATE TABLE IF NOT EXISTS ttl_entries (
    key TEXT PRIMARY KEY,
    value INTEGER NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_ttl_entries_expires_at
    ON ttl_entries (expires_at);
`;
