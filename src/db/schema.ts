import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Single-row snapshot of the delivery ledger. JSON columns are stored as
 * plain text and validated on read.
 */
export const ledger = sqliteTable("ledger", {
  id: integer("id").primaryKey(),
  deliveredIds: text("delivered_ids").notNull(),
  lastSuccessAt: text("last_success_at"),
  lastSeenPublishedAt: text("last_seen_published_at").notNull(),
});

export const LEDGER_DDL = `
CREATE TABLE IF NOT EXISTS ledger (
  id INTEGER PRIMARY KEY,
  delivered_ids TEXT NOT NULL,
  last_success_at TEXT,
  last_seen_published_at TEXT NOT NULL
);
`;
