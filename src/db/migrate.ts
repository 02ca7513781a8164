import { sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AppDatabase } from "./index";

const statements: ReadonlyArray<SQL> = [
  sql`CREATE TABLE IF NOT EXISTS feeds (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    url TEXT NOT NULL UNIQUE,
    pattern TEXT NOT NULL,
    enabled INTEGER NOT NULL DEFAULT 1,
    check_interval INTEGER NOT NULL DEFAULT 15,
    last_checked INTEGER,
    last_error TEXT,
    match_count INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL DEFAULT (unixepoch())
  )`,
  sql`CREATE TABLE IF NOT EXISTS downloaded_items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    feed_id INTEGER NOT NULL REFERENCES feeds(id) ON DELETE CASCADE,
    item_guid TEXT NOT NULL,
    item_title TEXT NOT NULL,
    item_link TEXT NOT NULL,
    downloaded_at INTEGER NOT NULL
  )`,
  sql`CREATE UNIQUE INDEX IF NOT EXISTS downloaded_items_feed_guid_unique
    ON downloaded_items (feed_id, item_guid)`,
  sql`CREATE INDEX IF NOT EXISTS idx_downloaded_guid ON downloaded_items (item_guid)`,
  sql`CREATE INDEX IF NOT EXISTS idx_feeds_enabled ON feeds (enabled)`,
];

/**
 * Creates the tables and indices if they do not exist yet. Safe to run on
 * every start.
 */
export function migrate(db: AppDatabase): void {
  db.transaction((tx) => {
    for (const statement of statements) {
      tx.run(statement);
    }
  });
}
