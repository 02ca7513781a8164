import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const feeds = sqliteTable(
  "feeds",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    url: text("url").notNull().unique(),
    pattern: text("pattern").notNull(),
    enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
    checkIntervalMinutes: integer("check_interval").notNull().default(15),
    lastCheckedAt: integer("last_checked", { mode: "timestamp" }),
    lastError: text("last_error"),
    matchCount: integer("match_count").notNull().default(0),
    createdAt: integer("created_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    enabledIdx: index("idx_feeds_enabled").on(table.enabled),
  }),
);

export const downloadedItems = sqliteTable(
  "downloaded_items",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    feedId: integer("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    itemGuid: text("item_guid").notNull(),
    itemTitle: text("item_title").notNull(),
    itemLink: text("item_link").notNull(),
    downloadedAt: integer("downloaded_at", { mode: "timestamp" }).notNull(),
  },
  (table) => ({
    feedGuidUnique: uniqueIndex("downloaded_items_feed_guid_unique").on(
      table.feedId,
      table.itemGuid,
    ),
    guidIdx: index("idx_downloaded_guid").on(table.itemGuid),
  }),
);

// ---------- Row types ----------

export type Feed = typeof feeds.$inferSelect;
export type NewFeed = typeof feeds.$inferInsert;
export type DownloadedItem = typeof downloadedItems.$inferSelect;
