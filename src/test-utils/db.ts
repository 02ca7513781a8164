import pino from "pino";
import { createDatabase, migrate } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { downloadedItems, feeds } from "../db/schema";
import type { NewFeed } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { AppContext } from "../api/context";
import { createFakeTransmissionClient } from "./transmission";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 * @returns A new AppDatabase instance with schema initialized.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  migrate(db);
  return db;
}

/**
 * Seeds a test feed with optional field overrides.
 * @returns The ID of the inserted feed.
 */
export function seedTestFeed(
  db: AppDatabase,
  overrides?: Partial<NewFeed>,
): number {
  const result = db
    .insert(feeds)
    .values({
      name: "Test Feed",
      url: `https://example.com/rss/${Math.random().toString(36).slice(2)}`,
      pattern: "^Ubuntu",
      ...overrides,
    })
    .returning({ id: feeds.id })
    .get();

  return result.id;
}

/**
 * Seeds a downloaded-item row for a feed.
 * @returns The ID of the inserted row.
 */
export function seedDownloadedItem(
  db: AppDatabase,
  feedId: number,
  overrides?: Partial<typeof downloadedItems.$inferInsert>,
): number {
  const result = db
    .insert(downloadedItems)
    .values({
      feedId,
      itemGuid: `guid-${Math.random().toString(36).slice(2)}`,
      itemTitle: "Ubuntu 24.04 Desktop",
      itemLink: "magnet:?xt=urn:btih:0000",
      downloadedAt: new Date("2026-01-01T00:00:00Z"),
      ...overrides,
    })
    .returning({ id: downloadedItems.id })
    .get();

  return result.id;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    transmission: {
      url: "http://daemon.test:9091/transmission/rpc",
      username: "transmission",
      password: "test-secret",
      timeoutMs: 10_000,
    },
    schedule: {
      poll: "*/15 * * * *",
    },
    polling: {
      defaultCheckIntervalMinutes: 15,
      fetchTimeoutMs: 30_000,
      maxConcurrentFeeds: 1,
    },
    feeds: [],
    ...overrides,
  };
}

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 * Context members not given are replaced by fakes.
 */
export function createTestCaller(
  db: AppDatabase,
  overrides?: Partial<Omit<AppContext, "db">>,
) {
  const createCaller = createCallerFactory(appRouter);
  const client = overrides?.client ?? createFakeTransmissionClient();

  return createCaller({
    db,
    config: overrides?.config ?? createTestConfig(),
    logger: overrides?.logger ?? pino({ level: "silent" }),
    client,
    checker: overrides?.checker ?? {
      checkFeed: () => Promise.reject(new Error("checker not configured")),
    },
    scheduler: overrides?.scheduler ?? {
      runNow: () => Promise.resolve({ due: 0, checked: 0, failed: 0 }),
    },
  });
}
