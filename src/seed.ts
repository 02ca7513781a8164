import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { feeds } from "./db/schema";
import { createFeed } from "./feeds/registry";
import { errorMessage } from "./errors";

/**
 * Seeds feeds from configuration into an empty registry.
 *
 * Seeding only happens while the feeds table is empty, so the database is the
 * source of truth after the first run. A seed entry that fails validation is
 * logged and skipped.
 *
 * @returns Number of feeds inserted
 */
export function seedDatabase(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
): number {
  const existingFeeds = db.select({ id: feeds.id }).from(feeds).all();

  if (existingFeeds.length > 0) {
    logger.info(
      { existingCount: existingFeeds.length },
      "feeds already exist, skipping seed",
    );
    return 0;
  }

  logger.info({ feedCount: config.feeds.length }, "seeding feeds from config");

  let inserted = 0;
  for (const feed of config.feeds) {
    try {
      createFeed(db, feed, {
        defaultCheckIntervalMinutes: config.polling.defaultCheckIntervalMinutes,
      });
      inserted++;
    } catch (err) {
      logger.error(
        { feedName: feed.name, feedUrl: feed.url, error: errorMessage(err) },
        "skipping invalid seed feed",
      );
    }
  }

  return inserted;
}
