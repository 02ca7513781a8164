// pattern: Imperative Shell
import { asc, desc, eq, isNotNull, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { downloadedItems, feeds } from "../db/schema";
import type { DownloadedItem, Feed, NewFeed } from "../db/schema";
import {
  FeedConflictError,
  FeedNotFoundError,
  PersistenceError,
} from "../errors";
import { compilePattern } from "../pipeline/matcher";

export const DEFAULT_CHECK_INTERVAL_MINUTES = 15;
export const DEFAULT_DOWNLOAD_LIMIT = 50;
export const MAX_DOWNLOAD_LIMIT = 500;

export type CreateFeedInput = {
  readonly name: string;
  readonly url: string;
  readonly pattern: string;
  readonly enabled?: boolean;
  readonly checkIntervalMinutes?: number;
};

export type UpdateFeedInput = Partial<CreateFeedInput>;

export type RegistryOptions = {
  readonly defaultCheckIntervalMinutes?: number;
};

function normaliseInterval(
  minutes: number | undefined,
  options: RegistryOptions,
): number {
  const fallback =
    options.defaultCheckIntervalMinutes ?? DEFAULT_CHECK_INTERVAL_MINUTES;
  return minutes !== undefined && minutes > 0 ? minutes : fallback;
}

function isUniqueViolation(err: unknown): boolean {
  let current: unknown = err;
  while (current instanceof Error) {
    if ("code" in current && current.code === "SQLITE_CONSTRAINT_UNIQUE") {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export function listFeeds(db: AppDatabase): Array<Feed> {
  return db.select().from(feeds).orderBy(asc(feeds.id)).all();
}

export function getFeed(db: AppDatabase, feedId: number): Feed | undefined {
  return db.select().from(feeds).where(eq(feeds.id, feedId)).get();
}

/**
 * Persists a new feed. The pattern must compile; a missing or non-positive
 * check interval falls back to the configured default.
 *
 * @throws PatternError when the pattern does not compile (nothing is written)
 * @throws FeedConflictError when another feed already uses the url
 */
export function createFeed(
  db: AppDatabase,
  input: CreateFeedInput,
  options: RegistryOptions = {},
): Feed {
  compilePattern(input.pattern);

  try {
    return db
      .insert(feeds)
      .values({
        name: input.name,
        url: input.url,
        pattern: input.pattern,
        enabled: input.enabled ?? true,
        checkIntervalMinutes: normaliseInterval(
          input.checkIntervalMinutes,
          options,
        ),
      })
      .returning()
      .get();
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new FeedConflictError(input.url);
    }
    throw new PersistenceError("failed to create feed", err);
  }
}

/**
 * Applies a partial edit. A new pattern is re-validated before anything is
 * written.
 */
export function updateFeed(
  db: AppDatabase,
  feedId: number,
  input: UpdateFeedInput,
  options: RegistryOptions = {},
): Feed {
  if (input.pattern !== undefined) {
    compilePattern(input.pattern);
  }

  const updates: Partial<NewFeed> = {};
  if (input.name !== undefined) updates.name = input.name;
  if (input.url !== undefined) updates.url = input.url;
  if (input.pattern !== undefined) updates.pattern = input.pattern;
  if (input.enabled !== undefined) updates.enabled = input.enabled;
  if (input.checkIntervalMinutes !== undefined) {
    updates.checkIntervalMinutes = normaliseInterval(
      input.checkIntervalMinutes,
      options,
    );
  }

  if (Object.keys(updates).length === 0) {
    const existing = getFeed(db, feedId);
    if (!existing) throw new FeedNotFoundError(feedId);
    return existing;
  }

  let updated: Feed | undefined;
  try {
    updated = db
      .update(feeds)
      .set(updates)
      .where(eq(feeds.id, feedId))
      .returning()
      .get();
  } catch (err) {
    if (isUniqueViolation(err) && input.url !== undefined) {
      throw new FeedConflictError(input.url);
    }
    throw new PersistenceError(`failed to update feed ${feedId}`, err);
  }

  if (!updated) throw new FeedNotFoundError(feedId);
  return updated;
}

/** Deletes the feed; its downloaded-item history goes with it (FK cascade). */
export function deleteFeed(db: AppDatabase, feedId: number): void {
  const deleted = db
    .delete(feeds)
    .where(eq(feeds.id, feedId))
    .returning({ id: feeds.id })
    .get();

  if (!deleted) throw new FeedNotFoundError(feedId);
}

export function listDownloadedItems(
  db: AppDatabase,
  feedId: number,
  limit: number = DEFAULT_DOWNLOAD_LIMIT,
): Array<DownloadedItem> {
  const bounded =
    limit <= 0 ? DEFAULT_DOWNLOAD_LIMIT : Math.min(limit, MAX_DOWNLOAD_LIMIT);

  return db
    .select()
    .from(downloadedItems)
    .where(eq(downloadedItems.feedId, feedId))
    .orderBy(desc(downloadedItems.downloadedAt), desc(downloadedItems.id))
    .limit(bounded)
    .all();
}

export function isDue(feed: Feed, now: Date): boolean {
  if (!feed.lastCheckedAt) return true;
  const elapsedMs = now.getTime() - feed.lastCheckedAt.getTime();
  return elapsedMs >= feed.checkIntervalMinutes * 60_000;
}

export type CheckOutcome = {
  readonly submitted: number;
  readonly error: string | null;
};

/**
 * Writes the status of a finished check: lastChecked, lastError (null clears
 * it) and the match count increment, in a single statement.
 */
export function recordCheckOutcome(
  db: AppDatabase,
  feedId: number,
  outcome: CheckOutcome,
  checkedAt: Date,
): void {
  try {
    db.update(feeds)
      .set({
        lastCheckedAt: checkedAt,
        lastError: outcome.error,
        matchCount: sql`${feeds.matchCount} + ${outcome.submitted}`,
      })
      .where(eq(feeds.id, feedId))
      .run();
  } catch (err) {
    throw new PersistenceError(`failed to update status of feed ${feedId}`, err);
  }
}

/** Adds to matchCount without touching lastChecked or lastError. */
export function addMatches(db: AppDatabase, feedId: number, count: number): void {
  try {
    db.update(feeds)
      .set({ matchCount: sql`${feeds.matchCount} + ${count}` })
      .where(eq(feeds.id, feedId))
      .run();
  } catch (err) {
    throw new PersistenceError(`failed to update match count of feed ${feedId}`, err);
  }
}

export function countFeeds(db: AppDatabase): { total: number; enabled: number } {
  const row = db
    .select({
      total: sql<number>`count(*)`,
      enabled: sql<number>`coalesce(sum(${feeds.enabled}), 0)`,
    })
    .from(feeds)
    .get();

  return { total: row?.total ?? 0, enabled: row?.enabled ?? 0 };
}

export function lastCheckTime(db: AppDatabase): Date | null {
  const row = db
    .select({ lastCheckedAt: feeds.lastCheckedAt })
    .from(feeds)
    .where(isNotNull(feeds.lastCheckedAt))
    .orderBy(desc(feeds.lastCheckedAt))
    .get();

  return row?.lastCheckedAt ?? null;
}
