import { and, eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { downloadedItems } from "../db/schema";
import { PersistenceError } from "../errors";
import type { CandidateItem } from "../pipeline/types";

export type RecordOutcome = "recorded" | "duplicate";

export function isDownloaded(
  db: AppDatabase,
  feedId: number,
  itemGuid: string,
): boolean {
  const row = db
    .select({ id: downloadedItems.id })
    .from(downloadedItems)
    .where(
      and(
        eq(downloadedItems.feedId, feedId),
        eq(downloadedItems.itemGuid, itemGuid),
      ),
    )
    .get();

  return row !== undefined;
}

/**
 * Records a submitted item. The (feed_id, item_guid) unique index decides:
 * a conflicting insert writes nothing and reports "duplicate".
 *
 * @throws PersistenceError for any other storage failure
 */
export function recordDownload(
  db: AppDatabase,
  feedId: number,
  item: CandidateItem,
  link: string,
  downloadedAt: Date,
): RecordOutcome {
  let inserted: { id: number } | undefined;
  try {
    inserted = db
      .insert(downloadedItems)
      .values({
        feedId,
        itemGuid: item.guid,
        itemTitle: item.title,
        itemLink: link,
        downloadedAt,
      })
      .onConflictDoNothing({
        target: [downloadedItems.feedId, downloadedItems.itemGuid],
      })
      .returning({ id: downloadedItems.id })
      .get();
  } catch (err) {
    throw new PersistenceError(
      `failed to record item ${item.guid} for feed ${feedId}`,
      err,
    );
  }

  return inserted ? "recorded" : "duplicate";
}
