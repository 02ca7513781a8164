// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { TransmissionClient } from "../transmission/client";
import { FeedNotFoundError, errorMessage } from "../errors";
import { addMatches, getFeed, recordCheckOutcome } from "../feeds/registry";
import { isDownloaded, recordDownload } from "../feeds/dedup";
import { compilePattern, filterMatching } from "./matcher";
import type { TitleMatcher } from "./matcher";
import { fetchFeed } from "./fetcher";
import { resolveDownloadLink } from "./links";
import type { CheckResult } from "./types";

export type FeedCheckerDeps = {
  readonly db: AppDatabase;
  readonly client: Pick<TransmissionClient, "addTorrent">;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly now?: () => Date;
};

export type FeedChecker = {
  /**
   * Checks one feed now. A call for a feed whose check is already running
   * joins that check instead of starting a second one.
   *
   * @throws FeedNotFoundError when the feed does not exist
   * @throws PersistenceError when the final status update cannot be written
   */
  readonly checkFeed: (feedId: number, signal?: AbortSignal) => Promise<CheckResult>;
  /** Aborts in-flight fetch and RPC calls and waits for running checks to settle. */
  readonly stop: () => Promise<void>;
};

const ABORTED = "check aborted";

function failed(feedId: number, error: string): CheckResult {
  return {
    feedId,
    status: "failed",
    error,
    itemCount: 0,
    matched: 0,
    submitted: 0,
    duplicates: 0,
    unresolved: 0,
    failedSubmissions: 0,
  };
}

export function createFeedChecker(deps: FeedCheckerDeps): FeedChecker {
  const { db, client, config, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const shutdown = new AbortController();
  const inFlight = new Map<number, Promise<CheckResult>>();

  async function runCheck(
    feedId: number,
    signal: AbortSignal,
  ): Promise<CheckResult> {
    if (signal.aborted) return failed(feedId, ABORTED);

    const feed = getFeed(db, feedId);
    if (!feed) throw new FeedNotFoundError(feedId);

    const log = logger.child({ feedId, feedName: feed.name });

    let matcher: TitleMatcher;
    try {
      matcher = compilePattern(feed.pattern);
    } catch (err) {
      const message = errorMessage(err);
      log.error({ pattern: feed.pattern, error: message }, "feed pattern invalid");
      recordCheckOutcome(db, feedId, { submitted: 0, error: message }, now());
      return failed(feedId, message);
    }

    const fetched = await fetchFeed(
      feed.url,
      { timeoutMs: config.polling.fetchTimeoutMs, signal },
      log,
    );
    if (!fetched.success) {
      // Shutdown is not a feed failure; leave the status untouched.
      if (signal.aborted) return failed(feedId, ABORTED);
      const message = `${fetched.kind} error: ${fetched.error}`;
      recordCheckOutcome(db, feedId, { submitted: 0, error: message }, now());
      return failed(feedId, message);
    }

    const candidates = filterMatching(matcher, fetched.items);
    const matched = candidates.length;
    let submitted = 0;
    let duplicates = 0;
    let unresolved = 0;
    let failedSubmissions = 0;
    let lastItemError: string | null = null;

    for (const item of candidates) {
      if (signal.aborted) break;

      if (isDownloaded(db, feedId, item.guid)) {
        duplicates++;
        log.debug({ itemGuid: item.guid }, "item already downloaded");
        continue;
      }

      const link = resolveDownloadLink(item);
      if (!link) {
        unresolved++;
        log.info(
          { itemGuid: item.guid, title: item.title },
          "no torrent link found for matching item",
        );
        continue;
      }

      try {
        await client.addTorrent({ filename: link }, signal);
      } catch (err) {
        if (signal.aborted) break;
        failedSubmissions++;
        lastItemError = `failed to add "${item.title}": ${errorMessage(err)}`;
        log.error(
          { itemGuid: item.guid, title: item.title, error: errorMessage(err) },
          "torrent submission failed",
        );
        continue;
      }

      // Submitted but unrecorded items are retried next cycle (at-least-once).
      try {
        const outcome = recordDownload(db, feedId, item, link, now());
        if (outcome === "duplicate") {
          duplicates++;
          log.warn({ itemGuid: item.guid }, "item recorded concurrently");
          continue;
        }
      } catch (err) {
        log.error(
          { itemGuid: item.guid, error: errorMessage(err) },
          "submitted item could not be recorded",
        );
        continue;
      }

      submitted++;
      log.info({ itemGuid: item.guid, title: item.title }, "torrent added from feed");
    }

    if (signal.aborted) {
      // Items left unprocessed stay due; only the submissions already recorded count.
      if (submitted > 0) addMatches(db, feedId, submitted);
      log.info({ matched, submitted }, "feed check aborted");
      return {
        feedId,
        status: "failed",
        error: ABORTED,
        itemCount: fetched.items.length,
        matched,
        submitted,
        duplicates,
        unresolved,
        failedSubmissions,
      };
    }

    recordCheckOutcome(
      db,
      feedId,
      { submitted, error: lastItemError },
      now(),
    );

    log.info(
      {
        itemCount: fetched.items.length,
        matched,
        submitted,
        duplicates,
        unresolved,
        failedSubmissions,
      },
      "feed check complete",
    );

    return {
      feedId,
      status: "ok",
      error: lastItemError,
      itemCount: fetched.items.length,
      matched,
      submitted,
      duplicates,
      unresolved,
      failedSubmissions,
    };
  }

  function checkFeed(feedId: number, signal?: AbortSignal): Promise<CheckResult> {
    const running = inFlight.get(feedId);
    if (running) {
      logger.debug({ feedId }, "feed check already running, joining it");
      return running;
    }

    const combined = signal
      ? AbortSignal.any([shutdown.signal, signal])
      : shutdown.signal;

    const check = runCheck(feedId, combined).finally(() => {
      inFlight.delete(feedId);
    });
    inFlight.set(feedId, check);
    return check;
  }

  async function stop(): Promise<void> {
    shutdown.abort();
    await Promise.allSettled([...inFlight.values()]);
  }

  return { checkFeed, stop };
}
