import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { isDue, listFeeds } from "./feeds/registry";
import type { FeedChecker } from "./pipeline";
import { errorMessage } from "./errors";

export type PollScheduler = {
  /** Runs one poll cycle, or joins the one already running. */
  readonly runNow: () => Promise<PollCycleSummary>;
  readonly stop: () => Promise<void>;
};

export type PollCycleSummary = {
  readonly due: number;
  readonly checked: number;
  readonly failed: number;
};

/**
 * Runs a single pass over the registry: every enabled, due feed is checked,
 * at most `maxConcurrentFeeds` at a time, in registry order. A failing feed
 * is logged and never stops the pass.
 */
export async function runPollCycle(
  db: AppDatabase,
  config: AppConfig,
  checker: Pick<FeedChecker, "checkFeed">,
  logger: Logger,
  signal?: AbortSignal,
  now: Date = new Date(),
): Promise<PollCycleSummary> {
  const dueFeeds = listFeeds(db).filter(
    (feed) => feed.enabled && isDue(feed, now),
  );

  logger.info({ dueCount: dueFeeds.length }, "poll cycle starting");

  const limit = pLimit(config.polling.maxConcurrentFeeds);
  let checked = 0;
  let failed = 0;

  await Promise.all(
    dueFeeds.map((feed) =>
      limit(async () => {
        if (signal?.aborted) return;
        try {
          const result = await checker.checkFeed(feed.id, signal);
          checked++;
          if (result.status === "failed") failed++;
        } catch (err) {
          failed++;
          logger.error(
            { feedId: feed.id, feedName: feed.name, error: errorMessage(err) },
            "unexpected error during feed check",
          );
        }
      }),
    ),
  );

  logger.info({ dueCount: dueFeeds.length, checked, failed }, "poll cycle complete");
  return { due: dueFeeds.length, checked, failed };
}

/**
 * Creates and starts the poll scheduler: one cycle right away, then one per
 * tick of `schedule.poll`. A tick that fires while a cycle is still running
 * is skipped.
 *
 * @returns A PollScheduler whose stop() halts the ticks, aborts in-flight
 *          calls and resolves once the running cycle has settled
 */
export function createPollScheduler(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
  checker: Pick<FeedChecker, "checkFeed">,
): PollScheduler {
  const controller = new AbortController();
  let current: Promise<PollCycleSummary> | null = null;

  const runNow = (): Promise<PollCycleSummary> => {
    if (current) return current;

    current = runPollCycle(db, config, checker, logger, controller.signal)
      .catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, "poll cycle failed");
        return { due: 0, checked: 0, failed: 0 };
      })
      .finally(() => {
        current = null;
      });
    return current;
  };

  const task: ScheduledTask = cron.schedule(config.schedule.poll, async () => {
    if (current) {
      logger.warn("previous poll cycle still running, skipping tick");
      return;
    }
    await runNow();
  });

  void runNow();

  return {
    runNow,
    stop: async () => {
      task.stop();
      controller.abort();
      if (current) await current;
    },
  };
}
