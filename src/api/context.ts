// pattern: Functional Core
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { TransmissionClient } from "../transmission/client";
import type { FeedChecker } from "../pipeline";
import type { PollScheduler } from "../scheduler";

/**
 * tRPC context passed to all procedures. The checker and client are the same
 * instances the scheduler uses, so a manual check joins a scheduled one.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly client: TransmissionClient;
  readonly checker: Pick<FeedChecker, "checkFeed">;
  readonly scheduler: Pick<PollScheduler, "runNow">;
};
