import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase, migrate } from "./db";
import { seedDatabase } from "./seed";
import { createTransmissionClient } from "./transmission/client";
import { createFeedChecker } from "./pipeline";
import { createPollScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feeds.db";
const PORT = parseInt(process.env["PORT"] ?? "8080", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("rss-torrent-relay starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { daemonUrl: config.transmission.url, pollSchedule: config.schedule.poll },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));

  migrate(db);
  logger.info("database schema ready");

  seedDatabase(db, config, logger);

  const client = createTransmissionClient({
    url: config.transmission.url,
    username: config.transmission.username,
    password: config.transmission.password,
    timeoutMs: config.transmission.timeoutMs,
    logger: logger.child({ component: "transmission" }),
  });

  const checker = createFeedChecker({ db, client, config, logger });
  const scheduler = createPollScheduler(db, config, logger, checker);
  logger.info({ schedule: config.schedule.poll }, "poll scheduler started");

  const app = createApiServer({ db, config, logger, client, checker, scheduler });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  registerShutdownHandlers({
    stoppables: [checker, scheduler],
    closeServer: () =>
      new Promise<void>((resolveClose, rejectClose) => {
        server.close((err) => (err ? rejectClose(err) : resolveClose()));
      }),
    closeDb,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
