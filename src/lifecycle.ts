// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "./errors";

/**
 * Something that must be halted before the database closes. Async stops are
 * awaited.
 */
export type Stoppable = {
  readonly stop: () => void | Promise<void>;
};

export type ShutdownDeps = {
  readonly stoppables: ReadonlyArray<Stoppable>;
  readonly closeServer?: () => Promise<void>;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Stops everything in order: stoppables (sequentially, awaited), then the
 * HTTP server, then the database. A failing step is logged and the rest
 * still run.
 */
export async function shutdown(deps: ShutdownDeps): Promise<void> {
  for (const stoppable of deps.stoppables) {
    try {
      await stoppable.stop();
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error stopping component");
    }
  }

  if (deps.closeServer) {
    try {
      await deps.closeServer();
      deps.logger.info("http server closed");
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error closing http server");
    }
  }

  try {
    deps.closeDb();
    deps.logger.info("database connection closed");
  } catch (err) {
    deps.logger.error({ error: errorMessage(err) }, "error closing database");
  }
}

/**
 * Registers SIGTERM and SIGINT handlers that run shutdown() once, then exit 0.
 * A second signal during shutdown is ignored.
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  let shuttingDown = false;

  const onSignal = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    void shutdown(deps).then(() => {
      deps.logger.info("shutdown complete");
      exit(0);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}
