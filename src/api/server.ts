// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";

/**
 * Creates the Express app with the tRPC router mounted at `/api/trpc` and a
 * `/health` endpoint for container health checks.
 *
 * @returns Configured Express app (not listening; the caller picks the port)
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
      onError: ({ path, error }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          context.logger.error({ path, error: error.message }, "api request failed");
        } else {
          context.logger.debug({ path, code: error.code, error: error.message }, "api request rejected");
        }
      },
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
