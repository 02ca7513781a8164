// pattern: Imperative Shell
import { router } from "./trpc";
import { feedsRouter } from "./routers/feeds";
import { torrentsRouter } from "./routers/torrents";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: feed registry, daemon torrent operations and system status.
 */
export const appRouter = router({
  feeds: feedsRouter,
  torrents: torrentsRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
