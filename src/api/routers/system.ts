// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { countFeeds, lastCheckTime } from "../../feeds/registry";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const { total, enabled } = countFeeds(ctx.db);

    return {
      lastCheckTime: lastCheckTime(ctx.db),
      pollSchedule: ctx.config.schedule.poll,
      daemonUrl: ctx.client.url,
      feedCount: total,
      enabledFeedCount: enabled,
    };
  }),

  pollNow: publicProcedure.mutation(({ ctx }) => {
    return ctx.scheduler.runNow();
  }),
});
