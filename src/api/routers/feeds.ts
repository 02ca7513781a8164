// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { withDomainErrors } from "../errors";
import {
  createFeed,
  deleteFeed,
  getFeed,
  listDownloadedItems,
  listFeeds,
  updateFeed,
} from "../../feeds/registry";

const feedFields = {
  name: z.string().min(1),
  url: z.string().url(),
  pattern: z.string().min(1),
  enabled: z.boolean().optional(),
  checkIntervalMinutes: z.number().int().optional(),
};

/**
 * tRPC router for the feed registry, manual checks and download history.
 */
export const feedsRouter = router({
  list: publicProcedure.query(({ ctx }) => {
    return listFeeds(ctx.db);
  }),

  getById: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .query(({ ctx, input }) => {
      return getFeed(ctx.db, input.id) ?? null;
    }),

  create: publicProcedure
    .input(z.object(feedFields))
    .mutation(({ ctx, input }) =>
      withDomainErrors(() =>
        createFeed(ctx.db, input, {
          defaultCheckIntervalMinutes:
            ctx.config.polling.defaultCheckIntervalMinutes,
        }),
      ),
    ),

  update: publicProcedure
    .input(
      z.object({
        id: z.number().int(),
        name: feedFields.name.optional(),
        url: feedFields.url.optional(),
        pattern: feedFields.pattern.optional(),
        enabled: z.boolean().optional(),
        checkIntervalMinutes: z.number().int().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const { id, ...updates } = input;
      return withDomainErrors(() =>
        updateFeed(ctx.db, id, updates, {
          defaultCheckIntervalMinutes:
            ctx.config.polling.defaultCheckIntervalMinutes,
        }),
      );
    }),

  delete: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .mutation(({ ctx, input }) =>
      withDomainErrors(() => {
        deleteFeed(ctx.db, input.id);
        return { success: true };
      }),
    ),

  checkNow: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .mutation(({ ctx, input }) =>
      withDomainErrors(() => ctx.checker.checkFeed(input.id)),
    ),

  downloads: publicProcedure
    .input(
      z.object({
        feedId: z.number().int(),
        limit: z.number().int().optional(),
      }),
    )
    .query(({ ctx, input }) => {
      return listDownloadedItems(ctx.db, input.feedId, input.limit);
    }),
});
