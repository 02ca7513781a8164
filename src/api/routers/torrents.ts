// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { withDomainErrors } from "../errors";

const idInput = z.object({ id: z.number().int().nonnegative() });

const addInput = z.union([
  z.object({ url: z.string().min(1) }).strict(),
  z.object({ metainfo: z.string().base64().min(1) }).strict(),
]);

/**
 * tRPC router proxying torrent operations to the daemon.
 */
export const torrentsRouter = router({
  list: publicProcedure.query(({ ctx }) =>
    withDomainErrors(() => ctx.client.getTorrents()),
  ),

  stats: publicProcedure.query(({ ctx }) =>
    withDomainErrors(() => ctx.client.getSessionStats()),
  ),

  testPort: publicProcedure.query(({ ctx }) =>
    withDomainErrors(async () => ({
      portIsOpen: await ctx.client.testPort(),
    })),
  ),

  freeSpace: publicProcedure
    .input(z.object({ path: z.string().min(1) }))
    .query(({ ctx, input }) =>
      withDomainErrors(() => ctx.client.getFreeSpace(input.path)),
    ),

  add: publicProcedure.input(addInput).mutation(({ ctx, input }) =>
    withDomainErrors(() =>
      "url" in input
        ? ctx.client.addTorrent({ filename: input.url })
        : ctx.client.addTorrent({
            metainfo: Buffer.from(input.metainfo, "base64"),
          }),
    ),
  ),

  start: publicProcedure.input(idInput).mutation(({ ctx, input }) =>
    withDomainErrors(async () => {
      await ctx.client.startTorrent(input.id);
      return { success: true };
    }),
  ),

  stop: publicProcedure.input(idInput).mutation(({ ctx, input }) =>
    withDomainErrors(async () => {
      await ctx.client.stopTorrent(input.id);
      return { success: true };
    }),
  ),

  remove: publicProcedure
    .input(idInput.extend({ deleteData: z.boolean().default(false) }))
    .mutation(({ ctx, input }) =>
      withDomainErrors(async () => {
        await ctx.client.removeTorrent(input.id, input.deleteData);
        return { success: true };
      }),
    ),

  reannounce: publicProcedure
    .input(z.object({ id: z.number().int().nonnegative().optional() }))
    .mutation(({ ctx, input }) =>
      withDomainErrors(async () => {
        if (input.id === undefined) {
          await ctx.client.reannounceAll();
        } else {
          await ctx.client.reannounceTorrent(input.id);
        }
        return { success: true };
      }),
    ),

  peers: publicProcedure.input(idInput).query(({ ctx, input }) =>
    withDomainErrors(() => ctx.client.getPeers(input.id)),
  ),
});
