// pattern: Imperative Shell
import { TRPCError } from "@trpc/server";
import { z } from "zod";
import { router, publicProcedure } from "../trpc";

const sourceIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_]+$/, "source id may only contain letters, digits and _");

/**
 * Operator management of the sources a sync run polls.
 */
export const subscriptionsRouter = router({
  list: publicProcedure.query(({ ctx }) => {
    return ctx.store.listSubscriptions();
  }),

  create: publicProcedure
    .input(
      z.object({
        sourceId: sourceIdSchema,
        title: z.string().min(1).optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const created = ctx.store.addSubscription(input);
      if (!created) {
        throw new TRPCError({
          code: "CONFLICT",
          message: `already subscribed to ${input.sourceId}`,
        });
      }
      ctx.logger.info({ sourceId: created.sourceId }, "subscription added");
      return created;
    }),

  delete: publicProcedure
    .input(z.object({ sourceId: sourceIdSchema }))
    .mutation(({ ctx, input }) => {
      const removed = ctx.store.removeSubscription(input.sourceId);
      if (!removed) {
        throw new TRPCError({
          code: "NOT_FOUND",
          message: `no subscription for ${input.sourceId}`,
        });
      }
      ctx.logger.info({ sourceId: input.sourceId }, "subscription removed");
      return { success: true };
    }),
});
