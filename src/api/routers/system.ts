// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const stats = ctx.store.getStats();

    return {
      ...stats,
      mediaDirectory: ctx.config.media.directory,
      maxMediaSizeBytes: ctx.config.media.maxSizeBytes,
      maxConcurrentDownloads: ctx.config.media.maxConcurrentDownloads,
      maxItemsPerRun: ctx.config.sync.maxItemsPerRun ?? null,
    };
  }),
});
