// pattern: Imperative Shell
import { router } from "./trpc";
import { subscriptionsRouter } from "./routers/subscriptions";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: subscription management and system status.
 */
export const appRouter = router({
  subscriptions: subscriptionsRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
