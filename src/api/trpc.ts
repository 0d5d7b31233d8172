import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

const logged = t.middleware(async ({ ctx, path, type, next }) => {
  const startedAt = Date.now();
  const result = await next();
  const durationMs = Date.now() - startedAt;

  if (result.ok) {
    ctx.logger.debug({ path, type, durationMs }, "api call");
  } else {
    ctx.logger.warn(
      { path, type, durationMs, code: result.error.code, error: result.error.message },
      "api call failed",
    );
  }
  return result;
});

export const router = t.router;

/** Every procedure goes through the call logger. */
export const publicProcedure = t.procedure.use(logged);

/** Calls procedures directly, without HTTP; used by the tests. */
export const createCallerFactory = t.createCallerFactory;
