// pattern: Imperative Shell
import express from "express";
import type { RequestHandler } from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import type { Logger } from "pino";
import { appRouter } from "./router";
import type { AppContext } from "./context";

function requestLog(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.debug(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "http request",
      );
    });
    next();
  };
}

/**
 * Operator-facing HTTP surface. tRPC procedures live under `/api/trpc`;
 * `/health` reports the subscription count, or 503 once the store stops
 * answering. The app is returned unstarted.
 */
export function createApiServer(context: AppContext): express.Express {
  const { store, logger } = context;
  const app = express();

  app.use(requestLog(logger));

  app.get("/health", (_req, res) => {
    try {
      const { subscriptions } = store.getStats();
      res.json({ status: "ok", subscriptions });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "health check failed");
      res.status(503).json({ status: "unavailable" });
    }
  });

  app.use(
    "/api/trpc",
    createExpressMiddleware({ router: appRouter, createContext: () => context }),
  );

  return app;
}
