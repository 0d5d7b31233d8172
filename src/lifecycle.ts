// pattern: Imperative Shell
import type { Logger } from "pino";

const SHUTDOWN_SIGNALS: ReadonlyArray<NodeJS.Signals> = ["SIGTERM", "SIGINT"];

/**
 * Something that must finish before the database closes: the in-flight sync
 * run, the API server. `stop` may wait for the work to wind down.
 */
export type Stoppable = {
  readonly name: string;
  readonly stop: () => void | Promise<void>;
};

export type ShutdownDeps = {
  readonly tasks: ReadonlyArray<Stoppable>;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * On SIGTERM or SIGINT, stops every task in order, closes the database and
 * exits 0. Later signals are ignored once shutdown has begun. A step that
 * fails is logged and the remaining steps still run.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const { logger } = deps;
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, "shutdown signal received");

    for (const task of deps.tasks) {
      try {
        await task.stop();
        logger.info({ task: task.name }, "task stopped");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ task: task.name, error: message }, "error stopping task");
      }
    }

    try {
      deps.closeDb();
      logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "error closing database");
    }

    logger.info("shutdown complete");
    process.exit(0);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      if (shuttingDown) return;
      shuttingDown = true;

      shutdown(signal).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        logger.fatal({ signal, error: message }, "shutdown failed");
      });
    });
  }
}
