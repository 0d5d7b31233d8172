import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import type { DatabaseResult } from "./db";
import { createContentStore } from "./db/store";
import { seedSubscriptions } from "./seed";
import { createRedditFeedApi, syncAll } from "./pipeline";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";
import { parseCommand } from "./cli";
import type { Command } from "./cli";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feed-mirror.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  let command: Command;
  let config: AppConfig;
  try {
    command = parseCommand(process.argv.slice(2));
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { command: command.name, mediaDirectory: config.media.directory },
    "feed-mirror starting",
  );

  let database: DatabaseResult;
  try {
    database = createDatabase(resolve(DATABASE_URL));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "database unavailable",
    );
    process.exit(1);
  }
  const { db, close: closeDb } = database;
  const store = createContentStore(db);
  seedSubscriptions(store, config, logger);

  if (command.name === "serve") {
    const app = createApiServer({ store, config, logger });
    const server = app.listen(PORT, () => {
      logger.info({ port: PORT }, "api server listening");
    });
    registerShutdownHandlers({
      tasks: [
        {
          name: "api-server",
          stop: () =>
            new Promise<void>((resolve, reject) => {
              server.close((err) => (err ? reject(err) : resolve()));
            }),
        },
      ],
      closeDb,
      logger,
    });
    return;
  }

  const feedApi = createRedditFeedApi({
    baseUrl: config.feed.baseUrl,
    userAgent: config.feed.userAgent,
    requestTimeoutMs: config.feed.requestTimeoutMs,
    accessToken: process.env["FEED_ACCESS_TOKEN"],
    logger,
  });

  const controller = new AbortController();
  const run = syncAll(
    { store, feedApi, config, logger },
    { maxItems: command.maxItems, signal: controller.signal },
  );

  registerShutdownHandlers({
    tasks: [
      {
        name: "sync-run",
        stop: async () => {
          controller.abort();
          await run;
        },
      },
    ],
    closeDb,
    logger,
  });

  await run;

  // a signal handler owns the rest of the shutdown
  if (controller.signal.aborted) return;

  closeDb();
  process.exit(0);
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
