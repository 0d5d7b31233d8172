import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { ContentStore } from "./db/store";

/**
 * Inserts the subscriptions listed in configuration. Existing source ids are
 * left alone, so subscriptions removed through the API stay removed only
 * until they are dropped from the config file too.
 *
 * @returns Number of subscriptions actually added.
 */
export function seedSubscriptions(
  store: ContentStore,
  config: AppConfig,
  logger: Logger,
): number {
  let added = 0;

  for (const seed of config.subscriptions) {
    const created = store.addSubscription({
      sourceId: seed.sourceId,
      title: seed.title ?? null,
    });
    if (created) added++;
  }

  logger.info(
    { configured: config.subscriptions.length, added },
    "subscriptions seeded from config",
  );
  return added;
}
