import pino from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { createContentStore } from "../db/store";
import type { ContentStore } from "../db/store";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { contentItems, subscriptions } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";

/**
 * Creates an in-memory SQLite database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

/**
 * In-memory database plus the store over it, for tests that assert on rows
 * after driving the store.
 */
export function createTestStore(): { db: AppDatabase; store: ContentStore } {
  const db = createTestDatabase();
  return { db, store: createContentStore(db) };
}

/**
 * Seeds a subscription with optional field overrides.
 * @returns The ID of the inserted subscription.
 */
export function seedTestSubscription(
  db: AppDatabase,
  overrides?: Partial<typeof subscriptions.$inferInsert>,
): number {
  const result = db
    .insert(subscriptions)
    .values({
      sourceId: "testsource",
      title: "r/testsource",
      ...overrides,
    })
    .returning({ id: subscriptions.id })
    .get();

  return result.id;
}

/**
 * Seeds a content item with optional field overrides. Defaults to an item in
 * the pending-media state.
 * @returns The ID of the inserted item.
 */
export function seedTestContentItem(
  db: AppDatabase,
  overrides?: Partial<typeof contentItems.$inferInsert>,
): number {
  const result = db
    .insert(contentItems)
    .values({
      externalId: `item-${Date.now()}-${Math.random()}`,
      sourceId: "testsource",
      author: "test-author",
      title: "Test Item",
      mediaUrl: "https://i.redd.it/test.png",
      ...overrides,
    })
    .returning({ id: contentItems.id })
    .get();

  return result.id;
}

/**
 * AppConfig with schema defaults, tuned for tests: no pacing, fast retries.
 */
export function createTestConfig(overrides?: {
  readonly mediaDirectory?: string;
  readonly maxItemsPerRun?: number;
}): AppConfig {
  const config = appConfigSchema.parse({
    feed: { pacingDelayMs: 0 },
    media: {
      directory: overrides?.mediaDirectory ?? "./media-test",
      retry: { attempts: 3, minDelayMs: 1, maxDelayMs: 5 },
    },
    sync: { maxItemsPerRun: overrides?.maxItemsPerRun },
  });
  return config;
}

/**
 * Creates a typed tRPC caller over a fresh store for router tests.
 */
export function createTestCaller(
  db: AppDatabase,
  configOverrides?: Partial<AppConfig>,
) {
  const createCaller = createCallerFactory(appRouter);
  const config = { ...createTestConfig(), ...configOverrides };
  const logger = pino({ level: "silent" });

  return createCaller({ store: createContentStore(db), config, logger });
}
