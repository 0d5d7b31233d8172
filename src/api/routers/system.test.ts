import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestCaller,
  createTestConfig,
  createTestDatabase,
  seedTestContentItem,
  seedTestSubscription,
} from "../../test-utils/db";
import type { AppDatabase } from "../../db";

describe("system router", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("should report empty counts and the media settings for a fresh database", async () => {
    const caller = createTestCaller(db);

    expect(await caller.system.status()).toEqual({
      subscriptions: 0,
      contentItems: 0,
      pendingMedia: 0,
      mediaAssets: 0,
      mediaDirectory: "./media-test",
      maxMediaSizeBytes: 50 * 1024 * 1024,
      maxConcurrentDownloads: 5,
      maxItemsPerRun: null,
    });
  });

  it("should count subscriptions, items and pending media", async () => {
    seedTestSubscription(db);
    seedTestSubscription(db, { sourceId: "other" });
    seedTestContentItem(db, { externalId: "a1" });
    seedTestContentItem(db, { externalId: "a2", mediaUid: "a2.png" });
    seedTestContentItem(db, { externalId: "a3", mediaUrl: null });

    const status = await createTestCaller(db).system.status();

    expect(status.subscriptions).toBe(2);
    expect(status.contentItems).toBe(3);
    expect(status.pendingMedia).toBe(1);
  });

  it("should expose the configured item budget", async () => {
    const caller = createTestCaller(db, {
      sync: createTestConfig({ maxItemsPerRun: 25 }).sync,
    });

    expect((await caller.system.status()).maxItemsPerRun).toBe(25);
  });
});
