// pattern: Imperative Shell
import { and, eq, isNotNull, isNull, sql } from "drizzle-orm";
import type { AppDatabase } from "./index";
import { contentItems, mediaAssets, subscriptions } from "./schema";
import type { SubscriptionRow } from "./schema";

export type Subscription = SubscriptionRow;

export type NewSubscription = {
  readonly sourceId: string;
  readonly title?: string | null;
};

export type NewContentItem = {
  readonly externalId: string;
  readonly sourceId: string;
  readonly author: string | null;
  readonly createdAt: Date | null;
  readonly title: string | null;
  readonly body: string | null;
  readonly mediaUrl: string | null;
  readonly score: number;
  readonly commentCount: number;
  readonly rawPayload: unknown;
};

export type NewMediaAsset = {
  readonly uidFilename: string;
  readonly originalUrl: string;
  readonly contentType: string;
  readonly sizeBytes: number;
  readonly contentItemExternalId: string | null;
};

export type PendingMedia = {
  readonly externalId: string;
  readonly mediaUrl: string;
};

export type StoreStats = {
  readonly subscriptions: number;
  readonly contentItems: number;
  readonly pendingMedia: number;
  readonly mediaAssets: number;
};

/**
 * Everything the sync pipeline needs from storage. Unique-key conflicts are
 * absorbed: inserts report whether they wrote a row instead of throwing.
 */
export type ContentStore = {
  readonly listSubscriptions: () => ReadonlyArray<Subscription>;
  readonly addSubscription: (input: NewSubscription) => Subscription | null;
  readonly removeSubscription: (sourceId: string) => boolean;
  readonly contentItemExists: (externalId: string) => boolean;
  readonly insertContentItem: (item: NewContentItem) => boolean;
  readonly updateMetrics: (
    externalId: string,
    score: number,
    commentCount: number,
  ) => void;
  readonly insertMediaAsset: (asset: NewMediaAsset) => boolean;
  /** Sets the reference only while it is unset; returns whether it did. */
  readonly setContentItemMediaRef: (
    externalId: string,
    uidFilename: string,
  ) => boolean;
  readonly getContentItemMediaRef: (externalId: string) => string | null;
  readonly listPendingMedia: () => ReadonlyArray<PendingMedia>;
  readonly getStats: () => StoreStats;
};

export function createContentStore(db: AppDatabase): ContentStore {
  return {
    listSubscriptions: () =>
      db.select().from(subscriptions).orderBy(subscriptions.id).all(),

    addSubscription: (input) =>
      db
        .insert(subscriptions)
        .values({ sourceId: input.sourceId, title: input.title ?? null })
        .onConflictDoNothing()
        .returning()
        .get() ?? null,

    removeSubscription: (sourceId) =>
      db
        .delete(subscriptions)
        .where(eq(subscriptions.sourceId, sourceId))
        .run().changes > 0,

    contentItemExists: (externalId) =>
      db
        .select({ id: contentItems.id })
        .from(contentItems)
        .where(eq(contentItems.externalId, externalId))
        .get() !== undefined,

    insertContentItem: (item) =>
      db
        .insert(contentItems)
        .values({
          externalId: item.externalId,
          sourceId: item.sourceId,
          author: item.author,
          createdUtc: item.createdAt,
          title: item.title,
          body: item.body,
          mediaUrl: item.mediaUrl,
          score: item.score,
          commentCount: item.commentCount,
          rawJson:
            item.rawPayload === undefined
              ? null
              : JSON.stringify(item.rawPayload),
        })
        .onConflictDoNothing()
        .run().changes > 0,

    updateMetrics: (externalId, score, commentCount) => {
      db.update(contentItems)
        .set({ score, commentCount })
        .where(eq(contentItems.externalId, externalId))
        .run();
    },

    insertMediaAsset: (asset) =>
      db
        .insert(mediaAssets)
        .values({
          uidFilename: asset.uidFilename,
          originalUrl: asset.originalUrl,
          contentType: asset.contentType,
          sizeBytes: asset.sizeBytes,
          contentItemExternalId: asset.contentItemExternalId,
          savedAt: new Date(),
        })
        .onConflictDoNothing()
        .run().changes > 0,

    setContentItemMediaRef: (externalId, uidFilename) =>
      db
        .update(contentItems)
        .set({ mediaUid: uidFilename })
        .where(
          and(
            eq(contentItems.externalId, externalId),
            isNull(contentItems.mediaUid),
          ),
        )
        .run().changes > 0,

    getContentItemMediaRef: (externalId) =>
      db
        .select({ mediaUid: contentItems.mediaUid })
        .from(contentItems)
        .where(eq(contentItems.externalId, externalId))
        .get()?.mediaUid ?? null,

    listPendingMedia: () =>
      db
        .select({
          externalId: contentItems.externalId,
          mediaUrl: contentItems.mediaUrl,
        })
        .from(contentItems)
        .where(
          and(isNotNull(contentItems.mediaUrl), isNull(contentItems.mediaUid)),
        )
        .orderBy(contentItems.id)
        .all()
        .flatMap(({ externalId, mediaUrl }) =>
          mediaUrl ? [{ externalId, mediaUrl }] : [],
        ),

    getStats: () => ({
      subscriptions:
        db.select({ count: sql<number>`count(*)` }).from(subscriptions).get()
          ?.count ?? 0,
      contentItems:
        db.select({ count: sql<number>`count(*)` }).from(contentItems).get()
          ?.count ?? 0,
      pendingMedia:
        db
          .select({ count: sql<number>`count(*)` })
          .from(contentItems)
          .where(
            and(isNotNull(contentItems.mediaUrl), isNull(contentItems.mediaUid)),
          )
          .get()?.count ?? 0,
      mediaAssets:
        db.select({ count: sql<number>`count(*)` }).from(mediaAssets).get()
          ?.count ?? 0,
    }),
  };
}
