import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// Column layout mirrors schema.sql, which is what actually creates the tables.

export const subscriptions = sqliteTable("subscriptions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  sourceId: text("source_id").notNull().unique(),
  title: text("title"),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const contentItems = sqliteTable(
  "content_items",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    externalId: text("external_id").notNull().unique(),
    sourceId: text("source_id").notNull(),
    author: text("author"),
    createdUtc: integer("created_utc", { mode: "timestamp" }),
    title: text("title"),
    body: text("body"),
    mediaUrl: text("media_url"),
    mediaUid: text("media_uid"),
    score: integer("score").notNull().default(0),
    commentCount: integer("comment_count").notNull().default(0),
    rawJson: text("raw_json"),
    addedAt: integer("added_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    sourceIdIdx: index("content_items_source_id_idx").on(table.sourceId),
    pendingMediaIdx: index("content_items_pending_media_idx").on(
      table.mediaUrl,
      table.mediaUid,
    ),
  }),
);

export const mediaAssets = sqliteTable("media_assets", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  uidFilename: text("uid_filename").notNull().unique(),
  originalUrl: text("original_url").notNull(),
  contentType: text("content_type").notNull(),
  sizeBytes: integer("size_bytes").notNull(),
  savedAt: integer("saved_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
  contentItemExternalId: text("content_item_external_id")
    .unique()
    .references(() => contentItems.externalId),
});

export type SubscriptionRow = typeof subscriptions.$inferSelect;
export type ContentItemRow = typeof contentItems.$inferSelect;
export type MediaAssetRow = typeof mediaAssets.$inferSelect;
