export { normalizeMediaUrl } from "./normalize";
export { selectMediaLocator } from "./media-locator";
export { downloadMedia, resolveExtension, generateUid } from "./downloader";
export { downloadPendingMedia } from "./coordinator";
export { createRedditFeedApi } from "./feed-api";
export { pollSource } from "./poller";
export { syncAll, syncSubscription } from "./orchestrator";
export * from "./errors";
export type { DownloadOptions, DownloadFn } from "./downloader";
export type { CoordinatorOptions, OnDownloaded } from "./coordinator";
export type { FeedApi, RedditFeedApiOptions } from "./feed-api";
export type { PollOptions } from "./poller";
export type { SyncContext, SyncOptions, SubscriptionSyncResult } from "./orchestrator";
export type {
  ContentItemCandidate,
  DownloadOutcome,
  DownloadRequest,
  FeedPost,
  GalleryImage,
  MediaAssetRecord,
  MediaLocatorCandidate,
  SyncReport,
} from "./types";
