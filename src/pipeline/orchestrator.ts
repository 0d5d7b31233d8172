// pattern: Imperative Shell
import { rm } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { ContentStore } from "../db/store";
import { downloadPendingMedia } from "./coordinator";
import type { DownloadFn } from "./downloader";
import type { FeedApi } from "./feed-api";
import { pollSource } from "./poller";
import type {
  DownloadRequest,
  MediaAssetRecord,
  SubscriptionFailure,
  SyncReport,
} from "./types";

/**
 * Everything a sync run touches, constructed once by the caller and passed
 * down explicitly.
 */
export type SyncContext = {
  readonly store: ContentStore;
  readonly feedApi: FeedApi;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly downloadFn?: DownloadFn;
};

export type SyncOptions = {
  readonly maxItems?: number;
  readonly signal?: AbortSignal;
};

export type SubscriptionSyncResult = {
  readonly sourceId: string;
  readonly processed: number;
  readonly inserted: number;
  readonly updated: number;
  readonly error: string | null;
};

/**
 * Polls one source and stores what it yields: new items are inserted, known
 * items only get their score and comment count refreshed. Failures are
 * returned in `error`, with the counts of what was stored before them.
 */
export async function syncSubscription(
  context: SyncContext,
  sourceId: string,
  limit: number,
  signal?: AbortSignal,
): Promise<SubscriptionSyncResult> {
  const { store, feedApi, config, logger } = context;
  let processed = 0;
  let inserted = 0;
  let updated = 0;

  try {
    const items = pollSource(feedApi, sourceId, limit, {
      pacingDelayMs: config.feed.pacingDelayMs,
      logger,
      signal,
    });

    for await (const item of items) {
      if (store.contentItemExists(item.externalId)) {
        store.updateMetrics(item.externalId, item.score, item.commentCount);
        updated++;
      } else if (store.insertContentItem(item)) {
        inserted++;
      } else {
        // inserted by a concurrent writer between the check and the insert
        store.updateMetrics(item.externalId, item.score, item.commentCount);
        updated++;
      }
      processed++;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { sourceId, processed, inserted, updated, error: message };
  }

  logger.info({ sourceId, processed, inserted, updated }, "source synced");
  return { sourceId, processed, inserted, updated, error: null };
}

async function recordDownload(
  context: SyncContext,
  request: DownloadRequest,
  asset: MediaAssetRecord,
): Promise<{ readonly duplicate: boolean }> {
  const { store, config, logger } = context;

  const inserted = store.insertMediaAsset({
    ...asset,
    contentItemExternalId: request.externalId,
  });

  if (!inserted) {
    const existing = store.getContentItemMediaRef(request.externalId);
    if (existing !== asset.uidFilename) {
      await rm(join(config.media.directory, asset.uidFilename), { force: true });
    }
    logger.info(
      { externalId: request.externalId, existing, discarded: asset.uidFilename },
      "media already recorded for item, keeping existing asset",
    );
    return { duplicate: true };
  }

  if (!store.setContentItemMediaRef(request.externalId, asset.uidFilename)) {
    logger.warn(
      { externalId: request.externalId, uidFilename: asset.uidFilename },
      "item already references other media, reference left unchanged",
    );
    return { duplicate: true };
  }

  return { duplicate: false };
}

/**
 * Runs one sync: polls every subscription in listing order, one at a time,
 * under an optional global item budget, then downloads media for every item
 * still pending. A failing subscription or download is logged and counted;
 * it never ends the run.
 */
export async function syncAll(
  context: SyncContext,
  options: SyncOptions = {},
): Promise<SyncReport> {
  const { store, config, logger } = context;
  const { signal } = options;
  const startedAt = new Date();
  const maxItems = options.maxItems ?? config.sync.maxItemsPerRun;

  const subscriptions = store.listSubscriptions();
  logger.info(
    { subscriptionCount: subscriptions.length, maxItems: maxItems ?? null },
    "sync run starting",
  );

  const failures: Array<SubscriptionFailure> = [];
  let itemsProcessed = 0;
  let itemsInserted = 0;
  let itemsUpdated = 0;
  let aborted = false;

  for (const subscription of subscriptions) {
    if (signal?.aborted) {
      aborted = true;
      break;
    }

    if (maxItems !== undefined && itemsProcessed >= maxItems) {
      logger.info({ maxItems }, "item budget exhausted, stopping sync");
      break;
    }

    const limit =
      maxItems !== undefined
        ? maxItems - itemsProcessed
        : config.feed.defaultLimit;

    const result = await syncSubscription(
      context,
      subscription.sourceId,
      limit,
      signal,
    );

    itemsProcessed += result.processed;
    itemsInserted += result.inserted;
    itemsUpdated += result.updated;

    if (signal?.aborted) {
      aborted = true;
      break;
    }

    if (result.error !== null) {
      logger.error(
        { sourceId: subscription.sourceId, error: result.error },
        "subscription sync failed, skipping",
      );
      failures.push({ sourceId: subscription.sourceId, error: result.error });
    }
  }

  let mediaDownloaded = 0;
  let mediaFailed = 0;
  let mediaSkipped = 0;

  if (aborted) {
    logger.warn("sync run aborted, skipping media phase");
  } else {
    const pending = store.listPendingMedia();
    logger.info({ pendingCount: pending.length }, "media phase starting");

    const outcomes = await downloadPendingMedia(pending, {
      destinationDir: config.media.directory,
      maxConcurrency: config.media.maxConcurrentDownloads,
      download: {
        maxSizeBytes: config.media.maxSizeBytes,
        requestTimeoutMs: config.media.requestTimeoutMs,
        itemDeadlineMs: config.media.itemDeadlineMs,
        retry: config.media.retry,
        userAgent: config.media.userAgent,
      },
      logger,
      signal,
      downloadFn: context.downloadFn,
      onDownloaded: (request, asset) => recordDownload(context, request, asset),
    });

    for (const outcome of outcomes) {
      if (outcome.status === "downloaded") mediaDownloaded++;
      else if (outcome.status === "failed") mediaFailed++;
      else mediaSkipped++;
    }
    aborted = signal?.aborted ?? false;
  }

  const report: SyncReport = {
    subscriptions: subscriptions.length,
    subscriptionsFailed: failures,
    itemsProcessed,
    itemsInserted,
    itemsUpdated,
    mediaDownloaded,
    mediaFailed,
    mediaSkipped,
    aborted,
    startedAt,
    finishedAt: new Date(),
  };

  logger.info(
    {
      itemsProcessed,
      itemsInserted,
      itemsUpdated,
      mediaDownloaded,
      mediaFailed,
      mediaSkipped,
      failedSubscriptions: failures.length,
      aborted,
    },
    "sync run complete",
  );

  return report;
}
