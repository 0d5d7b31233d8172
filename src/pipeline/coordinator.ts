import { rm } from "node:fs/promises";
import { join } from "node:path";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { downloadMedia } from "./downloader";
import type { DownloadFn, DownloadOptions } from "./downloader";
import { PipelineError } from "./errors";
import { normalizeMediaUrl } from "./normalize";
import type { DownloadOutcome, DownloadRequest, MediaAssetRecord } from "./types";

/**
 * Called once per successful download, as it completes. Returns whether the
 * result was already recorded by someone else (a concurrent run); the outcome
 * then carries `duplicate: true`.
 */
export type OnDownloaded = (
  request: DownloadRequest,
  asset: MediaAssetRecord,
) => Promise<{ readonly duplicate: boolean }>;

export type CoordinatorOptions = {
  readonly destinationDir: string;
  readonly maxConcurrency: number;
  readonly download: Omit<DownloadOptions, "logger" | "signal">;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  readonly onDownloaded?: OnDownloaded;
  readonly downloadFn?: DownloadFn;
};

/**
 * Downloads media for a batch of pending items with at most
 * `maxConcurrency` downloads in flight. Items are independent: a failure is
 * recorded in its outcome and never cancels the rest. Outcomes are returned
 * in completion order.
 */
export async function downloadPendingMedia(
  requests: ReadonlyArray<DownloadRequest>,
  options: CoordinatorOptions,
): Promise<ReadonlyArray<DownloadOutcome>> {
  const { logger } = options;
  const download = options.downloadFn ?? downloadMedia;
  const limit = pLimit(options.maxConcurrency);
  const outcomes: Array<DownloadOutcome> = [];

  const failed = (
    request: DownloadRequest,
    url: string,
    err: unknown,
  ): DownloadOutcome => {
    const message = err instanceof Error ? err.message : String(err);
    const errorKind = err instanceof PipelineError ? err.kind : "unknown";
    logger.error(
      { externalId: request.externalId, url, errorKind, error: message },
      "media download failed",
    );
    return { status: "failed", request, error: message, errorKind };
  };

  const discardFile = async (uidFilename: string): Promise<void> => {
    try {
      await rm(join(options.destinationDir, uidFilename), { force: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ uidFilename, error: message }, "failed to remove unrecorded media file");
    }
  };

  const downloadOne = async (request: DownloadRequest): Promise<DownloadOutcome> => {
    const url = normalizeMediaUrl(request.mediaUrl);
    if (url === "") {
      logger.debug(
        { externalId: request.externalId, mediaUrl: request.mediaUrl },
        "media locator has no fetchable form, skipping",
      );
      return { status: "skipped", request };
    }

    let asset: MediaAssetRecord;
    try {
      asset = await download(url, options.destinationDir, {
        ...options.download,
        logger,
        signal: options.signal,
      });
    } catch (err) {
      return failed(request, url, err);
    }

    try {
      const { duplicate } = options.onDownloaded
        ? await options.onDownloaded(request, asset)
        : { duplicate: false };

      logger.info(
        {
          externalId: request.externalId,
          uidFilename: asset.uidFilename,
          sizeBytes: asset.sizeBytes,
          duplicate,
        },
        "media downloaded",
      );
      return { status: "downloaded", request, asset, duplicate };
    } catch (err) {
      // nothing references the file once recording it failed
      await discardFile(asset.uidFilename);
      return failed(request, url, err);
    }
  };

  const tasks = requests.map((request) =>
    limit(async () => {
      const outcome = await downloadOne(request);
      outcomes.push(outcome);
    }),
  );

  await Promise.allSettled(tasks);

  logger.info(
    {
      total: requests.length,
      downloaded: outcomes.filter((o) => o.status === "downloaded").length,
      failed: outcomes.filter((o) => o.status === "failed").length,
      skipped: outcomes.filter((o) => o.status === "skipped").length,
    },
    "media download cycle complete",
  );

  return outcomes;
}
