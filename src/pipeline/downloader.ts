import { randomBytes } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import pRetry, { AbortError } from "p-retry";
import type { Logger } from "pino";
import type { RetryPolicy } from "../config";
import {
  DownloadAbortedError,
  InterstitialUnresolvedError,
  MediaWriteFailedError,
  PipelineError,
  SizeLimitExceededError,
  TransientTransportError,
  UnexpectedStatusError,
} from "./errors";
import { extractEmbeddedMediaUrl, hasDocumentMarkers } from "./interstitial";
import type { MediaAssetRecord } from "./types";

/** A loader page may point at the real asset once; a second loader fails. */
export const MAX_INTERSTITIAL_DEPTH = 1;

const HTML_PREFIX_BYTES = 1024;

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

const URL_EXTENSION = /\.(jpg|jpeg|png|gif|mp4|webm|webp)$/i;

const CONTENT_TYPE_EXTENSIONS: Readonly<Record<string, string>> = {
  "image/jpeg": "jpg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
  "video/mp4": "mp4",
  "video/webm": "webm",
};

const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429]);

export type DownloadOptions = {
  readonly maxSizeBytes: number;
  readonly requestTimeoutMs: number;
  readonly itemDeadlineMs: number;
  readonly retry: RetryPolicy;
  readonly userAgent: string;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
};

export type DownloadFn = (
  url: string,
  destinationDir: string,
  options: DownloadOptions,
) => Promise<MediaAssetRecord>;

type ProbeResult = {
  readonly contentType: string | null;
  readonly htmlPrefix: string | null;
};

/**
 * Picks the file extension for a download: the URL's own suffix, then the
 * content type, then `bin`.
 */
export function resolveExtension(
  url: string,
  contentType: string | null,
): string {
  const pathname = URL.canParse(url) ? new URL(url).pathname : url;

  const fromPath = URL_EXTENSION.exec(pathname);
  if (fromPath?.[1]) return fromPath[1].toLowerCase();

  const mediaType = contentType?.split(";")[0]?.trim().toLowerCase();
  if (mediaType) {
    const fromType = CONTENT_TYPE_EXTENSIONS[mediaType];
    if (fromType) return fromType;
  }

  return "bin";
}

/** 128 random bits, hex encoded. */
export function generateUid(): string {
  return randomBytes(16).toString("hex");
}

function isHtml(contentType: string | null): boolean {
  const mediaType = contentType?.split(";")[0]?.trim().toLowerCase();
  return mediaType === "text/html" || mediaType === "application/xhtml+xml";
}

function declaredLength(response: Response): number | null {
  const header = response.headers.get("content-length");
  if (header === null) return null;
  const value = Number.parseInt(header, 10);
  return Number.isFinite(value) ? value : null;
}

function toPipelineError(
  err: unknown,
  url: string,
  signal: AbortSignal,
): PipelineError {
  if (err instanceof PipelineError) return err;
  if (signal.aborted) {
    return new DownloadAbortedError(url, { cause: signal.reason ?? err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransientTransportError(url, message, { cause: err });
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.body.locked) {
    await response.body.cancel();
  }
}

type StallTimer = {
  readonly signal: AbortSignal;
  readonly touch: () => void;
  readonly clear: () => void;
};

/**
 * Aborts an exchange once nothing has happened on it for `ms`. Started
 * before the request; the response headers and every body chunk push it back.
 * The item deadline, not this timer, bounds the whole transfer.
 */
function startStallTimer(url: string, ms: number): StallTimer {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const touch = () => {
    clearTimeout(timer);
    timer = setTimeout(() => {
      controller.abort(
        new TransientTransportError(url, `no response activity for ${ms} ms`),
      );
    }, ms);
  };

  touch();
  return { signal: controller.signal, touch, clear: () => clearTimeout(timer) };
}

type Exchange = {
  readonly response: Response;
  readonly stall: StallTimer;
};

async function request(
  url: string,
  options: DownloadOptions,
  signal: AbortSignal,
): Promise<Exchange> {
  const stall = startStallTimer(url, options.requestTimeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      redirect: "follow",
      signal: AbortSignal.any([stall.signal, signal]),
      headers: { "User-Agent": options.userAgent },
    });
  } catch (err) {
    stall.clear();
    throw toPipelineError(err, url, signal);
  }

  if (!response.ok) {
    stall.clear();
    await discardBody(response);
    if (response.status >= 500 || TRANSIENT_STATUSES.has(response.status)) {
      throw new TransientTransportError(
        url,
        `HTTP ${response.status} ${response.statusText}`.trimEnd(),
      );
    }
    throw new UnexpectedStatusError(url, response.status, response.statusText);
  }

  stall.touch();
  return { response, stall };
}

async function readPrefix(exchange: Exchange, maxBytes: number): Promise<string> {
  const { response, stall } = exchange;
  if (!response.body) return "";

  const reader = response.body.getReader();
  const chunks: Array<Uint8Array> = [];
  let total = 0;

  try {
    while (total < maxBytes) {
      const { done, value } = await reader.read();
      if (done) break;
      stall.touch();
      chunks.push(value);
      total += value.byteLength;
    }
  } finally {
    await reader.cancel();
  }

  return Buffer.concat(chunks).subarray(0, maxBytes).toString("utf-8");
}

async function probeResource(
  url: string,
  options: DownloadOptions,
  signal: AbortSignal,
): Promise<ProbeResult> {
  const exchange = await request(url, options, signal);
  const { response } = exchange;

  try {
    const declared = declaredLength(response);
    if (declared !== null && declared > options.maxSizeBytes) {
      await discardBody(response);
      throw new SizeLimitExceededError(url, declared, options.maxSizeBytes);
    }

    const contentType = response.headers.get("content-type");
    if (!isHtml(contentType)) {
      await discardBody(response);
      return { contentType, htmlPrefix: null };
    }

    const htmlPrefix = await readPrefix(exchange, HTML_PREFIX_BYTES);
    return { contentType, htmlPrefix };
  } finally {
    exchange.stall.clear();
  }
}

/** Errors raised by the file system carry the failing syscall. */
function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "syscall" in err && typeof err.syscall === "string";
}

async function streamToFile(
  url: string,
  filePath: string,
  options: DownloadOptions,
  signal: AbortSignal,
): Promise<number> {
  const { response, stall } = await request(url, options, signal);

  try {
    const declared = declaredLength(response);
    if (declared !== null && declared > options.maxSizeBytes) {
      await discardBody(response);
      throw new SizeLimitExceededError(url, declared, options.maxSizeBytes);
    }

    let written = 0;
    const limiter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        stall.touch();
        written += chunk.length;
        if (written > options.maxSizeBytes) {
          callback(new SizeLimitExceededError(url, written, options.maxSizeBytes));
          return;
        }
        callback(null, chunk);
      },
    });

    const source = response.body
      ? Readable.fromWeb(response.body)
      : Readable.from([]);

    const sinkFailure: { error?: Error } = {};
    const sink = createWriteStream(filePath);
    sink.on("error", (err) => {
      sinkFailure.error = err;
    });

    try {
      await pipeline(source, limiter, sink);
    } catch (err) {
      await rm(filePath, { force: true });
      // a body error is forwarded into the sink too; only fs errors are ours
      const { error: sinkError } = sinkFailure;
      if (!(err instanceof PipelineError) && isSystemError(sinkError)) {
        throw new MediaWriteFailedError(url, filePath, sinkError.message, {
          cause: sinkError,
        });
      }
      throw err;
    }

    return written;
  } finally {
    stall.clear();
  }
}

/**
 * Runs one network step under the retry envelope. Only errors tagged
 * `retryable` are tried again; everything else stops the envelope at once.
 */
async function withRetry<T>(
  url: string,
  operation: () => Promise<T>,
  options: DownloadOptions,
  signal: AbortSignal,
): Promise<T> {
  const { attempts, minDelayMs, maxDelayMs } = options.retry;

  try {
    return await pRetry(
      async () => {
        try {
          return await operation();
        } catch (err) {
          const error = toPipelineError(err, url, signal);
          if (!error.retryable) throw new AbortError(error);
          throw error;
        }
      },
      {
        retries: Math.max(0, attempts - 1),
        factor: 2,
        minTimeout: minDelayMs,
        maxTimeout: maxDelayMs,
        signal,
        onFailedAttempt: (error) => {
          options.logger.warn(
            {
              url,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            },
            "media fetch attempt failed",
          );
        },
      },
    );
  } catch (err) {
    throw toPipelineError(err, url, signal);
  }
}

async function fetchIntoFile(
  url: string,
  destinationDir: string,
  options: DownloadOptions,
  signal: AbortSignal,
  depth: number,
): Promise<MediaAssetRecord> {
  const probe = await withRetry(
    url,
    () => probeResource(url, options, signal),
    options,
    signal,
  );

  if (probe.htmlPrefix !== null && hasDocumentMarkers(probe.htmlPrefix)) {
    const embedded = extractEmbeddedMediaUrl(probe.htmlPrefix, url);
    if (!embedded) {
      throw new InterstitialUnresolvedError(url, "no embedded media URL");
    }
    if (depth >= MAX_INTERSTITIAL_DEPTH) {
      throw new InterstitialUnresolvedError(
        url,
        `embedded URL ${embedded} is behind another loader page`,
      );
    }

    options.logger.debug(
      { url, embeddedUrl: embedded },
      "resolving interstitial page",
    );
    return fetchIntoFile(embedded, destinationDir, options, signal, depth + 1);
  }

  const contentType = probe.contentType?.trim() || DEFAULT_CONTENT_TYPE;
  const uidFilename = `${generateUid()}.${resolveExtension(url, probe.contentType)}`;
  const filePath = join(destinationDir, uidFilename);

  try {
    await mkdir(destinationDir, { recursive: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MediaWriteFailedError(url, filePath, message, { cause: err });
  }

  const sizeBytes = await withRetry(
    url,
    () => streamToFile(url, filePath, options, signal),
    options,
    signal,
  );

  return { uidFilename, originalUrl: url, contentType, sizeBytes };
}

/**
 * Fetches one canonical media URL into `destinationDir` under a generated
 * filename.
 *
 * Headers are probed first so oversized assets and HTML loader pages are
 * rejected before anything is written; the body is then fetched again and
 * streamed to disk. A loader page that advertises its asset through
 * `og:image`/`twitter:image` is followed once. On failure no file is left
 * behind.
 *
 * @throws {PipelineError} one of the download error kinds
 */
export async function downloadMedia(
  url: string,
  destinationDir: string,
  options: DownloadOptions,
): Promise<MediaAssetRecord> {
  const deadline = AbortSignal.timeout(options.itemDeadlineMs);
  const signal = options.signal
    ? AbortSignal.any([options.signal, deadline])
    : deadline;

  return fetchIntoFile(url, destinationDir, options, signal, 0);
}
