import { z } from "zod";
import type { Logger } from "pino";
import { SourceUnavailableError } from "./errors";
import type { FeedPost, GalleryImage, MediaLocatorCandidate } from "./types";

/** The listing endpoint never returns more than this many posts per page. */
export const MAX_PAGE_SIZE = 100;

/**
 * External feed collaborator: the most recent posts of a source, newest
 * first, fetched lazily.
 */
export type FeedApi = {
  readonly listRecent: (
    sourceId: string,
    limit: number,
    signal?: AbortSignal,
  ) => AsyncIterable<FeedPost>;
};

export type RedditFeedApiOptions = {
  readonly baseUrl: string;
  readonly userAgent: string;
  readonly requestTimeoutMs: number;
  readonly accessToken?: string;
  readonly logger: Logger;
};

const imageVariantSchema = z.object({
  u: z.string().optional(),
  x: z.number().optional(),
  gif: z.string().optional(),
});

const mediaMetadataEntrySchema = z.object({
  p: z.array(imageVariantSchema).optional(),
  s: imageVariantSchema.optional(),
});

const postSchema = z.object({
  id: z.string().min(1),
  author: z.string().nullish(),
  created_utc: z.number().nullish(),
  title: z.string().nullish(),
  selftext: z.string().nullish(),
  url: z.string().nullish(),
  url_overridden_by_dest: z.string().nullish(),
  is_self: z.boolean().nullish(),
  is_video: z.boolean().nullish(),
  is_gallery: z.boolean().nullish(),
  score: z.number().nullish(),
  num_comments: z.number().nullish(),
  secure_media: z
    .object({
      reddit_video: z.object({ fallback_url: z.string().nullish() }).nullish(),
    })
    .nullish(),
  preview: z
    .object({
      images: z
        .array(z.object({ source: z.object({ url: z.string() }).nullish() }))
        .nullish(),
    })
    .nullish(),
  media_metadata: z.record(z.string(), mediaMetadataEntrySchema).nullish(),
});

const listingSchema = z.object({
  data: z.object({
    after: z.string().nullish(),
    children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
  }),
});

type RedditPost = z.infer<typeof postSchema>;

/**
 * Size variants of the first gallery entry that has any. Later entries are
 * separate pictures.
 */
function galleryImages(post: RedditPost): ReadonlyArray<GalleryImage> {
  if (!post.is_gallery || !post.media_metadata) return [];

  for (const entry of Object.values(post.media_metadata)) {
    const images: Array<GalleryImage> = [];
    for (const variant of [...(entry.p ?? []), ...(entry.s ? [entry.s] : [])]) {
      const url = variant.u ?? variant.gif;
      if (url) images.push({ url, width: variant.x ?? 0 });
    }
    if (images.length > 0) return images;
  }
  return [];
}

/**
 * Maps a post onto the closed set of media locator kinds. Self posts have no
 * link: their `url` is the post itself.
 */
export function toMediaLocatorCandidates(
  post: RedditPost,
): ReadonlyArray<MediaLocatorCandidate> {
  const candidates: Array<MediaLocatorCandidate> = [];

  const images = galleryImages(post);
  if (images.length > 0) candidates.push({ kind: "gallery", images });

  const fallbackUrl = post.secure_media?.reddit_video?.fallback_url;
  if (post.is_video && fallbackUrl) {
    candidates.push({ kind: "video", fallbackUrl });
  }

  const previewUrl = post.preview?.images?.[0]?.source?.url;
  if (previewUrl) candidates.push({ kind: "preview", url: previewUrl });

  if (!post.is_self) {
    if (post.url_overridden_by_dest) {
      candidates.push({ kind: "override", url: post.url_overridden_by_dest });
    }
    if (post.url) candidates.push({ kind: "link", url: post.url });
  }

  return candidates;
}

export function toFeedPost(post: RedditPost, rawPayload: unknown): FeedPost {
  return {
    id: post.id,
    author: post.author ?? null,
    createdAt:
      post.created_utc === null || post.created_utc === undefined
        ? null
        : new Date(post.created_utc * 1000),
    title: post.title ?? null,
    body: post.selftext || null,
    mediaLocatorCandidates: toMediaLocatorCandidates(post),
    score: post.score ?? 0,
    commentCount: post.num_comments ?? 0,
    rawPayload,
  };
}

/**
 * Feed API backed by the Reddit JSON listing endpoint
 * (`/r/<source>/new.json`), paging with `after` until `limit` posts were
 * produced or the listing runs out.
 */
export function createRedditFeedApi(options: RedditFeedApiOptions): FeedApi {
  const { logger } = options;

  async function fetchPage(
    sourceId: string,
    pageSize: number,
    after: string | null,
    signal?: AbortSignal,
  ): Promise<z.infer<typeof listingSchema>> {
    const url = new URL(
      `/r/${encodeURIComponent(sourceId)}/new.json`,
      options.baseUrl,
    );
    url.searchParams.set("limit", String(pageSize));
    url.searchParams.set("raw_json", "1");
    if (after) url.searchParams.set("after", after);

    const headers: Record<string, string> = {
      "User-Agent": options.userAgent,
      Accept: "application/json",
    };
    if (options.accessToken) {
      headers["Authorization"] = `bearer ${options.accessToken}`;
    }

    const timeout = AbortSignal.timeout(options.requestTimeoutMs);

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });

      if (!response.ok) {
        throw new SourceUnavailableError(
          sourceId,
          `HTTP ${response.status}: ${response.statusText}`,
        );
      }

      body = await response.json();
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new SourceUnavailableError(sourceId, message, { cause: err });
    }

    const result = listingSchema.safeParse(body);
    if (!result.success) {
      throw new SourceUnavailableError(
        sourceId,
        `unexpected listing shape: ${result.error.issues[0]?.message ?? "unknown"}`,
      );
    }
    return result.data;
  }

  async function* listRecent(
    sourceId: string,
    limit: number,
    signal?: AbortSignal,
  ): AsyncGenerator<FeedPost> {
    let remaining = limit;
    let after: string | null = null;

    while (remaining > 0) {
      const page = await fetchPage(
        sourceId,
        Math.min(remaining, MAX_PAGE_SIZE),
        after,
        signal,
      );

      for (const child of page.data.children) {
        if (remaining <= 0) return;

        const parsed = postSchema.safeParse(child.data);
        if (!parsed.success) {
          logger.warn(
            { sourceId, kind: child.kind, error: parsed.error.issues[0]?.message },
            "skipping malformed listing entry",
          );
          continue;
        }

        remaining--;
        yield toFeedPost(parsed.data, child.data);
      }

      after = page.data.after ?? null;
      if (!after || page.data.children.length === 0) return;
    }
  }

  return { listRecent };
}
