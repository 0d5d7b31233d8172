import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import type { FeedApi } from "./feed-api";
import { selectMediaLocator } from "./media-locator";
import type { ContentItemCandidate, FeedPost } from "./types";

export type PollOptions = {
  readonly pacingDelayMs: number;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
};

export function toContentItemCandidate(
  sourceId: string,
  post: FeedPost,
): ContentItemCandidate {
  return {
    externalId: post.id,
    sourceId,
    author: post.author,
    createdAt: post.createdAt,
    title: post.title,
    body: post.body,
    mediaUrl: selectMediaLocator(post.mediaLocatorCandidates),
    score: post.score,
    commentCount: post.commentCount,
    rawPayload: post.rawPayload,
  };
}

/**
 * Yields at most `limit` of a source's most recent items in feed order,
 * waiting `pacingDelayMs` before every item after the first. The sequence is
 * single-use; feed errors propagate to the consumer.
 */
export async function* pollSource(
  feedApi: FeedApi,
  sourceId: string,
  limit: number,
  options: PollOptions,
): AsyncGenerator<ContentItemCandidate> {
  if (limit <= 0) return;

  let produced = 0;
  for await (const post of feedApi.listRecent(sourceId, limit, options.signal)) {
    if (produced > 0 && options.pacingDelayMs > 0) {
      await sleep(options.pacingDelayMs, undefined, { signal: options.signal });
    }

    yield toContentItemCandidate(sourceId, post);
    produced++;

    if (produced >= limit) break;
  }

  options.logger.debug({ sourceId, produced }, "source poll complete");
}
