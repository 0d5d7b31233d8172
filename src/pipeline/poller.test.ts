import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { pollSource, toContentItemCandidate } from "./poller";
import type { FeedApi } from "./feed-api";
import { SourceUnavailableError } from "./errors";
import type { ContentItemCandidate, FeedPost } from "./types";

function feedPost(id: string, overrides: Partial<FeedPost> = {}): FeedPost {
  return {
    id,
    author: "test-author",
    createdAt: new Date("2026-01-01T00:00:00Z"),
    title: `Post ${id}`,
    body: null,
    mediaLocatorCandidates: [{ kind: "link", url: `https://i.redd.it/${id}.png` }],
    score: 1,
    commentCount: 0,
    rawPayload: { id },
    ...overrides,
  };
}

function fakeFeedApi(posts: ReadonlyArray<FeedPost>, failAfter?: number): FeedApi {
  return {
    listRecent: async function* (sourceId, limit) {
      let yielded = 0;
      for (const post of posts) {
        if (failAfter !== undefined && yielded === failAfter) {
          throw new SourceUnavailableError(sourceId, "HTTP 500: Internal Server Error");
        }
        if (yielded >= limit) return;
        yield post;
        yielded++;
      }
    },
  };
}

async function collect(
  iterable: AsyncIterable<ContentItemCandidate>,
): Promise<Array<ContentItemCandidate>> {
  const items: Array<ContentItemCandidate> = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("pollSource", () => {
  const logger = pino({ level: "silent" });

  it("should yield candidates in feed order tagged with the source", async () => {
    const api = fakeFeedApi([feedPost("p1"), feedPost("p2"), feedPost("p3")]);

    const items = await collect(
      pollSource(api, "pics", 10, { pacingDelayMs: 0, logger }),
    );

    expect(items.map((i) => i.externalId)).toEqual(["p1", "p2", "p3"]);
    expect(items.every((i) => i.sourceId === "pics")).toBe(true);
  });

  it("should stop at the limit", async () => {
    const listRecent = vi.fn(fakeFeedApi([feedPost("p1"), feedPost("p2"), feedPost("p3")]).listRecent);

    const items = await collect(
      pollSource({ listRecent }, "pics", 2, { pacingDelayMs: 0, logger }),
    );

    expect(items.map((i) => i.externalId)).toEqual(["p1", "p2"]);
    expect(listRecent).toHaveBeenCalledWith("pics", 2, undefined);
  });

  it("should not call the feed for a non-positive limit", async () => {
    const listRecent = vi.fn(fakeFeedApi([feedPost("p1")]).listRecent);

    const items = await collect(
      pollSource({ listRecent }, "pics", 0, { pacingDelayMs: 0, logger }),
    );

    expect(items).toEqual([]);
    expect(listRecent).not.toHaveBeenCalled();
  });

  it("should wait the pacing delay between items but not before the first", async () => {
    const api = fakeFeedApi([feedPost("p1"), feedPost("p2"), feedPost("p3")]);
    const started = Date.now();
    const stamps: Array<number> = [];

    for await (const _item of pollSource(api, "pics", 3, { pacingDelayMs: 20, logger })) {
      stamps.push(Date.now() - started);
    }

    expect(stamps).toHaveLength(3);
    expect(stamps[0]).toBeLessThan(20);
    expect((stamps[2] ?? 0) - (stamps[0] ?? 0)).toBeGreaterThanOrEqual(35);
  });

  it("should surface a feed failure after the items already yielded", async () => {
    const api = fakeFeedApi([feedPost("p1"), feedPost("p2"), feedPost("p3")], 2);
    const seen: Array<string> = [];

    const consume = async () => {
      for await (const item of pollSource(api, "pics", 10, { pacingDelayMs: 0, logger })) {
        seen.push(item.externalId);
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(seen).toEqual(["p1", "p2"]);
  });
});

describe("toContentItemCandidate", () => {
  it("should carry the post fields and select a media locator", () => {
    const post = feedPost("abc", {
      mediaLocatorCandidates: [
        { kind: "link", url: "https://example.com/page" },
        { kind: "preview", url: "https://preview.redd.it/abc.jpg?width=640" },
      ],
      score: 42,
      commentCount: 7,
    });

    expect(toContentItemCandidate("pics", post)).toEqual({
      externalId: "abc",
      sourceId: "pics",
      author: "test-author",
      createdAt: new Date("2026-01-01T00:00:00Z"),
      title: "Post abc",
      body: null,
      mediaUrl: "https://preview.redd.it/abc.jpg?width=640",
      score: 42,
      commentCount: 7,
      rawPayload: { id: "abc" },
    });
  });

  it("should leave mediaUrl null when the post has no media", () => {
    expect(
      toContentItemCandidate("pics", feedPost("t", { mediaLocatorCandidates: [] })).mediaUrl,
    ).toBeNull();
  });
});
