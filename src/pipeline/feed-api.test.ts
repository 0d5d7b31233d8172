import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { createRedditFeedApi, toFeedPost } from "./feed-api";
import { SourceUnavailableError } from "./errors";
import { selectMediaLocator } from "./media-locator";
import type { FeedPost } from "./types";

function post(id: string, extra: Record<string, unknown> = {}) {
  return {
    kind: "t3",
    data: {
      id,
      author: "test-author",
      created_utc: 1_767_225_600,
      title: `Post ${id}`,
      selftext: "",
      url: `https://i.redd.it/${id}.png`,
      is_self: false,
      score: 12,
      num_comments: 3,
      ...extra,
    },
  };
}

function listing(children: Array<unknown>, after: string | null = null) {
  return { kind: "Listing", data: { after, children } };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

async function collect(iterable: AsyncIterable<FeedPost>): Promise<Array<FeedPost>> {
  const posts: Array<FeedPost> = [];
  for await (const item of iterable) posts.push(item);
  return posts;
}

describe("createRedditFeedApi", () => {
  const logger = pino({ level: "silent" });
  const api = createRedditFeedApi({
    baseUrl: "https://feed.example.com",
    userAgent: "feed-mirror-test",
    requestTimeoutMs: 5_000,
    logger,
  });

  it("should request the newest listing of the source with the page size", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(listing([post("a1"), post("a2")])),
    );
    vi.stubGlobal("fetch", fetchMock);

    const posts = await collect(api.listRecent("pics", 5));

    expect(posts.map((p) => p.id)).toEqual(["a1", "a2"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      "https://feed.example.com/r/pics/new.json?limit=5&raw_json=1",
    );
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      "User-Agent": "feed-mirror-test",
      Accept: "application/json",
    });
  });

  it("should send the bearer token when one is configured", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(listing([])),
    );
    vi.stubGlobal("fetch", fetchMock);
    const authed = createRedditFeedApi({
      baseUrl: "https://feed.example.com",
      userAgent: "feed-mirror-test",
      requestTimeoutMs: 5_000,
      accessToken: "test-token",
      logger,
    });

    await collect(authed.listRecent("pics", 5));

    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
      Authorization: "bearer test-token",
    });
  });

  it("should follow the after cursor until the limit is reached", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse(listing([post("a1"), post("a2")], "t3_a2")))
      .mockResolvedValueOnce(jsonResponse(listing([post("a3"), post("a4")], "t3_a4")));
    vi.stubGlobal("fetch", fetchMock);

    const posts = await collect(api.listRecent("pics", 3));

    expect(posts.map((p) => p.id)).toEqual(["a1", "a2", "a3"]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
      "https://feed.example.com/r/pics/new.json?limit=1&raw_json=1&after=t3_a2",
    );
  });

  it("should stop when the listing has no further page", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse(listing([post("a1")], null)));
    vi.stubGlobal("fetch", fetchMock);

    const posts = await collect(api.listRecent("pics", 50));

    expect(posts).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should cap the requested page size", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(listing([])),
    );
    vi.stubGlobal("fetch", fetchMock);

    await collect(api.listRecent("pics", 250));

    expect(new URL(String(fetchMock.mock.calls[0]?.[0])).searchParams.get("limit")).toBe("100");
  });

  it("should skip malformed entries and keep the rest", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValueOnce(
        jsonResponse(listing([post("a1"), { kind: "t3", data: { title: "no id" } }, post("a2")])),
      ),
    );

    const posts = await collect(api.listRecent("pics", 10));

    expect(posts.map((p) => p.id)).toEqual(["a1", "a2"]);
  });

  it("should raise SourceUnavailableError on an error status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("forbidden", { status: 403, statusText: "Forbidden" })),
    );

    await expect(collect(api.listRecent("private", 10))).rejects.toThrow(
      new SourceUnavailableError("private", "HTTP 403: Forbidden"),
    );
  });

  it("should raise SourceUnavailableError when the network fails", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    const error = await collect(api.listRecent("pics", 10)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    if (error instanceof Error) {
      expect(error.message).toBe("source pics unavailable: fetch failed");
    }
  });

  it("should raise SourceUnavailableError for a body that is not a listing", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ error: 404 })));

    await expect(collect(api.listRecent("pics", 10))).rejects.toBeInstanceOf(
      SourceUnavailableError,
    );
  });
});

describe("toFeedPost", () => {
  it("should map the listing fields onto a feed post", () => {
    const raw = {
      id: "abc",
      author: "test-author",
      created_utc: 1_767_225_600,
      title: "Post abc",
      selftext: "",
      url: "https://i.redd.it/abc.png",
      is_self: false,
      score: 12,
      num_comments: 3,
    };
    const feedPost = toFeedPost(raw, raw);

    expect(feedPost).toEqual({
      id: "abc",
      author: "test-author",
      createdAt: new Date(1_767_225_600_000),
      title: "Post abc",
      body: null,
      mediaLocatorCandidates: [{ kind: "link", url: "https://i.redd.it/abc.png" }],
      score: 12,
      commentCount: 3,
      rawPayload: raw,
    });
  });

  it("should collect gallery variants with their widths", () => {
    const raw = {
      id: "gal",
      is_gallery: true,
      url: "https://www.reddit.com/gallery/gal",
      media_metadata: {
        img1: {
          p: [{ u: "https://preview.redd.it/img1.jpg?width=108", x: 108 }],
          s: { u: "https://preview.redd.it/img1.jpg?width=2000", x: 2000 },
        },
      },
    };

    expect(toFeedPost(raw, raw).mediaLocatorCandidates).toEqual([
      {
        kind: "gallery",
        images: [
          { url: "https://preview.redd.it/img1.jpg?width=108", width: 108 },
          { url: "https://preview.redd.it/img1.jpg?width=2000", width: 2000 },
        ],
      },
      { kind: "link", url: "https://www.reddit.com/gallery/gal" },
    ]);
  });

  it("should take the gallery's first image even when a later one is larger", () => {
    const raw = {
      id: "two",
      is_gallery: true,
      url: "https://www.reddit.com/gallery/two",
      media_metadata: {
        first: {
          p: [{ u: "https://preview.redd.it/first.jpg?width=320", x: 320 }],
          s: { u: "https://preview.redd.it/first.jpg?s=1", x: 800 },
        },
        second: {
          p: [{ u: "https://preview.redd.it/second.jpg?width=320", x: 320 }],
          s: { u: "https://preview.redd.it/second.jpg?s=1", x: 4000 },
        },
      },
    };

    const feedPost = toFeedPost(raw, raw);

    expect(feedPost.mediaLocatorCandidates[0]).toEqual({
      kind: "gallery",
      images: [
        { url: "https://preview.redd.it/first.jpg?width=320", width: 320 },
        { url: "https://preview.redd.it/first.jpg?s=1", width: 800 },
      ],
    });
    expect(selectMediaLocator(feedPost.mediaLocatorCandidates)).toBe(
      "https://preview.redd.it/first.jpg?s=1",
    );
  });

  it("should skip gallery entries without a usable variant", () => {
    const raw = {
      id: "gap",
      is_gallery: true,
      media_metadata: {
        failed: { p: [], s: {} },
        ok: { s: { u: "https://preview.redd.it/ok.jpg?s=1", x: 600 } },
      },
    };

    expect(toFeedPost(raw, raw).mediaLocatorCandidates).toEqual([
      {
        kind: "gallery",
        images: [{ url: "https://preview.redd.it/ok.jpg?s=1", width: 600 }],
      },
    ]);
  });

  it("should offer the video fallback, the preview source and the overridden destination", () => {
    const raw = {
      id: "vid",
      is_video: true,
      url: "https://v.redd.it/vid",
      url_overridden_by_dest: "https://v.redd.it/vid",
      secure_media: { reddit_video: { fallback_url: "https://v.redd.it/vid/DASH_720.mp4" } },
      preview: { images: [{ source: { url: "https://preview.redd.it/vid.jpg?width=640" } }] },
    };

    expect(toFeedPost(raw, raw).mediaLocatorCandidates).toEqual([
      { kind: "video", fallbackUrl: "https://v.redd.it/vid/DASH_720.mp4" },
      { kind: "preview", url: "https://preview.redd.it/vid.jpg?width=640" },
      { kind: "override", url: "https://v.redd.it/vid" },
      { kind: "link", url: "https://v.redd.it/vid" },
    ]);
  });

  it("should not treat a self post's permalink as media", () => {
    const raw = {
      id: "self",
      is_self: true,
      selftext: "just text",
      url: "https://www.reddit.com/r/pics/comments/self/",
    };

    const feedPost = toFeedPost(raw, raw);

    expect(feedPost.mediaLocatorCandidates).toEqual([]);
    expect(feedPost.body).toBe("just text");
    expect(feedPost.createdAt).toBeNull();
    expect(feedPost.score).toBe(0);
  });
});
