import { describe, it, expect } from "vitest";
import { selectMediaLocator } from "./media-locator";
import type { MediaLocatorCandidate } from "./types";

describe("selectMediaLocator", () => {
  it("should return null when there are no candidates", () => {
    expect(selectMediaLocator([])).toBeNull();
  });

  it("should pick the largest gallery image by declared width", () => {
    const candidates: Array<MediaLocatorCandidate> = [
      {
        kind: "gallery",
        images: [
          { url: "https://preview.redd.it/a.jpg?width=108", width: 108 },
          { url: "https://preview.redd.it/a.jpg?width=1080", width: 1080 },
          { url: "https://preview.redd.it/a.jpg?width=640", width: 640 },
        ],
      },
    ];

    expect(selectMediaLocator(candidates)).toBe(
      "https://preview.redd.it/a.jpg?width=1080",
    );
  });

  it("should prefer gallery over every other kind regardless of order", () => {
    const candidates: Array<MediaLocatorCandidate> = [
      { kind: "link", url: "https://example.com/link" },
      { kind: "preview", url: "https://preview.redd.it/p.jpg" },
      { kind: "gallery", images: [{ url: "https://i.redd.it/g.jpg", width: 10 }] },
    ];

    expect(selectMediaLocator(candidates)).toBe("https://i.redd.it/g.jpg");
  });

  it("should follow video, preview, override, link priority", () => {
    const all: Array<MediaLocatorCandidate> = [
      { kind: "link", url: "https://example.com/link" },
      { kind: "override", url: "https://example.com/override" },
      { kind: "preview", url: "https://preview.redd.it/p.jpg" },
      { kind: "video", fallbackUrl: "https://v.redd.it/v/DASH_480.mp4" },
    ];

    expect(selectMediaLocator(all)).toBe("https://v.redd.it/v/DASH_480.mp4");
    expect(selectMediaLocator(all.slice(0, 3))).toBe(
      "https://preview.redd.it/p.jpg",
    );
    expect(selectMediaLocator(all.slice(0, 2))).toBe(
      "https://example.com/override",
    );
    expect(selectMediaLocator(all.slice(0, 1))).toBe("https://example.com/link");
  });

  it("should skip empty candidates and fall through to the next kind", () => {
    const candidates: Array<MediaLocatorCandidate> = [
      { kind: "gallery", images: [{ url: "  ", width: 500 }] },
      { kind: "video", fallbackUrl: "" },
      { kind: "override", url: "https://example.com/override" },
    ];

    expect(selectMediaLocator(candidates)).toBe("https://example.com/override");
  });
});
