// pattern: Functional Core
import type { MediaLocatorCandidate, MediaLocatorKind } from "./types";

const PRIORITY: ReadonlyArray<MediaLocatorKind> = [
  "gallery",
  "video",
  "preview",
  "override",
  "link",
];

function locatorOf(candidate: MediaLocatorCandidate): string | null {
  switch (candidate.kind) {
    case "gallery": {
      let largest: { url: string; width: number } | null = null;
      for (const image of candidate.images) {
        if (image.url.trim() === "") continue;
        if (!largest || image.width > largest.width) largest = image;
      }
      return largest?.url ?? null;
    }
    case "video":
      return candidate.fallbackUrl.trim() || null;
    case "preview":
    case "override":
    case "link":
      return candidate.url.trim() || null;
  }
}

/**
 * Picks the raw media locator to store for a post: gallery (largest variant
 * by declared width), then video fallback, preview source, overridden
 * destination and finally the plain link. First non-empty wins.
 */
export function selectMediaLocator(
  candidates: ReadonlyArray<MediaLocatorCandidate>,
): string | null {
  for (const kind of PRIORITY) {
    for (const candidate of candidates) {
      if (candidate.kind !== kind) continue;
      const locator = locatorOf(candidate);
      if (locator) return locator;
    }
  }
  return null;
}
