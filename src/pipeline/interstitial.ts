// pattern: Functional Core
import * as cheerio from "cheerio";

const DOCUMENT_MARKERS = /<!doctype html|<html/i;

const EMBEDDED_MEDIA_SELECTORS: ReadonlyArray<string> = [
  'meta[property="og:image"]',
  'meta[name="og:image"]',
  'meta[name="twitter:image"]',
  'meta[property="twitter:image"]',
];

/**
 * True when a body prefix is an HTML document rather than stray markup.
 */
export function hasDocumentMarkers(prefix: string): boolean {
  return DOCUMENT_MARKERS.test(prefix);
}

/**
 * Looks for the open-graph / twitter image a loader page advertises and
 * resolves it against the page URL. The prefix is usually truncated; cheerio
 * parses what is there.
 *
 * @returns The absolute direct URL, or null when the page embeds none.
 */
export function extractEmbeddedMediaUrl(
  prefix: string,
  pageUrl: string,
): string | null {
  const $ = cheerio.load(prefix);

  for (const selector of EMBEDDED_MEDIA_SELECTORS) {
    const content = $(selector).first().attr("content")?.trim();
    if (!content) continue;

    try {
      return new URL(content, pageUrl).toString();
    } catch {
      return null;
    }
  }

  return null;
}
