// pattern: Functional Core

const RAW_IMAGE_HOST = "i.redd.it";
const RAW_VIDEO_HOST = "v.redd.it";
const PREVIEW_HOSTS: ReadonlySet<string> = new Set([
  "preview.redd.it",
  "external-preview.redd.it",
]);
const GALLERY_HOST = "imgur.com";
const GALLERY_DIRECT_HOST = "i.imgur.com";
const PLATFORM_HOSTS: ReadonlyArray<string> = ["reddit.com", "redd.it"];

const IMAGE_SUFFIX = /\.(jpe?g|png|gif|webp)$/i;
const MEDIA_SUFFIX = /\.(jpe?g|png|gif|mp4|webm|webp)$/i;

function hostMatches(hostname: string, domain: string): boolean {
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

function trailingSegment(pathname: string): string | null {
  const segments = pathname.split("/").filter((s) => s.length > 0);
  return segments.at(-1) ?? null;
}

function withoutQuery(url: URL): string {
  return `${url.protocol}//${url.host}${url.pathname}`;
}

function parse(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

function normalizeGalleryUrl(url: URL): string | null {
  const segment = trailingSegment(url.pathname);
  if (!segment) return null;

  // albums (/a/<id>, /gallery/<id>) and single images both resolve to the
  // direct image host using the trailing segment as the identifier
  const id = segment.replace(/\.[^.]*$/, "");
  return `https://${GALLERY_DIRECT_HOST}/${id}.jpg`;
}

function normalizePreviewUrl(raw: string): string | null {
  const decoded = raw.replace(/&amp;/g, "&");
  const url = parse(decoded);
  if (!url) return null;

  if (url.searchParams.has("width")) {
    url.search = "";
  }
  url.host = RAW_IMAGE_HOST;

  // the result lives on the raw image CDN, whose canonical form drops the query
  return withoutQuery(url);
}

/**
 * Canonicalizes a raw media locator into a directly fetchable URL.
 *
 * Returns an empty string for empty or unparsable input; callers treat that
 * as "nothing to download". The function is idempotent:
 * `normalizeMediaUrl(normalizeMediaUrl(u)) === normalizeMediaUrl(u)`.
 */
export function normalizeMediaUrl(raw: string | null | undefined): string {
  const trimmed = raw?.trim() ?? "";
  if (trimmed === "") return "";

  const url = parse(trimmed);
  if (!url || (url.protocol !== "http:" && url.protocol !== "https:")) {
    return "";
  }

  const hostname = url.hostname.toLowerCase();

  if (hostMatches(hostname, GALLERY_HOST) && !IMAGE_SUFFIX.test(url.pathname)) {
    const direct = normalizeGalleryUrl(url);
    if (direct) return direct;
  }

  if (hostname === RAW_VIDEO_HOST) {
    return trimmed;
  }

  if (hostname === RAW_IMAGE_HOST) {
    return withoutQuery(url);
  }

  if (PREVIEW_HOSTS.has(hostname)) {
    const direct = normalizePreviewUrl(trimmed);
    if (direct) return direct;
  }

  if (
    PLATFORM_HOSTS.some((domain) => hostMatches(hostname, domain)) &&
    url.pathname.includes("/media/")
  ) {
    const segment = trailingSegment(url.pathname);
    if (segment) return `https://${RAW_IMAGE_HOST}/${segment}`;
  }

  if (MEDIA_SUFFIX.test(url.pathname)) {
    return withoutQuery(url);
  }

  return trimmed;
}
