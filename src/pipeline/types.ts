export type GalleryImage = {
  readonly url: string;
  readonly width: number;
};

/**
 * Where a post's media may live, as a closed set. Priority when several are
 * present is the order of the union members.
 */
export type MediaLocatorCandidate =
  | { readonly kind: "gallery"; readonly images: ReadonlyArray<GalleryImage> }
  | { readonly kind: "video"; readonly fallbackUrl: string }
  | { readonly kind: "preview"; readonly url: string }
  | { readonly kind: "override"; readonly url: string }
  | { readonly kind: "link"; readonly url: string };

export type MediaLocatorKind = MediaLocatorCandidate["kind"];

/** One post as returned by the Feed API, newest first. */
export type FeedPost = {
  readonly id: string;
  readonly author: string | null;
  readonly createdAt: Date | null;
  readonly title: string | null;
  readonly body: string | null;
  readonly mediaLocatorCandidates: ReadonlyArray<MediaLocatorCandidate>;
  readonly score: number;
  readonly commentCount: number;
  readonly rawPayload: unknown;
};

export type ContentItemCandidate = {
  readonly externalId: string;
  readonly sourceId: string;
  readonly author: string | null;
  readonly createdAt: Date | null;
  readonly title: string | null;
  readonly body: string | null;
  readonly mediaUrl: string | null;
  readonly score: number;
  readonly commentCount: number;
  readonly rawPayload: unknown;
};

export type MediaAssetRecord = {
  readonly uidFilename: string;
  readonly originalUrl: string;
  readonly contentType: string;
  readonly sizeBytes: number;
};

export type DownloadRequest = {
  readonly externalId: string;
  readonly mediaUrl: string;
};

export type DownloadOutcome =
  | {
      readonly status: "downloaded";
      readonly request: DownloadRequest;
      readonly asset: MediaAssetRecord;
      readonly duplicate: boolean;
    }
  | {
      readonly status: "failed";
      readonly request: DownloadRequest;
      readonly error: string;
      readonly errorKind: string;
    }
  | { readonly status: "skipped"; readonly request: DownloadRequest };

export type SubscriptionFailure = {
  readonly sourceId: string;
  readonly error: string;
};

export type SyncReport = {
  readonly subscriptions: number;
  readonly subscriptionsFailed: ReadonlyArray<SubscriptionFailure>;
  readonly itemsProcessed: number;
  readonly itemsInserted: number;
  readonly itemsUpdated: number;
  readonly mediaDownloaded: number;
  readonly mediaFailed: number;
  readonly mediaSkipped: number;
  readonly aborted: boolean;
  readonly startedAt: Date;
  readonly finishedAt: Date;
};
