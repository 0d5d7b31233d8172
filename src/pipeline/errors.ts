export type PipelineErrorKind =
  | "transient_transport"
  | "unexpected_status"
  | "size_limit_exceeded"
  | "interstitial_unresolved"
  | "download_aborted"
  | "media_write_failed"
  | "source_unavailable"
  | "persistence_unavailable";

/**
 * Base class for every failure the pipeline distinguishes. `retryable` is the
 * only thing the download retry envelope looks at.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection failure, transport timeout, 408/429 or 5xx. */
export class TransientTransportError extends PipelineError {
  readonly kind = "transient_transport";
  readonly retryable = true;

  constructor(
    readonly url: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`transient failure fetching ${url}: ${message}`, options);
  }
}

export class UnexpectedStatusError extends PipelineError {
  readonly kind = "unexpected_status";
  readonly retryable = false;

  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status} ${statusText} fetching ${url}`.trimEnd());
  }
}

export class SizeLimitExceededError extends PipelineError {
  readonly kind = "size_limit_exceeded";
  readonly retryable = false;

  constructor(
    readonly url: string,
    readonly sizeBytes: number,
    readonly maxSizeBytes: number,
  ) {
    super(`media at ${url} is ${sizeBytes} bytes, limit is ${maxSizeBytes}`);
  }
}

export class InterstitialUnresolvedError extends PipelineError {
  readonly kind = "interstitial_unresolved";
  readonly retryable = false;

  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`received an HTML page instead of media at ${url}: ${reason}`);
  }
}

/** The run was cancelled or the per-item deadline passed. */
export class DownloadAbortedError extends PipelineError {
  readonly kind = "download_aborted";
  readonly retryable = false;

  constructor(
    readonly url: string,
    options?: ErrorOptions,
  ) {
    super(`download of ${url} was aborted`, options);
  }
}

/** The media directory could not be created or written to. */
export class MediaWriteFailedError extends PipelineError {
  readonly kind = "media_write_failed";
  readonly retryable = false;

  constructor(
    readonly url: string,
    readonly filePath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`failed to write media from ${url} to ${filePath}: ${message}`, options);
  }
}

export class SourceUnavailableError extends PipelineError {
  readonly kind = "source_unavailable";
  readonly retryable = false;

  constructor(
    readonly sourceId: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`source ${sourceId} unavailable: ${message}`, options);
  }
}

export class PersistenceUnavailableError extends PipelineError {
  readonly kind = "persistence_unavailable";
  readonly retryable = false;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof PipelineError && err.retryable;
}
