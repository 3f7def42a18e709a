import { ArchiveError, type ResultSet } from "@archive-sweep/shared";

/**
 * Where a stream was when it failed. `lower`/`upper` are the cursor's
 * exclusive bounds at the time of failure; `after`/`before` the stream's
 * original slice.
 */
export interface StreamBoundary {
  streamId: number;
  after: number | null;
  before: number | null;
  lower: number | null;
  upper: number | null;
  pages: number;
  /** Set for comment sub-fetches. */
  linkId?: string;
}

export class RetryExhaustedError extends ArchiveError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(message, "TRANSIENT_EXHAUSTED", { cause });
    this.name = "RetryExhaustedError";
  }
}

export class StreamFailedError extends ArchiveError {
  constructor(
    message: string,
    public readonly boundary: StreamBoundary,
    cause: unknown,
  ) {
    super(message, "STREAM_FAILED", { cause });
    this.name = "StreamFailedError";
  }
}

/** The caller's AbortSignal fired before the fetch completed. */
export class CancelledError extends ArchiveError {
  constructor(message = "Fetch cancelled", options?: { cause?: unknown }) {
    super(message, "CANCELLED", options);
    this.name = "CancelledError";
  }
}

/** A fetch failed after records had been merged; `result` holds them. */
export class PartialResultError extends ArchiveError {
  constructor(
    message: string,
    public readonly result: ResultSet,
    public readonly boundary: StreamBoundary | undefined,
    cause: unknown,
  ) {
    super(message, "PARTIAL_RESULT", { cause });
    this.name = "PartialResultError";
  }
}

/** A fetch failed before any record was merged. */
export class FetchFailedError extends ArchiveError {
  public readonly result: ResultSet = new Map();

  constructor(
    message: string,
    public readonly boundary: StreamBoundary | undefined,
    cause: unknown,
  ) {
    super(message, "FETCH_FAILED", { cause });
    this.name = "FetchFailedError";
  }
}

export function isPartialResult(error: unknown): error is PartialResultError {
  return error instanceof PartialResultError;
}
