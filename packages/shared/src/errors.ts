/**
 * Base class for every error the fetch stack raises. `code` is stable and is
 * what callers (CLI, logs) switch on; `message` is for humans.
 */
export class ArchiveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

/** Invalid parameter or parameter combination. Raised before any request is sent. */
export class ConfigurationError extends ArchiveError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigurationError";
  }
}

export type TransportErrorKind = "timeout" | "network" | "rate_limited" | "server" | "client";

export interface TransportErrorDetails {
  url?: string;
  status?: number;
  /** Seconds the server asked us to wait (Retry-After / X-RateLimit-Reset). */
  retryAfterSeconds?: number;
}

const RETRYABLE_KINDS: ReadonlySet<TransportErrorKind> = new Set([
  "timeout",
  "network",
  "rate_limited",
  "server",
]);

export class TransportError extends ArchiveError {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly details: TransportErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, `TRANSPORT_${kind.toUpperCase()}`, options);
    this.name = "TransportError";
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/** Undecodable body or a body missing the fields the engine needs. Never retried. */
export class MalformedResponseError extends ArchiveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "MALFORMED_RESPONSE", options);
    this.name = "MalformedResponseError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
