/** Quota signal normalized from whatever the backend sends (headers or body fields). */
export interface RateLimitSignal {
  remaining: number;
  resetSeconds: number;
}

export interface ArchiveResponse {
  status: number;
  rateLimit: RateLimitSignal | null;
  body: unknown;
}

export interface SendOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}
