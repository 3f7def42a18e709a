import {
  type ArchiveResponse,
  MalformedResponseError,
  type QueryDescriptor,
  type RateLimitSignal,
  type SendOptions,
  TransportError,
} from "@archive-sweep/shared";

export interface SendJsonOptions extends SendOptions {
  userAgent: string;
  /**
   * 4xx statuses the service is known to return spuriously; classified as
   * `server` so the retry policy treats them as transient.
   */
  transientStatuses?: readonly number[];
}

function asNumberHeader(value: string | null): number | null {
  if (value === null || value.trim().length === 0) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function buildUrl(descriptor: QueryDescriptor): string {
  const url = new URL(descriptor.url);
  for (const [key, value] of Object.entries(descriptor.params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Read X-RateLimit-Remaining / X-RateLimit-Reset. Both must be present for
 * the signal to count.
 */
export function parseRateLimitHeaders(headers: Headers): RateLimitSignal | null {
  const remaining = asNumberHeader(headers.get("x-ratelimit-remaining"));
  const reset = asNumberHeader(headers.get("x-ratelimit-reset"));
  if (remaining === null || reset === null) return null;
  return { remaining: Math.max(0, Math.floor(remaining)), resetSeconds: Math.max(0, reset) };
}

function retryAfterSeconds(headers: Headers): number | undefined {
  return (
    asNumberHeader(headers.get("retry-after")) ??
    asNumberHeader(headers.get("x-ratelimit-reset")) ??
    undefined
  );
}

/**
 * GET a JSON document. Resolves with the parsed body for 2xx responses;
 * rejects with a TransportError (timeout, network, rate_limited, server,
 * client) or MalformedResponseError. An abort through `options.signal` is
 * rethrown untouched so callers can tell cancellation from failure.
 */
export async function sendJson(
  descriptor: QueryDescriptor,
  options: SendJsonOptions,
): Promise<ArchiveResponse> {
  const url = buildUrl(descriptor);
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const forwardAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) forwardAbort();
  else options.signal?.addEventListener("abort", forwardAbort, { once: true });

  let res: Response;
  let text: string;
  try {
    res = await fetch(url, {
      method: "GET",
      headers: {
        "user-agent": options.userAgent,
        accept: "application/json",
      },
      signal: controller.signal,
    });
    text = await res.text();
  } catch (err) {
    if (timedOut) {
      throw new TransportError(
        `Request timed out after ${options.timeoutMs}ms`,
        "timeout",
        { url },
        { cause: err },
      );
    }
    if (options.signal?.aborted) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Request failed: ${message}`, "network", { url }, { cause: err });
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener("abort", forwardAbort);
  }

  if (!res.ok) {
    const detail = text.slice(0, 500);
    const status = res.status;
    if (status === 429) {
      throw new TransportError(`Rate limited (429): ${detail}`, "rate_limited", {
        url,
        status,
        retryAfterSeconds: retryAfterSeconds(res.headers),
      });
    }
    const transient = status >= 500 || (options.transientStatuses ?? []).includes(status);
    throw new TransportError(
      `Request failed (${status} ${res.statusText}): ${detail}`,
      transient ? "server" : "client",
      { url, status },
    );
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    throw new MalformedResponseError(`Undecodable JSON body from ${url}: ${text.slice(0, 200)}`, {
      cause: err,
    });
  }

  return { status: res.status, rateLimit: parseRateLimitHeaders(res.headers), body };
}
