import { createLogger, errorMessage, type Logger, TransportError } from "@archive-sweep/shared";

import { RetryExhaustedError } from "./errors";
import { abortReason, sleep } from "./lib/sleep";
import { recordRetry } from "./metrics";
import type { Pacer } from "./pacer";

export interface RetryPolicyOptions {
  /** Total attempts, the first one included. */
  maxRetries: number;
  /** Backoff unit; attempt n failing waits `backoffMs * n`. */
  backoffMs: number;
  backend: string;
  /** Told about rate-limited responses so every stream slows down. */
  pacer?: Pacer;
  logger?: Logger;
}

export interface AttemptContext {
  /** Included in log lines and the exhaustion message. */
  label?: string;
  signal?: AbortSignal;
}

export class RetryPolicy {
  private readonly log: Logger;

  constructor(private readonly options: RetryPolicyOptions) {
    this.log = options.logger ?? createLogger({ component: "retry" });
  }

  /**
   * Run `attempt` until it resolves, retrying transient transport failures
   * with linear backoff. Anything else, including an abort, is rethrown as-is.
   */
  async execute<T>(
    attempt: (attemptNumber: number) => Promise<T>,
    context: AttemptContext = {},
  ): Promise<T> {
    const { maxRetries, backoffMs, backend } = this.options;
    const { label = "request", signal } = context;
    let lastError: unknown;

    for (let n = 1; n <= maxRetries; n += 1) {
      if (signal?.aborted) throw abortReason(signal);
      try {
        return await attempt(n);
      } catch (err) {
        if (signal?.aborted) throw err;
        if (!(err instanceof TransportError) || !err.retryable) throw err;
        lastError = err;

        if (err.kind === "rate_limited") {
          this.options.pacer?.penalize(err.details.retryAfterSeconds);
        }
        if (n === maxRetries) break;

        const delayMs = backoffMs * n;
        recordRetry(backend, err.kind);
        this.log.warn(
          { label, attempt: n, maxRetries, delayMs, kind: err.kind, err: err.message },
          "transient failure; retrying",
        );
        await sleep(delayMs, signal);
      }
    }

    throw new RetryExhaustedError(
      `${label} failed after ${maxRetries} attempts: ${errorMessage(lastError)}`,
      maxRetries,
      lastError,
    );
  }
}
