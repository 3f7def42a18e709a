import {
  createLogger,
  type Logger,
  type PaceMode,
  type RateLimitSignal,
} from "@archive-sweep/shared";

import { abortReason, sleep } from "./lib/sleep";
import { updatePacerDelay } from "./metrics";

export const PACE_WINDOW_MS = 60_000;
export const SOFT_POOL_SIZE = 15;
export const HARD_POOL_SIZE = 30;
export const MIN_DELAY_MS = 50;
export const MAX_DELAY_MS = 60_000;
export const SAFETY_MARGIN = 1;
export const DEFAULT_COOLDOWN_MS = 5_000;

export interface PacerOptions {
  mode: PaceMode;
  /** Configured inter-request delay. */
  sleepMs: number;
  /** Wait after a rate-limited response that carried no reset hint. */
  cooldownMs?: number;
  now?: () => number;
  logger?: Logger;
}

function clampDelay(ms: number): number {
  return Math.min(MAX_DELAY_MS, Math.max(MIN_DELAY_MS, ms));
}

/**
 * Spaces requests out across every stream of one fetcher. State changes only
 * inside `reserve`, `observe` and `penalize`, none of which await, so two
 * streams can never claim the same slot or token.
 */
export class Pacer {
  readonly mode: PaceMode;
  private readonly sleepMs: number;
  private readonly cooldownMs: number;
  private readonly poolSize: number;
  private readonly now: () => number;
  private readonly log: Logger;

  private delayMs: number;
  private tokens: number;
  private resetAt: number;
  private lastIssuedAt = Number.NEGATIVE_INFINITY;

  constructor(options: PacerOptions) {
    this.mode = options.mode;
    this.sleepMs = Math.max(0, options.sleepMs);
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.poolSize = options.mode === "auto-soft" ? SOFT_POOL_SIZE : HARD_POOL_SIZE;
    this.now = options.now ?? (() => Date.now());
    this.log = options.logger ?? createLogger({ component: "pacer" });

    this.delayMs = this.baseDelayMs();
    this.tokens = this.poolSize;
    this.resetAt = this.now() + PACE_WINDOW_MS;
    updatePacerDelay(this.delayMs);
  }

  get currentDelayMs(): number {
    return this.delayMs;
  }

  get remainingTokens(): number {
    return this.tokens;
  }

  /**
   * Claim the next send slot and return how long the caller must wait for it.
   * The token and the slot are committed before returning.
   */
  reserve(): number {
    if (this.mode === "manual") return this.sleepMs;

    const now = this.now();
    let slot = Math.max(now, this.lastIssuedAt + this.delayMs);

    if (slot >= this.resetAt) this.refill(slot);
    if (this.tokens <= 0) {
      this.log.info(
        { waitMs: this.resetAt - now, mode: this.mode },
        "request pool empty; waiting for reset",
      );
      slot = Math.max(slot, this.resetAt);
      this.refill(slot);
    }

    this.tokens -= 1;
    this.lastIssuedAt = slot;
    return slot - now;
  }

  /** Wait for the reserved slot. Aborting the signal rejects with its reason. */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortReason(signal);
    const waitMs = this.reserve();
    if (waitMs > 0) await sleep(waitMs, signal);
  }

  /** Feed back the quota the server reported with a response (null = none sent). */
  observe(signal: RateLimitSignal | null): void {
    if (this.mode === "manual") return;

    if (signal === null) {
      this.setDelay(this.baseDelayMs());
      return;
    }

    const resetMs = Math.max(1, signal.resetSeconds * 1000);
    const effective = Math.max(0, signal.remaining - SAFETY_MARGIN);
    this.tokens = effective;
    this.resetAt = this.now() + resetMs;

    const spacing = resetMs / Math.max(1, effective);
    this.setDelay(
      this.mode === "auto-hard" ? clampDelay(spacing) : clampDelay(Math.max(spacing, this.sleepMs)),
    );
  }

  /** A rate-limited response: stop until the reset and back off the delay. */
  penalize(retryAfterSeconds?: number): void {
    if (this.mode === "manual") return;
    const waitMs =
      retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : this.cooldownMs;
    this.tokens = 0;
    this.resetAt = this.now() + waitMs;
    this.setDelay(Math.min(MAX_DELAY_MS, Math.max(MIN_DELAY_MS, this.delayMs * 2)));
    this.log.warn({ waitMs, delayMs: this.delayMs }, "rate limited; pausing requests");
  }

  private baseDelayMs(): number {
    if (this.mode === "auto-soft") {
      return Math.max(this.sleepMs, PACE_WINDOW_MS / SOFT_POOL_SIZE);
    }
    return this.sleepMs;
  }

  private refill(at: number): void {
    this.tokens = this.poolSize;
    this.resetAt = at + PACE_WINDOW_MS;
  }

  private setDelay(ms: number): void {
    this.delayMs = ms;
    updatePacerDelay(ms);
  }
}
