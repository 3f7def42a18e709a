import { afterEach, describe, expect, it, vi } from "vitest";
import { MAX_DELAY_MS, MIN_DELAY_MS, Pacer } from "./pacer";

function fixedClock(start = 0) {
  const clock = { t: start, now: () => clock.t };
  return clock;
}

describe("Pacer", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("manual", () => {
    it("waits the configured delay on every request and ignores quota signals", () => {
      const pacer = new Pacer({ mode: "manual", sleepMs: 500, now: fixedClock().now });
      pacer.observe({ remaining: 1000, resetSeconds: 1 });
      expect([pacer.reserve(), pacer.reserve(), pacer.reserve()]).toEqual([500, 500, 500]);
    });
  });

  describe("auto-hard", () => {
    it("spaces back-to-back reservations by the delay", () => {
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 1000, now: fixedClock().now });
      expect([pacer.reserve(), pacer.reserve(), pacer.reserve()]).toEqual([0, 1000, 2000]);
    });

    it("does not wait once the delay has already elapsed", () => {
      const clock = fixedClock();
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 1000, now: clock.now });
      pacer.reserve();
      clock.t = 5000;
      expect(pacer.reserve()).toBe(0);
    });

    it("follows the signaled quota within the delay bounds", () => {
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 1000, now: fixedClock().now });
      pacer.observe({ remaining: 11, resetSeconds: 10 });
      expect(pacer.currentDelayMs).toBe(1000);
      expect(pacer.remainingTokens).toBe(10);

      pacer.observe({ remaining: 1001, resetSeconds: 10 });
      expect(pacer.currentDelayMs).toBe(MIN_DELAY_MS);

      pacer.observe({ remaining: 2, resetSeconds: 600 });
      expect(pacer.currentDelayMs).toBe(MAX_DELAY_MS);
    });

    it("returns to the configured delay when a response carries no quota", () => {
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 1000, now: fixedClock().now });
      pacer.observe({ remaining: 1001, resetSeconds: 10 });
      pacer.observe(null);
      expect(pacer.currentDelayMs).toBe(1000);
    });

    it("waits for the reset when the signaled quota is spent", () => {
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 0, now: fixedClock().now });
      pacer.observe({ remaining: 1, resetSeconds: 20 });
      expect(pacer.reserve()).toBe(20_000);
    });

    it("pauses until the retry hint and doubles the delay after a rate limit", () => {
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 1000, now: fixedClock().now });
      expect(pacer.reserve()).toBe(0);
      pacer.penalize(30);
      expect(pacer.currentDelayMs).toBe(2000);
      expect(pacer.reserve()).toBe(30_000);
    });

    it("uses the cooldown when the rate limit carried no hint", () => {
      const pacer = new Pacer({
        mode: "auto-hard",
        sleepMs: 100,
        cooldownMs: 5000,
        now: fixedClock().now,
      });
      pacer.penalize();
      expect(pacer.reserve()).toBe(5000);
    });
  });

  describe("auto-soft", () => {
    it("starts at one request per pool slot of the window", () => {
      const pacer = new Pacer({ mode: "auto-soft", sleepMs: 1000, now: fixedClock().now });
      expect(pacer.currentDelayMs).toBe(4000);
    });

    it("never drops below the configured delay", () => {
      const pacer = new Pacer({ mode: "auto-soft", sleepMs: 2000, now: fixedClock().now });
      pacer.observe({ remaining: 11, resetSeconds: 10 });
      expect(pacer.currentDelayMs).toBe(2000);
    });

    it("refills a smaller pool", () => {
      const pacer = new Pacer({ mode: "auto-soft", sleepMs: 0, now: fixedClock().now });
      expect(pacer.remainingTokens).toBe(15);
    });
  });

  describe("acquire", () => {
    it("releases concurrent callers one delay apart", async () => {
      vi.useFakeTimers();
      const pacer = new Pacer({ mode: "auto-hard", sleepMs: 1000 });
      const start = Date.now();
      const released: number[] = [];
      const waits = [0, 1, 2].map(() =>
        pacer.acquire().then(() => {
          released.push(Date.now() - start);
        }),
      );

      await vi.advanceTimersByTimeAsync(2000);
      await Promise.all(waits);
      expect(released).toEqual([0, 1000, 2000]);
    });

    it("rejects with the abort reason while waiting", async () => {
      vi.useFakeTimers();
      const pacer = new Pacer({ mode: "manual", sleepMs: 10_000 });
      const controller = new AbortController();
      const assertion = expect(pacer.acquire(controller.signal)).rejects.toThrow("stop");
      controller.abort(new Error("stop"));
      await assertion;
    });
  });
});
