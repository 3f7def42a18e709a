import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors";
import { loadSweepEnv } from "./runtime_env";

describe("loadSweepEnv", () => {
  it("returns defaults when env vars are missing", () => {
    const env = loadSweepEnv({ SWEEP_SAVE_DIR: "/tmp/out" });
    expect(env).toEqual({
      backend: "pullpush",
      sleepSec: 1,
      backoffSec: 3,
      maxRetries: 5,
      timeoutSec: 10,
      paceMode: "auto-hard",
      taskNum: 3,
      commentTaskNum: undefined,
      duplicateAction: "keep_newest",
      saveDir: "/tmp/out",
    });
  });

  it("parses every override", () => {
    const env = loadSweepEnv({
      SWEEP_BACKEND: "arctic_shift",
      SWEEP_SLEEP_SEC: "0.5",
      SWEEP_BACKOFF_SEC: "2",
      SWEEP_MAX_RETRIES: "7",
      SWEEP_TIMEOUT_SEC: "30",
      SWEEP_PACE_MODE: "manual",
      SWEEP_TASK_NUM: "8",
      SWEEP_COMMENT_TASK_NUM: "2",
      SWEEP_DUPLICATE_ACTION: "keep_original",
      SWEEP_SAVE_DIR: "/data",
    });
    expect(env.backend).toBe("arctic_shift");
    expect(env.sleepSec).toBe(0.5);
    expect(env.backoffSec).toBe(2);
    expect(env.maxRetries).toBe(7);
    expect(env.timeoutSec).toBe(30);
    expect(env.paceMode).toBe("manual");
    expect(env.taskNum).toBe(8);
    expect(env.commentTaskNum).toBe(2);
    expect(env.duplicateAction).toBe("keep_original");
  });

  it("rejects an unknown pace mode", () => {
    expect(() => loadSweepEnv({ SWEEP_PACE_MODE: "turbo" })).toThrow(ConfigurationError);
  });

  it("rejects an unknown duplicate action", () => {
    expect(() => loadSweepEnv({ SWEEP_DUPLICATE_ACTION: "newest" })).toThrow(
      /SWEEP_DUPLICATE_ACTION=newest/,
    );
  });

  it("rejects non-integer task counts", () => {
    expect(() => loadSweepEnv({ SWEEP_TASK_NUM: "2.5" })).toThrow(ConfigurationError);
    expect(() => loadSweepEnv({ SWEEP_TASK_NUM: "0" })).toThrow(ConfigurationError);
  });

  it("rejects negative delays", () => {
    expect(() => loadSweepEnv({ SWEEP_SLEEP_SEC: "-1" })).toThrow(/SWEEP_SLEEP_SEC/);
  });
});
