import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadSweepDotEnv, parseDotEnv } from "./load_dotenv";

describe("parseDotEnv", () => {
  it("reads plain, exported, quoted and commented values", () => {
    const raw = [
      "# settings",
      "SWEEP_TASK_NUM=4",
      "export SWEEP_BACKEND=arctic_shift",
      'SWEEP_SAVE_DIR="/data/my dir" # where files go',
      "SWEEP_PACE_MODE=manual # fixed delay",
      "LOG_LEVEL=debug#verbose",
      "SWEEP_DUPLICATE_ACTION='keep_\\'original'",
      "",
      "not a pair",
      "SWEEP_SLEEP_SEC=",
    ].join("\n");

    expect(parseDotEnv(raw)).toEqual([
      ["SWEEP_TASK_NUM", "4"],
      ["SWEEP_BACKEND", "arctic_shift"],
      ["SWEEP_SAVE_DIR", "/data/my dir"],
      ["SWEEP_PACE_MODE", "manual"],
      ["LOG_LEVEL", "debug#verbose"],
      ["SWEEP_DUPLICATE_ACTION", "keep_'original"],
      ["SWEEP_SLEEP_SEC", ""],
    ]);
  });

  it("keeps an unclosed quote as written", () => {
    expect(parseDotEnv('SWEEP_SAVE_DIR="/data')).toEqual([["SWEEP_SAVE_DIR", '"/data']]);
  });
});

describe("loadSweepDotEnv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "sweep-env-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies sweep keys, lets .env.local override .env and never overrides the environment", async () => {
    await writeFile(
      path.join(dir, ".env"),
      "SWEEP_TASK_NUM=4\nSWEEP_BACKEND=pullpush\nSWEEP_MAX_RETRIES=9\nDATABASE_URL=postgres://example\n",
    );
    await writeFile(path.join(dir, ".env.local"), "SWEEP_BACKEND=arctic_shift\n");
    const env: NodeJS.ProcessEnv = { SWEEP_MAX_RETRIES: "2" };

    const loaded = loadSweepDotEnv(dir, env);

    expect(env).toEqual({
      SWEEP_MAX_RETRIES: "2",
      SWEEP_TASK_NUM: "4",
      SWEEP_BACKEND: "arctic_shift",
    });
    expect(loaded).toEqual({
      files: [path.join(dir, ".env"), path.join(dir, ".env.local")],
      applied: ["SWEEP_TASK_NUM", "SWEEP_BACKEND"],
      ignored: ["DATABASE_URL"],
    });
  });

  it("does nothing without dotenv files", () => {
    const env: NodeJS.ProcessEnv = {};
    expect(loadSweepDotEnv(dir, env)).toEqual({ files: [], applied: [], ignored: [] });
    expect(env).toEqual({});
  });
});
