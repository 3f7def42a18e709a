import { ConfigurationError } from "../errors";
import {
  DUPLICATE_ACTIONS,
  type DuplicateAction,
  isDuplicateAction,
  isPaceMode,
  PACE_MODES,
  type PaceMode,
} from "../types/policy";
import { BACKEND_NAMES, type BackendName } from "../types/query";

export interface SweepEnv {
  backend: BackendName;

  sleepSec: number;
  backoffSec: number;
  maxRetries: number;
  timeoutSec: number;
  paceMode: PaceMode;

  taskNum: number;
  // Unset = share the top-level concurrency budget
  commentTaskNum?: number;

  duplicateAction: DuplicateAction;
  saveDir: string;
}

function parseNumberEnv(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`Invalid non-negative number env var: ${name}=${value}`);
  }
  return parsed;
}

function parsePositiveIntEnv(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new ConfigurationError(`Invalid positive integer env var: ${name}=${value}`);
  }
  return parsed;
}

function parseBackend(value: string | undefined): BackendName {
  const raw = (value ?? "pullpush").trim().toLowerCase();
  const match = BACKEND_NAMES.find((name) => name === raw);
  if (!match) {
    throw new ConfigurationError(
      `Invalid SWEEP_BACKEND=${value} (expected one of ${BACKEND_NAMES.join(", ")})`,
    );
  }
  return match;
}

export function loadSweepEnv(env: NodeJS.ProcessEnv = process.env): SweepEnv {
  const paceModeRaw = env.SWEEP_PACE_MODE ?? "auto-hard";
  if (!isPaceMode(paceModeRaw)) {
    throw new ConfigurationError(
      `Invalid SWEEP_PACE_MODE=${paceModeRaw} (expected one of ${PACE_MODES.join(", ")})`,
    );
  }

  const duplicateActionRaw = env.SWEEP_DUPLICATE_ACTION ?? "keep_newest";
  if (!isDuplicateAction(duplicateActionRaw)) {
    throw new ConfigurationError(
      `Invalid SWEEP_DUPLICATE_ACTION=${duplicateActionRaw} (expected one of ${DUPLICATE_ACTIONS.join(", ")})`,
    );
  }

  const commentTaskNumRaw = env.SWEEP_COMMENT_TASK_NUM;
  const commentTaskNum =
    commentTaskNumRaw && commentTaskNumRaw.length > 0
      ? parsePositiveIntEnv("SWEEP_COMMENT_TASK_NUM", commentTaskNumRaw, 1)
      : undefined;

  return {
    backend: parseBackend(env.SWEEP_BACKEND),
    sleepSec: parseNumberEnv("SWEEP_SLEEP_SEC", env.SWEEP_SLEEP_SEC, 1),
    backoffSec: parseNumberEnv("SWEEP_BACKOFF_SEC", env.SWEEP_BACKOFF_SEC, 3),
    maxRetries: parsePositiveIntEnv("SWEEP_MAX_RETRIES", env.SWEEP_MAX_RETRIES, 5),
    timeoutSec: parseNumberEnv("SWEEP_TIMEOUT_SEC", env.SWEEP_TIMEOUT_SEC, 10),
    paceMode: paceModeRaw,
    taskNum: parsePositiveIntEnv("SWEEP_TASK_NUM", env.SWEEP_TASK_NUM, 3),
    commentTaskNum,
    duplicateAction: duplicateActionRaw,
    saveDir: env.SWEEP_SAVE_DIR ?? process.cwd(),
  };
}
