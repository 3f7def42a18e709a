import {
  BACKEND_NAMES,
  type BackendName,
  type CommentFilters,
  type DuplicateAction,
  DUPLICATE_ACTIONS,
  type FetchQuery,
  isDuplicateAction,
  isPaceMode,
  PACE_MODES,
  type PaceMode,
  type PaginationParams,
  SORT_DIRECTIONS,
  SORT_KEYS,
  type SortDirection,
  type SortKey,
  type SubmissionFilters,
} from "@archive-sweep/shared";

export interface FetchArgs {
  query: FetchQuery;
  pagination: PaginationParams;
  backend?: BackendName;
  getComments: boolean;
  duplicateAction?: DuplicateAction;
  paceMode?: PaceMode;
  taskNum?: number;
  out?: string;
  saveDir?: string;
  metrics: boolean;
}

function pick<T extends string>(flag: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Invalid ${flag} "${value}" (expected one of ${allowed.join(", ")})`);
  }
  return match;
}

function positiveInt(flag: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new Error(`Invalid ${flag} (expected a positive integer)`);
  }
  return parsed;
}

const SUBMISSION_ONLY = new Set(["--title", "--selftext", "--comments"]);
const COMMENT_ONLY = new Set(["--link-id"]);

/**
 * Parse `fetch <submissions|comments> [flags]`. Throws Error("help") for
 * --help and an Error with a usage message for anything malformed.
 */
export function parseFetchArgs(args: string[]): FetchArgs {
  const [modeArg, ...rest] = args;
  if (modeArg === "--help" || modeArg === "-h") throw new Error("help");
  if (modeArg !== "submissions" && modeArg !== "comments") {
    throw new Error('Missing fetch mode (expected "submissions" or "comments")');
  }

  const common: { q?: string; author?: string; subreddit?: string } = {};
  const submission: SubmissionFilters = {};
  const comment: CommentFilters = {};
  const pagination: PaginationParams = {};
  const parsed: Omit<FetchArgs, "query" | "pagination"> = { getComments: false, metrics: false };

  for (let i = 0; i < rest.length; i += 1) {
    const a = rest[i];
    if (a === undefined) continue;
    if (a === "--help" || a === "-h") throw new Error("help");

    if (modeArg === "comments" && SUBMISSION_ONLY.has(a)) {
      throw new Error(`${a} is only valid when fetching submissions`);
    }
    if (modeArg === "submissions" && COMMENT_ONLY.has(a)) {
      throw new Error(`${a} is only valid when fetching comments`);
    }

    if (a === "--comments") {
      parsed.getComments = true;
      continue;
    }
    if (a === "--metrics") {
      parsed.metrics = true;
      continue;
    }

    const next = rest[i + 1];
    if (!next || next.trim().length === 0 || next.startsWith("--")) {
      throw new Error(`Missing ${a} value`);
    }
    i += 1;

    switch (a) {
      case "--backend":
        parsed.backend = pick(a, next, BACKEND_NAMES);
        break;
      case "--subreddit":
        common.subreddit = next;
        break;
      case "--author":
        common.author = next;
        break;
      case "--q":
        common.q = next;
        break;
      case "--title":
        submission.title = next;
        break;
      case "--selftext":
        submission.selftext = next;
        break;
      case "--link-id":
        comment.linkId = next;
        break;
      case "--after":
        pagination.after = next;
        break;
      case "--before":
        pagination.before = next;
        break;
      case "--sort":
        pagination.sort = pick<SortDirection>(a, next, SORT_DIRECTIONS);
        break;
      case "--sort-type":
        pagination.sortType = pick<SortKey>(a, next, SORT_KEYS);
        break;
      case "--size":
        pagination.size = positiveInt(a, next);
        break;
      case "--limit":
        pagination.limit = positiveInt(a, next);
        break;
      case "--duplicate-action":
        if (!isDuplicateAction(next)) {
          throw new Error(
            `Invalid ${a} "${next}" (expected one of ${DUPLICATE_ACTIONS.join(", ")})`,
          );
        }
        parsed.duplicateAction = next;
        break;
      case "--pace-mode":
        if (!isPaceMode(next)) {
          throw new Error(`Invalid ${a} "${next}" (expected one of ${PACE_MODES.join(", ")})`);
        }
        parsed.paceMode = next;
        break;
      case "--task-num":
        parsed.taskNum = positiveInt(a, next);
        break;
      case "--out":
        parsed.out = next;
        break;
      case "--save-dir":
        parsed.saveDir = next;
        break;
      default:
        throw new Error(`Unknown flag: ${a}`);
    }
  }

  const query: FetchQuery =
    modeArg === "submissions"
      ? { mode: "submissions", filters: { ...common, ...submission } }
      : { mode: "comments", filters: { ...common, ...comment } };

  return { ...parsed, query, pagination };
}
