import {
  ArchiveFetcher,
  FetchFailedError,
  getMetrics,
  isPartialResult,
  persistResultSet,
  resultSetPath,
} from "@archive-sweep/engine";
import { ConfigurationError, createLogger, loadSweepEnv } from "@archive-sweep/shared";

import { formatBoundary, formatSummary } from "../ui/render";
import { type FetchArgs, parseFetchArgs } from "./fetch_args";

const log = createLogger({ component: "cli" });

function printFetchUsage(): void {
  console.log("Usage:");
  console.log("  fetch <submissions|comments> [filters] [pagination] [options]");
  console.log("");
  console.log("Filters:");
  console.log("  --subreddit S  --author A  --q TEXT");
  console.log("  --title T  --selftext T       (submissions)");
  console.log("  --link-id ID                  (comments)");
  console.log("");
  console.log("Pagination:");
  console.log("  --after ISO|EPOCH  --before ISO|EPOCH  --limit N  --size N");
  console.log("  --sort asc|desc  --sort-type created_utc|score|num_comments");
  console.log("");
  console.log("Options:");
  console.log("  --backend pullpush|arctic_shift  --pace-mode auto-soft|auto-hard|manual");
  console.log("  --task-num N  --duplicate-action P  --comments");
  console.log("  --out FILE  --save-dir DIR  --metrics");
  console.log("");
  console.log("Examples:");
  console.log("  npm run sweep -- fetch submissions --subreddit typescript --after 2024-01-01 --before 2024-01-08");
  console.log("  npm run sweep -- fetch comments --author test_user --limit 500 --out replies");
}

function partialFileName(out: string): string {
  const base = out.endsWith(".json") ? out.slice(0, -".json".length) : out;
  return `${base}.partial`;
}

async function runFetch(parsed: FetchArgs): Promise<void> {
  const env = loadSweepEnv();
  const saveDir = parsed.saveDir ?? env.saveDir;
  const fetcher = new ArchiveFetcher({
    backend: parsed.backend ?? env.backend,
    sleepSec: env.sleepSec,
    backoffSec: env.backoffSec,
    maxRetries: env.maxRetries,
    timeoutSec: env.timeoutSec,
    paceMode: parsed.paceMode ?? env.paceMode,
    taskNum: parsed.taskNum ?? env.taskNum,
    commentTaskNum: env.commentTaskNum,
    duplicateAction: env.duplicateAction,
    saveDir,
  });

  const controller = new AbortController();
  const onSigint = () => {
    log.warn("interrupted; cancelling fetch");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const startedAt = Date.now();
  try {
    const result = await fetcher.fetch({
      query: parsed.query,
      pagination: parsed.pagination,
      duplicateAction: parsed.duplicateAction,
      getComments: parsed.getComments,
      signal: controller.signal,
      ...(parsed.out !== undefined && { output: { fileName: parsed.out, saveDir } }),
    });
    console.log(
      formatSummary({
        result,
        mode: parsed.query.mode,
        backend: fetcher.backend.name,
        elapsedMs: Date.now() - startedAt,
        withComments: parsed.getComments,
        savedTo: parsed.out === undefined ? undefined : resultSetPath(parsed.out, saveDir),
      }),
    );
  } catch (err) {
    if (isPartialResult(err)) {
      console.error(`${err.message} (${err.result.size} records kept)`);
      if (err.boundary) console.error(formatBoundary(err.boundary));
      if (parsed.out !== undefined) {
        const written = await persistResultSet(err.result, partialFileName(parsed.out), saveDir);
        console.error(`partial result saved to ${written}`);
      }
      process.exitCode = 1;
      return;
    }
    if (err instanceof FetchFailedError) {
      console.error(err.message);
      if (err.boundary) console.error(formatBoundary(err.boundary));
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    process.removeListener("SIGINT", onSigint);
    if (parsed.metrics) process.stderr.write(await getMetrics());
  }
}

export async function fetchCommand(args: string[] = []): Promise<void> {
  let parsed: FetchArgs;
  try {
    parsed = parseFetchArgs(args);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === "help") {
      printFetchUsage();
      return;
    }
    console.error(message);
    console.log("");
    printFetchUsage();
    process.exitCode = 1;
    return;
  }

  try {
    await runFetch(parsed);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
