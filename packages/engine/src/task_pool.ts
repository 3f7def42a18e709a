import { createLogger, errorMessage, type Logger } from "@archive-sweep/shared";

import { CancelledError, type StreamBoundary, StreamFailedError } from "./errors";
import { abortReason } from "./lib/sleep";
import type { ResultSetAccumulator } from "./merge";
import { initialCursor, type PageCursor, type PageFetcher, type PageResult } from "./page_fetcher";
import type { FetchPlan } from "./plan";

/**
 * Run `worker` over `items` with at most `concurrency` in flight. The first
 * failure aborts the signal handed to the other workers; once every worker
 * has settled, that failure is rethrown. A caller abort rejects with
 * CancelledError.
 */
export async function runBounded<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number, signal: AbortSignal) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  if (signal?.aborted) throw new CancelledError("Fetch cancelled", { cause: signal.reason });

  const controller = new AbortController();
  const forwardAbort = () => {
    if (signal) controller.abort(abortReason(signal));
  };
  signal?.addEventListener("abort", forwardAbort, { once: true });

  const queue = items.map((item, index) => ({ item, index }));
  const failures: unknown[] = [];

  const lane = async (): Promise<void> => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      if (controller.signal.aborted) return;
      try {
        await worker(next.item, next.index, controller.signal);
      } catch (err) {
        if (controller.signal.aborted) return;
        failures.push(err);
        controller.abort(err);
        return;
      }
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  try {
    await Promise.all(Array.from({ length: lanes }, lane));
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }

  if (signal?.aborted) throw new CancelledError("Fetch cancelled", { cause: signal.reason });
  if (failures.length > 0) throw failures[0];
}

interface StreamSpec {
  streamId: number;
  after: number | null;
  before: number | null;
  cursor: PageCursor;
}

/** Streams for a plan. Cursor bounds are exclusive, hence the -1. */
function streamsFor(plan: FetchPlan): StreamSpec[] {
  const lowerOf = (after: number | null) => (after === null ? null : after - 1);
  switch (plan.strategy) {
    case "time_slices":
      return plan.slices.map((slice, streamId) => ({
        streamId,
        after: slice.after,
        before: slice.before,
        cursor: initialCursor(slice.after - 1, slice.before),
      }));
    case "cursor":
      return [
        {
          streamId: 0,
          after: plan.after,
          before: plan.before,
          cursor: initialCursor(lowerOf(plan.after), plan.before, plan.limit),
        },
      ];
    case "single":
      return [
        {
          streamId: 0,
          after: plan.after,
          before: plan.before,
          cursor: initialCursor(lowerOf(plan.after), plan.before),
        },
      ];
  }
}

export interface TaskPoolOptions {
  fetcher: PageFetcher;
  accumulator: ResultSetAccumulator;
  concurrency: number;
  /** Tags stream boundaries of comment sub-fetches. */
  linkId?: string;
  logger?: Logger;
}

/**
 * Drives the streams of one plan into a shared accumulator. Pages of a stream
 * are strictly sequential; streams run concurrently up to `concurrency`.
 */
export class TaskPool {
  private readonly log: Logger;

  constructor(private readonly options: TaskPoolOptions) {
    this.log = options.logger ?? createLogger({ component: "task-pool" });
  }

  async run(plan: FetchPlan, signal?: AbortSignal): Promise<void> {
    const streams = streamsFor(plan);
    this.log.debug(
      { strategy: plan.strategy, streams: streams.length, linkId: this.options.linkId },
      "running fetch plan",
    );
    await runBounded(
      streams,
      this.options.concurrency,
      (stream, _index, laneSignal) => this.runStream(stream, laneSignal),
      signal,
    );
  }

  private async runStream(stream: StreamSpec, signal: AbortSignal): Promise<void> {
    const { fetcher, accumulator, linkId } = this.options;
    let cursor = stream.cursor;
    let merged = 0;
    this.log.info(
      { streamId: stream.streamId, after: stream.after, before: stream.before, linkId },
      "stream started",
    );

    while (!cursor.exhausted) {
      let page: PageResult;
      try {
        page = await fetcher.nextPage(cursor, signal);
      } catch (err) {
        if (signal.aborted) throw err;
        const boundary: StreamBoundary = {
          streamId: stream.streamId,
          after: stream.after,
          before: stream.before,
          lower: cursor.lower,
          upper: cursor.upper,
          pages: cursor.pages,
          ...(linkId !== undefined && { linkId }),
        };
        this.log.error({ err, boundary }, "stream failed");
        throw new StreamFailedError(
          `Stream ${stream.streamId} failed after ${cursor.pages} pages: ${errorMessage(err)}`,
          boundary,
          err,
        );
      }
      // A page that arrives after cancellation is discarded.
      if (signal.aborted) throw abortReason(signal);
      accumulator.merge(page.records);
      merged += page.records.length;
      cursor = page.cursor;
    }

    this.log.info(
      { streamId: stream.streamId, pages: cursor.pages, records: merged, linkId },
      "stream finished",
    );
  }
}
