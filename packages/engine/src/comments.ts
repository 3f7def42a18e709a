import type { ArchiveBackend } from "@archive-sweep/connectors";
import {
  createLogger,
  type DuplicateAction,
  type FetchQuery,
  type Logger,
  type ResultOrder,
  type ResultSet,
} from "@archive-sweep/shared";

import { ResultSetAccumulator } from "./merge";
import type { Pacer } from "./pacer";
import { PageFetcher } from "./page_fetcher";
import type { FetchPlan } from "./plan";
import type { RetryPolicy } from "./retry";
import { runBounded, TaskPool } from "./task_pool";

/** Comments are attached oldest first. */
export const COMMENT_ORDER: ResultOrder = { sort: "asc", sortType: "created_utc" };

export interface CommentAttacherOptions {
  backend: ArchiveBackend;
  pacer: Pacer;
  retry: RetryPolicy;
  timeoutMs: number;
  duplicateAction: DuplicateAction;
  /** Submissions whose comments are fetched at the same time. */
  concurrency: number;
  logger?: Logger;
}

export class CommentAttacher {
  private readonly log: Logger;

  constructor(private readonly options: CommentAttacherOptions) {
    this.log = options.logger ?? createLogger({ component: "comments" });
  }

  /**
   * Fetch the comments of every submission in `submissions` and set them as
   * its `comments` array, in place. Submissions that already have comments
   * when a sibling fails keep them.
   */
  async attach(submissions: ResultSet, signal?: AbortSignal): Promise<number> {
    const linkIds = [...submissions.keys()];
    let attached = 0;
    this.log.info(
      { submissions: linkIds.length, concurrency: this.options.concurrency },
      "fetching comments",
    );

    await runBounded(
      linkIds,
      this.options.concurrency,
      async (linkId, _index, laneSignal) => {
        const comments = await this.fetchComments(linkId, laneSignal);
        const parent = submissions.get(linkId);
        if (!parent) return;
        submissions.set(linkId, { ...parent, comments: [...comments.values()] });
        attached += comments.size;
      },
      signal,
    );

    this.log.info({ submissions: linkIds.length, comments: attached }, "comments attached");
    return attached;
  }

  private async fetchComments(linkId: string, signal: AbortSignal): Promise<ResultSet> {
    const { backend, pacer, retry, timeoutMs, duplicateAction } = this.options;
    const query: FetchQuery = { mode: "comment_tree", linkId };
    const paging = backend.paging(query);
    const plan: FetchPlan =
      paging === "single"
        ? { strategy: "single", after: null, before: null }
        : { strategy: "cursor", after: null, before: null, limit: null };

    const accumulator = new ResultSetAccumulator(duplicateAction, this.log);
    const fetcher = new PageFetcher({
      backend,
      query,
      order: COMMENT_ORDER,
      pageSize: backend.maxPageSize,
      paginate: paging === "time",
      pacer,
      retry,
      timeoutMs,
      logger: this.log,
    });
    const pool = new TaskPool({ fetcher, accumulator, concurrency: 1, linkId, logger: this.log });
    await pool.run(plan, signal);
    return accumulator.finalize(COMMENT_ORDER);
  }
}
