import { randomUUID } from "node:crypto";

import { type ArchiveBackend, getBackend } from "@archive-sweep/connectors";
import {
  type BackendName,
  ConfigurationError,
  createFetchLogger,
  type DuplicateAction,
  errorMessage,
  type FetchQuery,
  isDuplicateAction,
  isPaceMode,
  type Logger,
  type PaceMode,
  type PaginationParams,
  type ResultSet,
} from "@archive-sweep/shared";

import { CommentAttacher } from "./comments";
import { FetchFailedError, PartialResultError, StreamFailedError } from "./errors";
import { ResultSetAccumulator } from "./merge";
import { Pacer } from "./pacer";
import { PageFetcher } from "./page_fetcher";
import { type PersistFn, persistResultSet } from "./persist";
import { planFetch, resolvePagination } from "./plan";
import { RetryPolicy } from "./retry";
import { TaskPool } from "./task_pool";

export interface ArchiveFetcherOptions {
  backend: ArchiveBackend | BackendName;
  sleepSec?: number;
  backoffSec?: number;
  /** Total attempts per request. */
  maxRetries?: number;
  timeoutSec?: number;
  paceMode?: PaceMode;
  taskNum?: number;
  /** Defaults to `taskNum`. */
  commentTaskNum?: number;
  duplicateAction?: DuplicateAction;
  /** Directory for `output` files that do not name one. */
  saveDir?: string;
  /** Epoch milliseconds. */
  clock?: () => number;
  logger?: Logger;
  persist?: PersistFn;
}

export interface FetchOutput {
  fileName: string;
  saveDir?: string;
}

export interface FetchRequest {
  query: FetchQuery;
  pagination?: PaginationParams;
  duplicateAction?: DuplicateAction;
  /** Attach each submission's comments. Submissions only. */
  getComments?: boolean;
  /** Overrides `taskNum` for this call. */
  concurrency?: number;
  signal?: AbortSignal;
  output?: FetchOutput;
}

interface ResolvedOptions {
  backend: ArchiveBackend;
  sleepSec: number;
  backoffSec: number;
  maxRetries: number;
  timeoutSec: number;
  paceMode: PaceMode;
  taskNum: number;
  commentTaskNum: number;
  duplicateAction: DuplicateAction;
  saveDir: string;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number (got ${value})`);
  }
  return value;
}

function requirePositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}

function resolveOptions(options: ArchiveFetcherOptions): ResolvedOptions {
  const backend =
    typeof options.backend === "string" ? getBackend(options.backend) : options.backend;
  if (!backend) throw new ConfigurationError(`Unknown backend: ${String(options.backend)}`);

  const paceMode = options.paceMode ?? "auto-hard";
  if (!isPaceMode(paceMode)) throw new ConfigurationError(`Invalid paceMode: ${paceMode}`);
  const duplicateAction = options.duplicateAction ?? "keep_newest";
  if (!isDuplicateAction(duplicateAction)) {
    throw new ConfigurationError(`Invalid duplicateAction: ${duplicateAction}`);
  }

  const timeoutSec = requireNonNegative("timeoutSec", options.timeoutSec ?? 10);
  if (timeoutSec === 0) throw new ConfigurationError("timeoutSec must be greater than 0");
  const taskNum = requirePositiveInt("taskNum", options.taskNum ?? 3);

  return {
    backend,
    sleepSec: requireNonNegative("sleepSec", options.sleepSec ?? 1),
    backoffSec: requireNonNegative("backoffSec", options.backoffSec ?? 3),
    maxRetries: requirePositiveInt("maxRetries", options.maxRetries ?? 5),
    timeoutSec,
    paceMode,
    taskNum,
    commentTaskNum: requirePositiveInt("commentTaskNum", options.commentTaskNum ?? taskNum),
    duplicateAction,
    saveDir: options.saveDir ?? process.cwd(),
  };
}

/**
 * Entry point of the engine. One instance owns one pacer, so every `fetch`
 * made through it shares the same request budget.
 */
export class ArchiveFetcher {
  readonly backend: ArchiveBackend;
  private readonly options: ResolvedOptions;
  private readonly pacer: Pacer;
  private readonly retry: RetryPolicy;
  private readonly clock: () => number;
  private readonly logger?: Logger;
  private readonly persist: PersistFn;

  constructor(options: ArchiveFetcherOptions) {
    this.options = resolveOptions(options);
    this.backend = this.options.backend;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger;
    this.persist = options.persist ?? persistResultSet;

    this.pacer = new Pacer({
      mode: this.options.paceMode,
      sleepMs: this.options.sleepSec * 1000,
      now: this.clock,
      logger: this.logger,
    });
    this.retry = new RetryPolicy({
      maxRetries: this.options.maxRetries,
      backoffMs: this.options.backoffSec * 1000,
      backend: this.backend.name,
      pacer: this.pacer,
      logger: this.logger,
    });
  }

  /**
   * Fetch every record matching `request`. Resolves with the ordered,
   * deduplicated ResultSet. Rejects with ConfigurationError before any request
   * is sent, or with PartialResultError / FetchFailedError once fetching
   * started.
   */
  async fetch(request: FetchRequest): Promise<ResultSet> {
    const fetchId = randomUUID();
    const log = this.logger ? this.logger.child({ fetchId }) : createFetchLogger(fetchId);
    const { backend } = this;

    if (request.getComments && request.query.mode !== "submissions") {
      throw new ConfigurationError("getComments is only supported when fetching submissions");
    }
    const duplicateAction = request.duplicateAction ?? this.options.duplicateAction;
    if (!isDuplicateAction(duplicateAction)) {
      throw new ConfigurationError(`Invalid duplicateAction: ${duplicateAction}`);
    }
    const concurrency = requirePositiveInt(
      "concurrency",
      request.concurrency ?? this.options.taskNum,
    );
    const pagination = resolvePagination(
      request.pagination ?? {},
      backend.maxPageSize,
      Math.floor(this.clock() / 1000),
    );
    backend.validateQuery(request.query, pagination.order);
    const paging = backend.paging(request.query);
    const plan = planFetch(pagination, concurrency, paging, log);

    log.info(
      {
        backend: backend.name,
        mode: request.query.mode,
        strategy: plan.strategy,
        after: pagination.after,
        before: pagination.before,
        limit: pagination.limit,
        concurrency,
      },
      "fetch started",
    );

    const accumulator = new ResultSetAccumulator(duplicateAction, log);
    const fetcher = new PageFetcher({
      backend,
      query: request.query,
      order: pagination.order,
      pageSize: pagination.size,
      paginate: paging === "time" && plan.strategy !== "single",
      pacer: this.pacer,
      retry: this.retry,
      timeoutMs: this.options.timeoutSec * 1000,
      logger: log,
    });
    const pool = new TaskPool({ fetcher, accumulator, concurrency, logger: log });

    let result: ResultSet = new Map();
    try {
      await pool.run(plan, request.signal);
      result = accumulator.finalize(pagination.order);

      if (request.getComments) {
        const attacher = new CommentAttacher({
          backend,
          pacer: this.pacer,
          retry: this.retry,
          timeoutMs: this.options.timeoutSec * 1000,
          duplicateAction,
          concurrency: this.options.commentTaskNum,
          logger: log,
        });
        await attacher.attach(result, request.signal);
      }
    } catch (err) {
      // Comment failures keep the submissions already finalized above.
      const partial = result.size > 0 ? result : accumulator.finalize(pagination.order);
      throw this.failure(err, partial, log);
    }

    log.info({ records: result.size }, "fetch completed");

    if (request.output) {
      const written = await this.persist(
        result,
        request.output.fileName,
        request.output.saveDir ?? this.options.saveDir,
      );
      log.info({ path: written }, "result set saved");
    }
    return result;
  }

  private failure(err: unknown, partial: ResultSet, log: Logger): Error {
    const boundary = err instanceof StreamFailedError ? err.boundary : undefined;
    const message = `Fetch failed: ${errorMessage(err)}`;
    log.error({ err, boundary, records: partial.size }, "fetch failed");
    if (partial.size > 0) return new PartialResultError(message, partial, boundary, err);
    return new FetchFailedError(message, boundary, err);
  }
}
