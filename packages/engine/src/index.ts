export {
  ArchiveFetcher,
  type ArchiveFetcherOptions,
  type FetchOutput,
  type FetchRequest,
} from "./orchestrator";
export {
  CancelledError,
  FetchFailedError,
  isPartialResult,
  PartialResultError,
  RetryExhaustedError,
  type StreamBoundary,
  StreamFailedError,
} from "./errors";
export { CommentAttacher, COMMENT_ORDER } from "./comments";
export { isEdited, isRemoved, recencyOf } from "./lib/classify";
export { type MergeCounts, ResultSetAccumulator } from "./merge";
export { Pacer, type PacerOptions } from "./pacer";
export { initialCursor, type PageCursor, PageFetcher, type PageResult } from "./page_fetcher";
export {
  type PersistFn,
  persistResultSet,
  resultSetPath,
  serializeResultSet,
} from "./persist";
export { type FetchPlan, planFetch, type ResolvedPagination, resolvePagination } from "./plan";
export { RetryPolicy } from "./retry";
export { runBounded, TaskPool } from "./task_pool";
export { getMetrics, registry } from "./metrics";
