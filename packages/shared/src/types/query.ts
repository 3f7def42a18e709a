import type { SortDirection, SortKey } from "./record";

export type BackendName = "pullpush" | "arctic_shift";

export const BACKEND_NAMES: readonly BackendName[] = ["pullpush", "arctic_shift"];

interface CommonFilters {
  /** Full-text search term. */
  q?: string;
  /** Explicit base-36 ids (without the t1_/t3_ prefix). */
  ids?: string[];
  author?: string;
  subreddit?: string;
}

export interface SubmissionFilters extends CommonFilters {
  title?: string;
  selftext?: string;
  /** Comparison such as ">100" or "<5". */
  score?: string;
  numComments?: string;
  over18?: boolean;
  isVideo?: boolean;
  locked?: boolean;
  stickied?: boolean;
  spoiler?: boolean;
  contestMode?: boolean;
  url?: string;
  linkFlairText?: string;
}

export interface CommentFilters extends CommonFilters {
  linkId?: string;
  parentId?: string;
  body?: string;
}

/**
 * What to fetch. One variant per fetch mode; each backend validates the
 * filters it supports for the mode it is handed.
 */
export type FetchQuery =
  | { mode: "submissions"; filters: SubmissionFilters }
  | { mode: "comments"; filters: CommentFilters }
  | { mode: "comment_tree"; linkId: string };

export type FetchMode = FetchQuery["mode"];

/** Epoch seconds, a Date, or an ISO-8601 string. */
export type TimeInput = number | Date | string;

export interface PaginationParams {
  /** Inclusive lower time bound. */
  after?: TimeInput;
  /** Exclusive upper time bound. */
  before?: TimeInput;
  sort?: SortDirection;
  sortType?: SortKey;
  /** Records per request. */
  size?: number;
  /** Total cap across all pages. */
  limit?: number;
}

/**
 * One request's slice of the query: exclusive `created_utc` bounds (null =
 * unbounded), page size and ordering.
 */
export interface PageWindow {
  lower: number | null;
  upper: number | null;
  size: number;
  sort: SortDirection;
  sortType: SortKey;
}

export interface QueryDescriptor {
  url: string;
  params: Record<string, string>;
}

/** How a backend pages a given query. */
export type PagingStyle = "time" | "single";
