import {
  ConfigurationError,
  type Logger,
  type PaginationParams,
  type PagingStyle,
  type ResultOrder,
  SORT_DIRECTIONS,
  SORT_KEYS,
  splitRange,
  toEpochSeconds,
} from "@archive-sweep/shared";

/** Pagination with times in epoch seconds and defaults filled in. */
export interface ResolvedPagination {
  /** Inclusive. */
  after: number | null;
  /** Exclusive. */
  before: number | null;
  order: ResultOrder;
  size: number;
  limit: number | null;
}

export interface TimeSlice {
  /** Inclusive. */
  after: number;
  /** Exclusive. */
  before: number;
}

export type FetchPlan =
  /** Full sweep of a closed range, one stream per contiguous slice. */
  | { strategy: "time_slices"; slices: TimeSlice[] }
  /** One continuous stream, optionally capped at `limit` records. */
  | { strategy: "cursor"; after: number | null; before: number | null; limit: number | null }
  /** Exactly one request. */
  | { strategy: "single"; after: number | null; before: number | null };

function positiveInt(name: string, value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * Validate and normalize caller pagination. A lone `after` sweeps up to
 * `nowSeconds`.
 */
export function resolvePagination(
  params: PaginationParams,
  maxPageSize: number,
  nowSeconds: number,
): ResolvedPagination {
  const sort = params.sort ?? "desc";
  const sortType = params.sortType ?? "created_utc";
  if (!SORT_DIRECTIONS.includes(sort)) {
    throw new ConfigurationError(`sort must be one of ${SORT_DIRECTIONS.join(", ")} (got ${sort})`);
  }
  if (!SORT_KEYS.includes(sortType)) {
    throw new ConfigurationError(`sortType must be one of ${SORT_KEYS.join(", ")} (got ${sortType})`);
  }

  const size = positiveInt("size", params.size) ?? maxPageSize;
  if (size > maxPageSize) {
    throw new ConfigurationError(`size must be at most ${maxPageSize} (got ${size})`);
  }
  const limit = positiveInt("limit", params.limit) ?? null;

  const after = params.after === undefined ? null : toEpochSeconds(params.after);
  let before = params.before === undefined ? null : toEpochSeconds(params.before);
  if (after !== null && before === null) before = nowSeconds;
  if (after !== null && before !== null && after >= before) {
    throw new ConfigurationError(`after (${after}) must be earlier than before (${before})`);
  }

  return { after, before, order: { sort, sortType }, size, limit };
}

/**
 * Pick the pagination strategy. Ranged and capped fetches page by
 * `created_utc` regardless of the requested sort key.
 */
export function planFetch(
  pagination: ResolvedPagination,
  concurrency: number,
  paging: PagingStyle,
  log?: Logger,
): FetchPlan {
  const { after, before, limit, order } = pagination;

  if (paging === "single") return { strategy: "single", after, before };

  const paged = limit !== null || (after !== null && before !== null);
  if (paged && order.sortType !== "created_utc") {
    log?.warn(
      { sortType: order.sortType },
      "paging by created_utc; requested sort key is applied to the collected records only",
    );
  }

  if (limit !== null) return { strategy: "cursor", after, before, limit };

  if (after !== null && before !== null) {
    const slices = splitRange(after, before - 1, concurrency).map(([lo, hi]) => ({
      after: lo,
      before: hi + 1,
    }));
    return { strategy: "time_slices", slices };
  }

  return { strategy: "single", after, before };
}
