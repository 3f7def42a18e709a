import type { ArchiveBackend } from "@archive-sweep/connectors";
import {
  type ArchiveRecord,
  createdUtcOf,
  createLogger,
  type FetchQuery,
  type Logger,
  MalformedResponseError,
  type PageWindow,
  type ResultOrder,
} from "@archive-sweep/shared";

import { recordRequest } from "./metrics";
import type { Pacer } from "./pacer";
import type { RetryPolicy } from "./retry";

/**
 * Pagination state of one stream. `lower`/`upper` are exclusive
 * `created_utc` bounds; null means unbounded on that side.
 */
export interface PageCursor {
  lower: number | null;
  upper: number | null;
  /** Records still wanted under a total cap; null when uncapped. */
  remaining: number | null;
  pages: number;
  exhausted: boolean;
}

export interface PageResult {
  records: ArchiveRecord[];
  cursor: PageCursor;
}

export interface PageFetcherOptions {
  backend: ArchiveBackend;
  query: FetchQuery;
  order: ResultOrder;
  pageSize: number;
  /** False for queries answered by one request. */
  paginate: boolean;
  pacer: Pacer;
  retry: RetryPolicy;
  timeoutMs: number;
  logger?: Logger;
}

export function initialCursor(
  lower: number | null,
  upper: number | null,
  remaining: number | null = null,
): PageCursor {
  return { lower, upper, remaining, pages: 0, exhausted: false };
}

function insideWindow(record: ArchiveRecord, lower: number | null, upper: number | null): boolean {
  const created = createdUtcOf(record);
  if (created === null) return true;
  if (lower !== null && created <= lower) return false;
  if (upper !== null && created >= upper) return false;
  return true;
}

export class PageFetcher {
  private readonly log: Logger;
  private readonly label: string;

  constructor(private readonly options: PageFetcherOptions) {
    this.log = options.logger ?? createLogger({ component: "page-fetcher" });
    this.label = `${options.backend.name} ${options.query.mode}`;
  }

  /**
   * Fetch the page after `cursor` and return it with the advanced cursor.
   * Time-paged queries are always requested in `created_utc` order; the
   * caller's sort key is applied when the result set is finalized.
   */
  async nextPage(cursor: PageCursor, signal?: AbortSignal): Promise<PageResult> {
    const { backend, query, order, pageSize, paginate } = this.options;
    const size =
      cursor.remaining === null ? pageSize : Math.max(0, Math.min(pageSize, cursor.remaining));
    if (cursor.exhausted || size === 0) {
      return { records: [], cursor: { ...cursor, exhausted: true } };
    }

    const window: PageWindow = {
      lower: cursor.lower,
      upper: cursor.upper,
      size,
      sort: order.sort,
      sortType: paginate ? "created_utc" : order.sortType,
    };
    const descriptor = backend.buildQuery(query, window);

    const raw = await this.options.retry.execute(
      async () => {
        await this.options.pacer.acquire(signal);
        const startedAt = Date.now();
        try {
          const response = await backend.send(descriptor, {
            timeoutMs: this.options.timeoutMs,
            signal,
          });
          recordRequest({
            backend: backend.name,
            outcome: "success",
            durationSec: (Date.now() - startedAt) / 1000,
          });
          this.options.pacer.observe(response.rateLimit);
          return backend.normalize(response);
        } catch (err) {
          if (!signal?.aborted) {
            recordRequest({
              backend: backend.name,
              outcome: "error",
              durationSec: (Date.now() - startedAt) / 1000,
            });
          }
          throw err;
        }
      },
      { label: this.label, signal },
    );

    let records = paginate
      ? raw.filter((record) => insideWindow(record, cursor.lower, cursor.upper))
      : raw;
    if (records.length < raw.length) {
      this.log.debug(
        { dropped: raw.length - records.length, lower: cursor.lower, upper: cursor.upper },
        "records outside page window dropped",
      );
    }
    if (cursor.remaining !== null) records = records.slice(0, cursor.remaining);

    const next: PageCursor = {
      ...cursor,
      pages: cursor.pages + 1,
      remaining: cursor.remaining === null ? null : cursor.remaining - records.length,
    };

    const last = records.at(-1);
    const exhausted =
      !paginate ||
      last === undefined ||
      raw.length < size ||
      next.remaining === 0;

    if (!exhausted && last !== undefined) {
      const boundary = createdUtcOf(last);
      if (boundary === null) {
        throw new MalformedResponseError(
          `${this.label}: record ${last.id} has no numeric created_utc to paginate on`,
        );
      }
      if (order.sort === "desc") next.upper = boundary;
      else next.lower = boundary;
    }

    next.exhausted =
      exhausted || (next.lower !== null && next.upper !== null && next.upper - next.lower <= 1);

    this.log.debug(
      {
        page: next.pages,
        records: records.length,
        lower: next.lower,
        upper: next.upper,
        exhausted: next.exhausted,
      },
      "page fetched",
    );
    return { records, cursor: next };
  }
}
