import type { ArchiveBackend } from "@archive-sweep/connectors";
import {
  type ArchiveRecord,
  type ArchiveResponse,
  asRecord,
  type BackendName,
  type FetchQuery,
  MalformedResponseError,
  numericField,
  type PageWindow,
  type PagingStyle,
  type QueryDescriptor,
  type RateLimitSignal,
  type SendOptions,
  toArchiveRecord,
} from "@archive-sweep/shared";

import { sleep } from "../lib/sleep";

export interface FakeArchiveOptions {
  name?: BackendName;
  /** Searchable submissions/comments, in any order. */
  records?: ArchiveRecord[];
  /** Comments by link id, served for comment_tree queries. */
  comments?: Record<string, ArchiveRecord[]>;
  maxPageSize?: number;
  /** How comment trees are paged. */
  treePaging?: PagingStyle;
  rateLimit?: RateLimitSignal | null;
  /** Simulated network latency per request. */
  latencyMs?: number;
  /** Return an error to make the n-th request (0-based) fail with it. */
  failOn?: (call: number, descriptor: QueryDescriptor) => Error | undefined;
  /** Rewrite a page before it is returned. */
  transformPage?: (page: ArchiveRecord[], call: number) => ArchiveRecord[];
}

function paramNumber(params: Record<string, string>, key: string): number | null {
  const raw = params[key];
  return raw === undefined ? null : Number(raw);
}

/**
 * In-process archive. Serves `created_utc`-windowed pages from a fixed data
 * set and records every request it sees.
 */
export class FakeArchive implements ArchiveBackend {
  readonly name: BackendName;
  readonly maxPageSize: number;
  readonly requests: QueryDescriptor[] = [];
  readonly validated: FetchQuery[] = [];

  constructor(private readonly options: FakeArchiveOptions = {}) {
    this.name = options.name ?? "pullpush";
    this.maxPageSize = options.maxPageSize ?? 100;
  }

  validateQuery(query: FetchQuery): void {
    this.validated.push(query);
  }

  paging(query: FetchQuery): PagingStyle {
    if (query.mode === "comment_tree") return this.options.treePaging ?? "time";
    return query.filters.ids !== undefined ? "single" : "time";
  }

  buildQuery(query: FetchQuery, window: PageWindow): QueryDescriptor {
    const params: Record<string, string> = {
      size: String(window.size),
      sort: window.sort,
      sort_type: window.sortType,
    };
    if (window.lower !== null) params.after = String(window.lower);
    if (window.upper !== null) params.before = String(window.upper);
    if (query.mode === "comment_tree") params.link_id = query.linkId;
    return { url: `fake://${query.mode}`, params };
  }

  async send(descriptor: QueryDescriptor, options: SendOptions): Promise<ArchiveResponse> {
    const call = this.requests.length;
    this.requests.push(descriptor);
    if (this.options.latencyMs) await sleep(this.options.latencyMs, options.signal);
    else if (options.signal?.aborted) throw options.signal.reason;

    const failure = this.options.failOn?.(call, descriptor);
    if (failure) throw failure;

    const { params } = descriptor;
    const linkId = params.link_id;
    const source =
      linkId !== undefined ? (this.options.comments?.[linkId] ?? []) : (this.options.records ?? []);
    const lower = paramNumber(params, "after");
    const upper = paramNumber(params, "before");
    const size = paramNumber(params, "size") ?? this.maxPageSize;
    const sortKey = params.sort_type ?? "created_utc";
    const direction = params.sort === "asc" ? 1 : -1;

    const page = source
      .filter((record) => {
        const created = numericField(record, "created_utc");
        if (created === null) return true;
        return (lower === null || created > lower) && (upper === null || created < upper);
      })
      .sort(
        (a, b) => ((numericField(a, sortKey) ?? 0) - (numericField(b, sortKey) ?? 0)) * direction,
      )
      .slice(0, size);

    const body = { data: this.options.transformPage ? this.options.transformPage(page, call) : page };
    return { status: 200, rateLimit: this.options.rateLimit ?? null, body };
  }

  normalize(response: ArchiveResponse): ArchiveRecord[] {
    const data = asRecord(response.body).data;
    if (!Array.isArray(data)) throw new MalformedResponseError("fake page has no data array");
    return data.map((entry) => {
      const record = toArchiveRecord(entry);
      if (!record) throw new MalformedResponseError("fake entry has no id");
      return record;
    });
  }
}

/** `count` submissions one second apart, newest last. */
export function makeSubmissions(count: number, startUtc: number, prefix = "s"): ArchiveRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `${prefix}${i}`,
    created_utc: startUtc + i,
    author: "test_user",
    title: `post ${i}`,
    selftext: "body",
    score: (i * 7) % 11,
  }));
}
