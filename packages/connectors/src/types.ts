import type {
  ArchiveRecord,
  ArchiveResponse,
  BackendName,
  FetchQuery,
  PageWindow,
  PagingStyle,
  QueryDescriptor,
  ResultOrder,
  SendOptions,
} from "@archive-sweep/shared";

/**
 * One archive service. The engine only talks to backends through this
 * interface; everything service-specific (endpoints, parameter names, quota
 * headers, response shape) stays behind it.
 */
export interface ArchiveBackend {
  name: BackendName;
  /** Largest page the service returns for one search request. */
  maxPageSize: number;

  /** Throws ConfigurationError for filters the service does not support. */
  validateQuery(query: FetchQuery, order: ResultOrder): void;
  /** `single` for lookups that return everything in one response (ids, comment trees). */
  paging(query: FetchQuery): PagingStyle;
  buildQuery(query: FetchQuery, window: PageWindow): QueryDescriptor;
  send(descriptor: QueryDescriptor, options: SendOptions): Promise<ArchiveResponse>;
  normalize(response: ArchiveResponse): ArchiveRecord[];
}
