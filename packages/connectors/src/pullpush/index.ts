import type { FetchQuery, PagingStyle } from "@archive-sweep/shared";

import type { ArchiveBackend } from "../types";
import { PULLPUSH_MAX_PAGE_SIZE, validatePullPushQuery } from "./config";
import { buildPullPushQuery, sendPullPush } from "./fetch";
import { normalizePullPush } from "./normalize";

function pagingOf(query: FetchQuery): PagingStyle {
  if (query.mode !== "comment_tree" && query.filters.ids !== undefined) return "single";
  return "time";
}

export const pullPushBackend: ArchiveBackend = {
  name: "pullpush",
  maxPageSize: PULLPUSH_MAX_PAGE_SIZE,
  validateQuery: validatePullPushQuery,
  paging: pagingOf,
  buildQuery: buildPullPushQuery,
  send: sendPullPush,
  normalize: normalizePullPush,
};
