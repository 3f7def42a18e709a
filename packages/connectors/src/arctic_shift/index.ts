import type { FetchQuery, PagingStyle } from "@archive-sweep/shared";

import type { ArchiveBackend } from "../types";
import { ARCTIC_SHIFT_MAX_PAGE_SIZE, validateArcticShiftQuery } from "./config";
import { buildArcticShiftQuery, sendArcticShift } from "./fetch";
import { normalizeArcticShift } from "./normalize";

function pagingOf(query: FetchQuery): PagingStyle {
  if (query.mode === "comment_tree") return "single";
  return query.filters.ids !== undefined ? "single" : "time";
}

export const arcticShiftBackend: ArchiveBackend = {
  name: "arctic_shift",
  maxPageSize: ARCTIC_SHIFT_MAX_PAGE_SIZE,
  validateQuery: validateArcticShiftQuery,
  paging: pagingOf,
  buildQuery: buildArcticShiftQuery,
  send: sendArcticShift,
  normalize: normalizeArcticShift,
};
