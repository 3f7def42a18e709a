import type { ArchiveRecord, ArchiveResponse } from "@archive-sweep/shared";

import { readDataArray, toRecords } from "../page";

export function normalizePullPush(response: ArchiveResponse): ArchiveRecord[] {
  return toRecords(readDataArray(response.body, "pullpush"), "pullpush");
}
