import type { StreamBoundary } from "@archive-sweep/engine";
import { type FetchMode, isoFromEpoch, type ResultSet } from "@archive-sweep/shared";

function countComments(result: ResultSet): number {
  let total = 0;
  for (const record of result.values()) {
    if (Array.isArray(record.comments)) total += record.comments.length;
  }
  return total;
}

function bound(value: number | null): string {
  return value === null ? "open" : isoFromEpoch(value);
}

export function formatSummary(params: {
  result: ResultSet;
  mode: FetchMode;
  backend: string;
  elapsedMs: number;
  withComments?: boolean;
  savedTo?: string;
}): string {
  const { result, mode, backend, elapsedMs } = params;
  let line = `${result.size} ${mode} from ${backend} in ${(elapsedMs / 1000).toFixed(1)}s`;
  if (params.withComments) line += ` (${countComments(result)} comments)`;
  if (params.savedTo) line += ` -> ${params.savedTo}`;
  return line;
}

/** Where a failed stream stopped, for resuming by hand. */
export function formatBoundary(boundary: StreamBoundary): string {
  const stream = boundary.linkId
    ? `stream ${boundary.streamId} (link ${boundary.linkId})`
    : `stream ${boundary.streamId}`;
  return (
    `${stream}: slice [${bound(boundary.after)}, ${bound(boundary.before)}) ` +
    `stopped after ${boundary.pages} pages between ${bound(boundary.lower)} and ${bound(boundary.upper)}`
  );
}
