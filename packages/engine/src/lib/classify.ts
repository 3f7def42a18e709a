import { type ArchiveRecord, numericField } from "@archive-sweep/shared";

const RECENCY_FIELDS = ["edited", "edited_at", "retrieved_on", "retrieved_utc", "updated_utc"];
const MARKER_RE = /^\[.*\]/;
const MARKER_MAX_LENGTH = 100;

function isBracketed(value: string): boolean {
  return value.startsWith("[") && value.endsWith("]");
}

/**
 * Removed or deleted by its author, a moderator or the site. A boolean
 * `removed`/`deleted` flag settles it; otherwise markers such as `[deleted]`,
 * `[removed]`, `[Removed by Reddit]` are looked for.
 */
export function isRemoved(record: ArchiveRecord): boolean {
  const { removed, deleted } = record;
  if (typeof removed === "boolean" || typeof deleted === "boolean") {
    return removed === true || deleted === true;
  }
  if (record.removed_by_category != null || record.removal_reason != null) return true;

  const author = record.author;
  if (typeof author !== "string" || isBracketed(author)) return true;

  const hasTitle = record.title != null;
  const rawText = hasTitle ? record.selftext : record.body;
  const text = typeof rawText === "string" ? rawText : "";

  if (text === "" && !record.title) return true;

  if (MARKER_RE.test(text) && text.length <= MARKER_MAX_LENGTH) {
    const lower = text.toLowerCase();
    if (lower.includes("deleted") || lower.includes("removed")) return true;
  }
  return false;
}

/** `edited` is `false` or an epoch timestamp; some dumps use `true` or `edited_at`. */
export function isEdited(record: ArchiveRecord): boolean {
  if (record.edited === true) return true;
  for (const field of ["edited", "edited_at"]) {
    const editedAt = numericField(record, field);
    if (editedAt !== null && editedAt > 0) return true;
  }
  return false;
}

/** Largest numeric recency signal; -Infinity when the record carries none. */
export function recencyOf(record: ArchiveRecord): number {
  let best = Number.NEGATIVE_INFINITY;
  for (const field of RECENCY_FIELDS) {
    const value = numericField(record, field);
    if (value !== null && value > best) best = value;
  }
  return best;
}

/** keep_original preference: intact & unedited > intact & edited > removed. */
export function originalRank(record: ArchiveRecord): number {
  if (isRemoved(record)) return 0;
  return isEdited(record) ? 1 : 2;
}
