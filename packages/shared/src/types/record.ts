/**
 * One submission or comment document as returned by the archive. Only `id` is
 * guaranteed; every other field is server-defined and passed through as-is.
 */
export interface ArchiveRecord {
  id: string;
  [field: string]: unknown;
}

/** Record ID -> Record, iteration order = requested sort order. */
export type ResultSet = Map<string, ArchiveRecord>;

export type SortDirection = "asc" | "desc";
export type SortKey = "created_utc" | "score" | "num_comments";

export const SORT_DIRECTIONS: readonly SortDirection[] = ["asc", "desc"];
export const SORT_KEYS: readonly SortKey[] = ["created_utc", "score", "num_comments"];

export interface ResultOrder {
  sort: SortDirection;
  sortType: SortKey;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value))
    return value as Record<string, unknown>;
  return {};
}

/** Finite number, or a numeric string (PullPush sometimes sends floats as strings). */
export function numericField(record: Record<string, unknown>, field: string): number | null {
  const value = record[field];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** `created_utc` floored to whole seconds, the unit the archive paginates on. */
export function createdUtcOf(record: Record<string, unknown>): number | null {
  const created = numericField(record, "created_utc");
  return created === null ? null : Math.floor(created);
}

/**
 * Coerce a raw page entry into an ArchiveRecord. Numeric ids are stringified;
 * anything without a usable id is rejected.
 */
export function toArchiveRecord(value: unknown): ArchiveRecord | null {
  const obj = asRecord(value);
  const rawId = obj.id;
  if (typeof rawId === "string" && rawId.length > 0) return { ...obj, id: rawId };
  if (typeof rawId === "number" && Number.isFinite(rawId)) return { ...obj, id: String(rawId) };
  return null;
}
