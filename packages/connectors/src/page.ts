import {
  type ArchiveRecord,
  asRecord,
  MalformedResponseError,
  toArchiveRecord,
} from "@archive-sweep/shared";

/**
 * Pull the `data` array out of a `{ data: [...] }` page. An `error` field, a
 * missing array or an entry without an id fails the whole page.
 */
export function readDataArray(body: unknown, backend: string): unknown[] {
  const page = asRecord(body);
  if (typeof page.error === "string" && page.error.length > 0) {
    throw new MalformedResponseError(`${backend} returned an error: ${page.error}`);
  }
  if (!Array.isArray(page.data)) {
    throw new MalformedResponseError(`${backend} response has no "data" array`);
  }
  return page.data;
}

export function toRecords(entries: unknown[], backend: string): ArchiveRecord[] {
  const records: ArchiveRecord[] = [];
  for (const entry of entries) {
    const record = toArchiveRecord(entry);
    if (!record) {
      throw new MalformedResponseError(`${backend} returned an entry without an id`);
    }
    records.push(record);
  }
  return records;
}
