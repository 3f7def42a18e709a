import {
  type ArchiveRecord,
  createLogger,
  type DuplicateAction,
  type Logger,
  numericField,
  type ResultOrder,
  type ResultSet,
} from "@archive-sweep/shared";

import { isRemoved, originalRank, recencyOf } from "./lib/classify";
import { recordMergeOutcomes } from "./metrics";

export interface MergeCounts {
  inserted: number;
  replaced: number;
  /** Incoming duplicates the policy chose not to keep. */
  discarded: number;
  /** IDs dropped by the `remove` policy. */
  removed: number;
}

function emptyCounts(): MergeCounts {
  return { inserted: 0, replaced: 0, discarded: 0, removed: 0 };
}

/**
 * Whether `incoming` should replace `stored` for an ID seen again. Ties go to
 * the later arrival.
 */
function prefersIncoming(
  action: Exclude<DuplicateAction, "remove">,
  stored: ArchiveRecord,
  incoming: ArchiveRecord,
): boolean {
  switch (action) {
    case "keep_newest":
      return recencyOf(incoming) >= recencyOf(stored);
    case "keep_oldest":
      return false;
    case "keep_original":
      return originalRank(incoming) >= originalRank(stored);
    case "keep_removed":
      return isRemoved(incoming) || !isRemoved(stored);
  }
}

/** Missing keys sort last whatever the direction. */
function compareKeys(a: number | null, b: number | null, direction: number): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }
  return (a - b) * direction;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * The ResultSet being built by one `fetch` call. Every mutation goes through
 * `merge`, which never awaits, so concurrent streams interleave only between
 * whole pages.
 */
export class ResultSetAccumulator {
  private readonly records = new Map<string, ArchiveRecord>();
  private readonly occurrences = new Map<string, number>();
  private readonly tombstones = new Set<string>();
  private readonly log: Logger;

  constructor(
    private readonly action: DuplicateAction,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger({ component: "merge" });
  }

  get size(): number {
    return this.records.size;
  }

  merge(incoming: readonly ArchiveRecord[]): MergeCounts {
    const counts = emptyCounts();

    for (const record of incoming) {
      const id = record.id;
      if (this.tombstones.has(id)) {
        counts.discarded += 1;
        continue;
      }

      const stored = this.records.get(id);
      if (!stored) {
        this.records.set(id, record);
        this.occurrences.set(id, 1);
        counts.inserted += 1;
        continue;
      }

      this.occurrences.set(id, (this.occurrences.get(id) ?? 1) + 1);

      if (this.action === "remove") {
        this.records.delete(id);
        this.tombstones.add(id);
        counts.removed += 1;
        continue;
      }

      if (prefersIncoming(this.action, stored, record)) {
        this.records.set(id, record);
        counts.replaced += 1;
      } else {
        counts.discarded += 1;
      }
    }

    recordMergeOutcomes({ ...counts });
    return counts;
  }

  /**
   * Ordered ResultSet; equal sort keys fall back to `created_utc`, then ID,
   * so the order does not depend on which stream delivered first. Duplicated IDs whose variants never satisfied
   * keep_original / keep_removed are left out. Does not consume the
   * accumulator; later merges still apply.
   */
  finalize(order: ResultOrder): ResultSet {
    const kept: ArchiveRecord[] = [];
    for (const [id, record] of this.records) {
      if (this.shouldDrop(id, record)) {
        this.log.warn(
          { id, duplicateAction: this.action, occurrences: this.occurrences.get(id) },
          "no variant satisfies duplicate policy; dropping record",
        );
        continue;
      }
      kept.push(record);
    }

    const direction = order.sort === "asc" ? 1 : -1;
    const keyed = kept.map((record) => ({
      record,
      key: numericField(record, order.sortType),
      created: numericField(record, "created_utc"),
    }));
    keyed.sort(
      (a, b) =>
        compareKeys(a.key, b.key, direction) ||
        compareKeys(a.created, b.created, direction) ||
        compareIds(a.record.id, b.record.id),
    );

    const result: ResultSet = new Map();
    for (const { record } of keyed) result.set(record.id, record);
    return result;
  }

  private shouldDrop(id: string, record: ArchiveRecord): boolean {
    if ((this.occurrences.get(id) ?? 1) < 2) return false;
    if (this.action === "keep_original") return originalRank(record) === 0;
    if (this.action === "keep_removed") return !isRemoved(record);
    return false;
  }
}
