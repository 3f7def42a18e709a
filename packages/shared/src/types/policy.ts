export type PaceMode = "auto-soft" | "auto-hard" | "manual";

export const PACE_MODES: readonly PaceMode[] = ["auto-soft", "auto-hard", "manual"];

/**
 * What to do when the same record ID is observed more than once:
 * - keep_newest: keep the variant with the newest recency signal (default)
 * - keep_oldest: keep the first variant seen
 * - remove: drop the ID entirely
 * - keep_original: prefer the variant without a removal/edit marker
 * - keep_removed: prefer the variant carrying the removal marker
 */
export type DuplicateAction =
  | "keep_newest"
  | "keep_oldest"
  | "remove"
  | "keep_original"
  | "keep_removed";

export const DUPLICATE_ACTIONS: readonly DuplicateAction[] = [
  "keep_newest",
  "keep_oldest",
  "remove",
  "keep_original",
  "keep_removed",
];

export function isPaceMode(value: unknown): value is PaceMode {
  return typeof value === "string" && (PACE_MODES as readonly string[]).includes(value);
}

export function isDuplicateAction(value: unknown): value is DuplicateAction {
  return typeof value === "string" && (DUPLICATE_ACTIONS as readonly string[]).includes(value);
}
