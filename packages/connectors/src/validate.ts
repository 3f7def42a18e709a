import { ConfigurationError } from "@archive-sweep/shared";

export const REDDIT_ID_RE = /^[0-9a-zA-Z]+$/;
export const USERNAME_RE = /^[A-Za-z0-9_-]{3,20}$/;
export const SUBREDDIT_RE = /^[A-Za-z0-9][A-Za-z0-9_]{1,20}$/;
/** PullPush numeric comparisons: "10", ">10", "<=3". */
export const COMPARISON_RE = /^(?:\d+|>=\d+|<=\d+|>\d+|<\d+)$/;
/** No spaces unless inside a quoted phrase. */
export const SEARCH_TERM_RE = /^(?:"[^"]*"|[^\s"]+)$/;

const ID_PREFIX_RE = /^t[1-6]_/;

export function stripPrefix(value: string, prefix: "u/" | "r/"): string {
  return value.slice(0, 2).toLowerCase() === prefix ? value.slice(2) : value;
}

/** Drop a `t1_`/`t3_` fullname prefix. */
export function bareId(value: string): string {
  return value.replace(ID_PREFIX_RE, "");
}

export function requireMatch(
  backend: string,
  field: string,
  value: string | undefined,
  pattern: RegExp,
): void {
  if (value === undefined) return;
  if (!pattern.test(value)) {
    throw new ConfigurationError(`${backend}: invalid ${field} "${value}"`);
  }
}

export function requireNonEmpty(backend: string, field: string, value: string | undefined): void {
  if (value !== undefined && value.trim().length === 0) {
    throw new ConfigurationError(`${backend}: ${field} must be non-empty`);
  }
}

export function requireIds(backend: string, ids: string[] | undefined): void {
  if (ids === undefined) return;
  if (ids.length === 0) throw new ConfigurationError(`${backend}: ids must be non-empty`);
  for (const id of ids) requireMatch(backend, "id", bareId(id), REDDIT_ID_RE);
}

/** Reject filters that are set but that the backend has no parameter for. */
export function rejectUnsupported(
  backend: string,
  mode: string,
  filters: object,
  supported: readonly string[],
): void {
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    if (!supported.includes(key)) {
      throw new ConfigurationError(`${backend}: filter "${key}" is not supported for ${mode}`);
    }
  }
}
