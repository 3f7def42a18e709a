import {
  ConfigurationError,
  type FetchQuery,
  type ResultOrder,
} from "@archive-sweep/shared";

import {
  REDDIT_ID_RE,
  SUBREDDIT_RE,
  USERNAME_RE,
  bareId,
  rejectUnsupported,
  requireIds,
  requireMatch,
  requireNonEmpty,
  stripPrefix,
} from "../validate";

export const ARCTIC_SHIFT_BASE_URL = "https://arctic-shift.photon-reddit.com/api";
export const ARCTIC_SHIFT_MAX_PAGE_SIZE = 100;
export const ARCTIC_SHIFT_TREE_LIMIT = 25_000;
// Arctic Shift intermittently answers valid requests with 422
export const ARCTIC_SHIFT_TRANSIENT_STATUSES: readonly number[] = [422];

const NAME = "arctic_shift";

const SUBMISSION_FILTERS = [
  "q",
  "ids",
  "author",
  "subreddit",
  "title",
  "selftext",
  "url",
  "linkFlairText",
  "over18",
  "spoiler",
] as const;

const COMMENT_FILTERS = ["ids", "author", "subreddit", "body", "linkId", "parentId"] as const;

export function validateArcticShiftQuery(query: FetchQuery, order: ResultOrder): void {
  if (query.mode !== "comment_tree" && order.sortType !== "created_utc") {
    throw new ConfigurationError(
      `${NAME}: only created_utc ordering is supported (got ${order.sortType})`,
    );
  }

  switch (query.mode) {
    case "submissions": {
      const f = query.filters;
      rejectUnsupported(NAME, query.mode, f, SUBMISSION_FILTERS);
      requireNonEmpty(NAME, "q", f.q);
      requireIds(NAME, f.ids);
      requireMatch(NAME, "author", f.author && stripPrefix(f.author, "u/"), USERNAME_RE);
      requireMatch(NAME, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"), SUBREDDIT_RE);
      requireNonEmpty(NAME, "title", f.title);
      requireNonEmpty(NAME, "selftext", f.selftext);
      requireNonEmpty(NAME, "url", f.url);
      requireNonEmpty(NAME, "linkFlairText", f.linkFlairText);
      return;
    }
    case "comments": {
      const f = query.filters;
      rejectUnsupported(NAME, query.mode, f, COMMENT_FILTERS);
      requireIds(NAME, f.ids);
      requireMatch(NAME, "author", f.author && stripPrefix(f.author, "u/"), USERNAME_RE);
      requireMatch(NAME, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"), SUBREDDIT_RE);
      requireNonEmpty(NAME, "body", f.body);
      requireMatch(NAME, "linkId", f.linkId && bareId(f.linkId), REDDIT_ID_RE);
      requireMatch(NAME, "parentId", f.parentId && bareId(f.parentId), REDDIT_ID_RE);
      return;
    }
    case "comment_tree":
      if (!REDDIT_ID_RE.test(bareId(query.linkId))) {
        throw new ConfigurationError(`${NAME}: invalid link id "${query.linkId}"`);
      }
      return;
  }
}
