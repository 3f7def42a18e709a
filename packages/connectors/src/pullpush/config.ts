import {
  ConfigurationError,
  type FetchQuery,
  type ResultOrder,
} from "@archive-sweep/shared";

import {
  COMPARISON_RE,
  REDDIT_ID_RE,
  SEARCH_TERM_RE,
  SUBREDDIT_RE,
  USERNAME_RE,
  bareId,
  rejectUnsupported,
  requireIds,
  requireMatch,
  requireNonEmpty,
  stripPrefix,
} from "../validate";

export const PULLPUSH_BASE_URL = "https://api.pullpush.io/reddit/search";
export const PULLPUSH_MAX_PAGE_SIZE = 100;

const NAME = "pullpush";

const SUBMISSION_FILTERS = [
  "q",
  "ids",
  "author",
  "subreddit",
  "title",
  "selftext",
  "score",
  "numComments",
  "over18",
  "isVideo",
  "locked",
  "stickied",
  "spoiler",
  "contestMode",
] as const;

const COMMENT_FILTERS = ["q", "ids", "author", "subreddit", "linkId"] as const;

export function validatePullPushQuery(query: FetchQuery, _order: ResultOrder): void {
  switch (query.mode) {
    case "submissions": {
      const f = query.filters;
      rejectUnsupported(NAME, query.mode, f, SUBMISSION_FILTERS);
      requireMatch(NAME, "q", f.q, SEARCH_TERM_RE);
      requireIds(NAME, f.ids);
      requireMatch(NAME, "author", f.author && stripPrefix(f.author, "u/"), USERNAME_RE);
      requireMatch(NAME, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"), SUBREDDIT_RE);
      requireNonEmpty(NAME, "title", f.title);
      requireNonEmpty(NAME, "selftext", f.selftext);
      requireMatch(NAME, "score", f.score, COMPARISON_RE);
      requireMatch(NAME, "numComments", f.numComments, COMPARISON_RE);
      return;
    }
    case "comments": {
      const f = query.filters;
      rejectUnsupported(NAME, query.mode, f, COMMENT_FILTERS);
      requireMatch(NAME, "q", f.q, SEARCH_TERM_RE);
      requireIds(NAME, f.ids);
      requireMatch(NAME, "author", f.author && stripPrefix(f.author, "u/"), USERNAME_RE);
      requireMatch(NAME, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"), SUBREDDIT_RE);
      requireMatch(NAME, "linkId", f.linkId && bareId(f.linkId), REDDIT_ID_RE);
      return;
    }
    case "comment_tree":
      if (!REDDIT_ID_RE.test(bareId(query.linkId))) {
        throw new ConfigurationError(`${NAME}: invalid link id "${query.linkId}"`);
      }
      return;
  }
}
