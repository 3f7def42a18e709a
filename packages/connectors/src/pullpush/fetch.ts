import type {
  ArchiveResponse,
  FetchQuery,
  PageWindow,
  QueryDescriptor,
  SendOptions,
} from "@archive-sweep/shared";

import { sendJson } from "../http";
import { bareId, stripPrefix } from "../validate";
import { PULLPUSH_BASE_URL, PULLPUSH_MAX_PAGE_SIZE } from "./config";

type Params = Record<string, string>;

function setString(params: Params, key: string, value: string | undefined): void {
  if (value !== undefined) params[key] = value;
}

function setBool(params: Params, key: string, value: boolean | undefined): void {
  if (value !== undefined) params[key] = value ? "true" : "false";
}

function setWindow(params: Params, window: PageWindow): void {
  params.size = String(Math.max(1, Math.min(PULLPUSH_MAX_PAGE_SIZE, window.size)));
  params.sort = window.sort;
  params.sort_type = window.sortType;
  if (window.lower !== null) params.after = String(window.lower);
  if (window.upper !== null) params.before = String(window.upper);
}

/**
 * PullPush search URL for one page. The window bounds are exclusive, which is
 * how PullPush reads `after`/`before`.
 */
export function buildPullPushQuery(query: FetchQuery, window: PageWindow): QueryDescriptor {
  const params: Params = {};

  switch (query.mode) {
    case "submissions": {
      const f = query.filters;
      setString(params, "q", f.q);
      setString(params, "ids", f.ids?.map(bareId).join(","));
      setString(params, "author", f.author && stripPrefix(f.author, "u/"));
      setString(params, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"));
      setString(params, "title", f.title);
      setString(params, "selftext", f.selftext);
      setString(params, "score", f.score);
      setString(params, "num_comments", f.numComments);
      setBool(params, "over_18", f.over18);
      setBool(params, "is_video", f.isVideo);
      setBool(params, "locked", f.locked);
      setBool(params, "stickied", f.stickied);
      setBool(params, "spoiler", f.spoiler);
      setBool(params, "contest_mode", f.contestMode);
      setWindow(params, window);
      return { url: `${PULLPUSH_BASE_URL}/submission/`, params };
    }
    case "comments": {
      const f = query.filters;
      setString(params, "q", f.q);
      setString(params, "ids", f.ids?.map(bareId).join(","));
      setString(params, "author", f.author && stripPrefix(f.author, "u/"));
      setString(params, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"));
      setString(params, "link_id", f.linkId && bareId(f.linkId));
      setWindow(params, window);
      return { url: `${PULLPUSH_BASE_URL}/comment/`, params };
    }
    case "comment_tree":
      params.link_id = bareId(query.linkId);
      setWindow(params, window);
      return { url: `${PULLPUSH_BASE_URL}/comment/`, params };
  }
}

export function sendPullPush(
  descriptor: QueryDescriptor,
  options: SendOptions,
): Promise<ArchiveResponse> {
  return sendJson(descriptor, {
    ...options,
    userAgent: "archive-sweep/0.x (connectors/pullpush)",
  });
}
