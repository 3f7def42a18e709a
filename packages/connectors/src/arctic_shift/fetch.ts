import type {
  ArchiveResponse,
  FetchQuery,
  PageWindow,
  QueryDescriptor,
  SendOptions,
} from "@archive-sweep/shared";

import { sendJson } from "../http";
import { bareId, stripPrefix } from "../validate";
import {
  ARCTIC_SHIFT_BASE_URL,
  ARCTIC_SHIFT_MAX_PAGE_SIZE,
  ARCTIC_SHIFT_TRANSIENT_STATUSES,
  ARCTIC_SHIFT_TREE_LIMIT,
} from "./config";

type Params = Record<string, string>;

function setString(params: Params, key: string, value: string | undefined): void {
  if (value !== undefined) params[key] = value;
}

function setBool(params: Params, key: string, value: boolean | undefined): void {
  if (value !== undefined) params[key] = value ? "true" : "false";
}

function setWindow(params: Params, window: PageWindow): void {
  params.limit = String(Math.max(1, Math.min(ARCTIC_SHIFT_MAX_PAGE_SIZE, window.size)));
  params.sort = window.sort;
  if (window.lower !== null) params.after = String(window.lower);
  if (window.upper !== null) params.before = String(window.upper);
}

export function buildArcticShiftQuery(query: FetchQuery, window: PageWindow): QueryDescriptor {
  const params: Params = {};

  switch (query.mode) {
    case "submissions": {
      const f = query.filters;
      if (f.ids !== undefined) {
        params.ids = f.ids.map(bareId).join(",");
        return { url: `${ARCTIC_SHIFT_BASE_URL}/posts/ids`, params };
      }
      setString(params, "author", f.author && stripPrefix(f.author, "u/"));
      setString(params, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"));
      setString(params, "title", f.title);
      setString(params, "selftext", f.selftext);
      setString(params, "query", f.q);
      setString(params, "url", f.url);
      setString(params, "link_flair_text", f.linkFlairText);
      setBool(params, "over_18", f.over18);
      setBool(params, "spoiler", f.spoiler);
      setWindow(params, window);
      return { url: `${ARCTIC_SHIFT_BASE_URL}/posts/search`, params };
    }
    case "comments": {
      const f = query.filters;
      if (f.ids !== undefined) {
        params.ids = f.ids.map(bareId).join(",");
        return { url: `${ARCTIC_SHIFT_BASE_URL}/comments/ids`, params };
      }
      setString(params, "author", f.author && stripPrefix(f.author, "u/"));
      setString(params, "subreddit", f.subreddit && stripPrefix(f.subreddit, "r/"));
      setString(params, "body", f.body);
      setString(params, "link_id", f.linkId && bareId(f.linkId));
      setString(params, "parent_id", f.parentId && bareId(f.parentId));
      setWindow(params, window);
      return { url: `${ARCTIC_SHIFT_BASE_URL}/comments/search`, params };
    }
    case "comment_tree":
      params.link_id = bareId(query.linkId);
      params.limit = String(ARCTIC_SHIFT_TREE_LIMIT);
      return { url: `${ARCTIC_SHIFT_BASE_URL}/comments/tree`, params };
  }
}

export function sendArcticShift(
  descriptor: QueryDescriptor,
  options: SendOptions,
): Promise<ArchiveResponse> {
  return sendJson(descriptor, {
    ...options,
    userAgent: "archive-sweep/0.x (connectors/arctic_shift)",
    transientStatuses: ARCTIC_SHIFT_TRANSIENT_STATUSES,
  });
}
