import { describe, expect, it } from "vitest";
import { ConfigurationError, type PageWindow } from "@archive-sweep/shared";
import { validatePullPushQuery } from "./config";
import { buildPullPushQuery } from "./fetch";
import { pullPushBackend } from "./index";

const window: PageWindow = {
  lower: 1704067199,
  upper: 1704153600,
  size: 100,
  sort: "desc",
  sortType: "created_utc",
};
const order = { sort: "desc", sortType: "created_utc" } as const;

describe("buildPullPushQuery", () => {
  it("maps submission filters and window bounds to wire params", () => {
    const descriptor = buildPullPushQuery(
      {
        mode: "submissions",
        filters: { subreddit: "r/typescript", author: "u/test_user", score: ">10", over18: false },
      },
      window,
    );
    expect(descriptor).toEqual({
      url: "https://api.pullpush.io/reddit/search/submission/",
      params: {
        subreddit: "typescript",
        author: "test_user",
        score: ">10",
        over_18: "false",
        size: "100",
        sort: "desc",
        sort_type: "created_utc",
        after: "1704067199",
        before: "1704153600",
      },
    });
  });

  it("omits unbounded sides of the window", () => {
    const descriptor = buildPullPushQuery(
      { mode: "comments", filters: { q: "hello" } },
      { ...window, lower: null, upper: null, size: 25 },
    );
    expect(descriptor.url).toBe("https://api.pullpush.io/reddit/search/comment/");
    expect(descriptor.params).toEqual({
      q: "hello",
      size: "25",
      sort: "desc",
      sort_type: "created_utc",
    });
  });

  it("turns a comment tree into a link_id comment search", () => {
    const descriptor = buildPullPushQuery(
      { mode: "comment_tree", linkId: "t3_abc123" },
      { ...window, lower: null, upper: null, sort: "asc" },
    );
    expect(descriptor.params).toEqual({
      link_id: "abc123",
      size: "100",
      sort: "asc",
      sort_type: "created_utc",
    });
  });

  it("joins explicit ids", () => {
    const descriptor = buildPullPushQuery(
      { mode: "submissions", filters: { ids: ["t3_aa1", "bb2"] } },
      window,
    );
    expect(descriptor.params.ids).toBe("aa1,bb2");
  });
});

describe("validatePullPushQuery", () => {
  it("accepts supported filters", () => {
    expect(() =>
      validatePullPushQuery(
        { mode: "submissions", filters: { subreddit: "typescript", numComments: "<=5" } },
        order,
      ),
    ).not.toThrow();
  });

  it("rejects filters PullPush has no parameter for", () => {
    expect(() =>
      validatePullPushQuery({ mode: "comments", filters: { parentId: "abc" } }, order),
    ).toThrow(/filter "parentId" is not supported for comments/);
  });

  it("rejects malformed usernames and comparisons", () => {
    expect(() =>
      validatePullPushQuery({ mode: "submissions", filters: { author: "ab" } }, order),
    ).toThrow(ConfigurationError);
    expect(() =>
      validatePullPushQuery({ mode: "submissions", filters: { score: "=>3" } }, order),
    ).toThrow(/invalid score/);
  });

  it("rejects unquoted multi-word search terms", () => {
    expect(() =>
      validatePullPushQuery({ mode: "submissions", filters: { q: "two words" } }, order),
    ).toThrow(/invalid q/);
  });
});

describe("pullPushBackend.paging", () => {
  it("pages id lookups as a single request", () => {
    expect(pullPushBackend.paging({ mode: "submissions", filters: { ids: ["abc"] } })).toBe(
      "single",
    );
    expect(pullPushBackend.paging({ mode: "comment_tree", linkId: "abc" })).toBe("time");
  });
});
