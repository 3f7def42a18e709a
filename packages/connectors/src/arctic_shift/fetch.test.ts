import { describe, expect, it } from "vitest";
import type { PageWindow } from "@archive-sweep/shared";
import { validateArcticShiftQuery } from "./config";
import { buildArcticShiftQuery } from "./fetch";
import { arcticShiftBackend } from "./index";

const window: PageWindow = {
  lower: 1704067199,
  upper: null,
  size: 100,
  sort: "asc",
  sortType: "created_utc",
};

describe("buildArcticShiftQuery", () => {
  it("builds a posts search with the full-text term under `query`", () => {
    expect(
      buildArcticShiftQuery(
        { mode: "submissions", filters: { subreddit: "typescript", q: "generics" } },
        window,
      ),
    ).toEqual({
      url: "https://arctic-shift.photon-reddit.com/api/posts/search",
      params: {
        subreddit: "typescript",
        query: "generics",
        limit: "100",
        sort: "asc",
        after: "1704067199",
      },
    });
  });

  it("uses the ids endpoint for explicit ids", () => {
    expect(
      buildArcticShiftQuery({ mode: "comments", filters: { ids: ["t1_k1", "k2"] } }, window),
    ).toEqual({
      url: "https://arctic-shift.photon-reddit.com/api/comments/ids",
      params: { ids: "k1,k2" },
    });
  });

  it("requests the whole tree for a comment tree", () => {
    expect(buildArcticShiftQuery({ mode: "comment_tree", linkId: "t3_abc" }, window)).toEqual({
      url: "https://arctic-shift.photon-reddit.com/api/comments/tree",
      params: { link_id: "abc", limit: "25000" },
    });
  });
});

describe("validateArcticShiftQuery", () => {
  it("rejects score ordering", () => {
    expect(() =>
      validateArcticShiftQuery(
        { mode: "submissions", filters: { subreddit: "typescript" } },
        { sort: "desc", sortType: "score" },
      ),
    ).toThrow("arctic_shift: only created_utc ordering is supported (got score)");
  });

  it("rejects PullPush-only filters", () => {
    expect(() =>
      validateArcticShiftQuery(
        { mode: "submissions", filters: { score: ">5" } },
        { sort: "desc", sortType: "created_utc" },
      ),
    ).toThrow(/filter "score" is not supported/);
  });
});

describe("arcticShiftBackend.paging", () => {
  it("fetches comment trees in one request", () => {
    expect(arcticShiftBackend.paging({ mode: "comment_tree", linkId: "abc" })).toBe("single");
    expect(arcticShiftBackend.paging({ mode: "comments", filters: { author: "test_user" } })).toBe(
      "time",
    );
  });
});
