import { describe, expect, it } from "vitest";
import { isEdited, isRemoved, originalRank, recencyOf } from "./classify";

const intactPost = { id: "p1", author: "test_user", title: "hello", selftext: "text" };
const intactComment = { id: "c1", author: "test_user", body: "a reply" };

describe("isRemoved", () => {
  it("treats intact posts and comments as present", () => {
    expect(isRemoved(intactPost)).toBe(false);
    expect(isRemoved(intactComment)).toBe(false);
  });

  it("flags moderation fields", () => {
    expect(isRemoved({ ...intactPost, removed_by_category: "moderator" })).toBe(true);
    expect(isRemoved({ ...intactComment, removal_reason: "spam" })).toBe(true);
  });

  it("flags missing and bracketed authors", () => {
    expect(isRemoved({ id: "c2", body: "text" })).toBe(true);
    expect(isRemoved({ ...intactComment, author: "[deleted]" })).toBe(true);
  });

  it("flags bracketed text markers", () => {
    expect(isRemoved({ ...intactComment, body: "[removed]" })).toBe(true);
    expect(isRemoved({ ...intactPost, selftext: "[Deleted By User]" })).toBe(true);
  });

  it("ignores brackets that are not removal markers", () => {
    expect(isRemoved({ ...intactComment, body: "[meta] discussion thread" })).toBe(false);
    expect(isRemoved({ ...intactComment, body: `[removed] ${"x".repeat(120)}` })).toBe(false);
  });

  it("flags comments with an empty body but not link posts with an empty selftext", () => {
    expect(isRemoved({ ...intactComment, body: "" })).toBe(true);
    expect(isRemoved({ ...intactPost, selftext: "" })).toBe(false);
  });

  it("trusts an explicit removed or deleted flag over the markers", () => {
    expect(isRemoved({ id: "x", removed: false, created_utc: 5 })).toBe(false);
    expect(isRemoved({ ...intactComment, author: "[deleted]", deleted: false })).toBe(false);
    expect(isRemoved({ ...intactComment, removed: true })).toBe(true);
    expect(isRemoved({ ...intactComment, removed: false, deleted: true })).toBe(true);
  });
});

describe("isEdited", () => {
  it("reads epoch and boolean markers", () => {
    expect(isEdited({ id: "a", edited: false })).toBe(false);
    expect(isEdited({ id: "a", edited: 1704067200 })).toBe(true);
    expect(isEdited({ id: "a", edited: true })).toBe(true);
    expect(isEdited({ id: "a" })).toBe(false);
    expect(isEdited({ id: "a", edited_at: 100 })).toBe(true);
  });
});

describe("recencyOf", () => {
  it("takes the largest recency field", () => {
    expect(recencyOf({ id: "a", edited: 100, retrieved_on: 300, updated_utc: 200 })).toBe(300);
  });

  it("is -Infinity without any signal", () => {
    expect(recencyOf({ id: "a", edited: false })).toBe(Number.NEGATIVE_INFINITY);
  });
});

describe("originalRank", () => {
  it("orders intact unedited over edited over removed", () => {
    expect(originalRank(intactPost)).toBe(2);
    expect(originalRank({ ...intactPost, edited: 5 })).toBe(1);
    expect(originalRank({ ...intactPost, selftext: "[removed]" })).toBe(0);
  });
});
