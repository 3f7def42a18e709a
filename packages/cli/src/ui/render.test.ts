import { describe, expect, it } from "vitest";
import type { ResultSet } from "@archive-sweep/shared";
import { formatBoundary, formatSummary } from "./render";

describe("formatSummary", () => {
  it("reports the count, timing and output path", () => {
    const result: ResultSet = new Map([
      ["a", { id: "a", comments: [{ id: "c1" }, { id: "c2" }] }],
      ["b", { id: "b", comments: [{ id: "c3" }] }],
    ]);
    expect(
      formatSummary({
        result,
        mode: "submissions",
        backend: "pullpush",
        elapsedMs: 1234,
        withComments: true,
        savedTo: "/data/out.json",
      }),
    ).toBe("2 submissions from pullpush in 1.2s (3 comments) -> /data/out.json");
  });

  it("omits what was not requested", () => {
    expect(
      formatSummary({ result: new Map(), mode: "comments", backend: "arctic_shift", elapsedMs: 0 }),
    ).toBe("0 comments from arctic_shift in 0.0s");
  });
});

describe("formatBoundary", () => {
  it("prints the slice and the cursor position as UTC times", () => {
    expect(
      formatBoundary({
        streamId: 1,
        after: 1_704_067_200,
        before: 1_704_153_600,
        lower: 1_704_067_199,
        upper: 1_704_100_000,
        pages: 3,
      }),
    ).toBe(
      "stream 1: slice [2024-01-01T00:00:00.000Z, 2024-01-02T00:00:00.000Z) " +
        "stopped after 3 pages between 2023-12-31T23:59:59.000Z and 2024-01-01T09:06:40.000Z",
    );
  });

  it("names the link of a comment sub-fetch and open bounds", () => {
    expect(
      formatBoundary({
        streamId: 0,
        after: null,
        before: null,
        lower: null,
        upper: null,
        pages: 0,
        linkId: "abc",
      }),
    ).toBe("stream 0 (link abc): slice [open, open) stopped after 0 pages between open and open");
  });
});
