import { describe, it, expect, vi, afterEach } from "vitest";
import { PullRequest, sortByMergedAt } from "../src/recap/pullRequest.js";
import type { Summarize } from "../src/ai/summarizer.js";
import { createPr } from "./helpers/fixtures.js";

describe("PullRequest", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should fall back to the login when there is no display name", () => {
    const pr = createPr({ author: "octo", authorDisplayName: "" });
    expect(pr.authorDisplayName).toBe("octo");
  });

  it("should reject records without a URL", () => {
    expect(() => createPr({ number: 7, url: "" })).toThrow(
      "Pull request #7 has no URL"
    );
  });

  it("should pass description, details and display name to the summarizer", async () => {
    const summarize = vi
      .fn<Summarize>()
      .mockResolvedValue({ status: "ok", text: "Ana fixed login" });
    const pr = createPr({ supplementaryDetails: "WEB-1: Login loops" });

    await pr.generateSummary(summarize);

    expect(summarize).toHaveBeenCalledWith(
      {
        description: "Fixes the login redirect",
        supplementaryDetails: "WEB-1: Login loops",
      },
      "Ana"
    );
  });

  it("should compute the summary only once", async () => {
    const summarize = vi
      .fn<Summarize>()
      .mockResolvedValue({ status: "ok", text: "Ana fixed login" });
    const pr = createPr();

    expect(pr.summary).toBeUndefined();
    expect(await pr.generateSummary(summarize)).toBe("Ana fixed login");
    expect(await pr.generateSummary(summarize)).toBe("Ana fixed login");
    expect(pr.summary).toBe("Ana fixed login");
    expect(summarize).toHaveBeenCalledTimes(1);
  });

  it("should warn and keep no summary when generation fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const summarize = vi
      .fn<Summarize>()
      .mockResolvedValue({ status: "failed", reason: "rate limited" });
    const pr = createPr();

    expect(await pr.generateSummary(summarize)).toBeUndefined();
    expect(await pr.generateSummary(summarize)).toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      "Warning: Failed to generate summary: rate limited"
    );
    expect(summarize).toHaveBeenCalledTimes(1);
  });

  it("should not warn when there was nothing to summarize", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const pr = createPr({ description: "" });

    expect(await pr.generateSummary(async () => ({ status: "skipped" }))).toBeUndefined();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("sortByMergedAt", () => {
  const now = new Date("2026-10-19T12:00:00Z");

  function numbers(prs: PullRequest[]): number[] {
    return prs.map((pr) => pr.number);
  }

  it("should order by merge time ascending", () => {
    const prs = [
      createPr({ number: 1, mergedAt: new Date("2026-10-19T10:00:00Z") }),
      createPr({ number: 2, mergedAt: new Date("2026-10-19T08:00:00Z") }),
      createPr({ number: 3, mergedAt: new Date("2026-10-19T09:00:00Z") }),
    ];
    expect(numbers(sortByMergedAt(prs, now))).toEqual([2, 3, 1]);
  });

  it("should put records without a merge time last", () => {
    const prs = [
      createPr({ number: 1, mergedAt: undefined }),
      createPr({ number: 2, mergedAt: new Date("2026-10-19T11:59:59Z") }),
    ];
    expect(numbers(sortByMergedAt(prs, now))).toEqual([2, 1]);
  });

  it("should break ties by PR number", () => {
    const mergedAt = new Date("2026-10-19T09:00:00Z");
    const prs = [
      createPr({ number: 9, mergedAt }),
      createPr({ number: 4, mergedAt }),
      createPr({ number: 6, mergedAt: undefined }),
      createPr({ number: 5, mergedAt: undefined }),
    ];
    expect(numbers(sortByMergedAt(prs, now))).toEqual([4, 9, 5, 6]);
  });

  it("should not reorder the input array", () => {
    const prs = [
      createPr({ number: 2, mergedAt: new Date("2026-10-19T10:00:00Z") }),
      createPr({ number: 1, mergedAt: new Date("2026-10-19T08:00:00Z") }),
    ];
    sortByMergedAt(prs, now);
    expect(numbers(prs)).toEqual([2, 1]);
  });
});
