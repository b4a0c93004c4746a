import { Response } from "undici";
import { PullRequest } from "../../src/recap/pullRequest.js";
import type { PullRequestFields } from "../../src/recap/pullRequest.js";

export function createPr(overrides: Partial<PullRequestFields> = {}): PullRequest {
  return new PullRequest({
    number: 1,
    title: "[WEB-1] Fix login",
    author: "ana-silva",
    authorDisplayName: "Ana",
    url: "https://github.com/acme/widgets/pull/1",
    mergedAt: new Date("2026-10-19T09:00:00Z"),
    description: "Fixes the login redirect",
    ...overrides,
  });
}

export async function withSummary(pr: PullRequest, text: string): Promise<PullRequest> {
  await pr.generateSummary(async () => ({ status: "ok", text }));
  return pr;
}

export function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });
}
