import { fetch } from "undici";
import { z } from "zod";
import { GitHubApiError } from "../errors.js";
import {
  issueCommentSchema,
  pullRequestDetailSchema,
  searchIssuesResponseSchema,
  userProfileSchema,
} from "./types.js";
import type {
  IssueComment,
  PullRequestDetail,
  SearchIssueItem,
  UserProfile,
} from "./types.js";

const API_ROOT = "https://api.github.com";
const PER_PAGE = 100;

// The search API never returns more than this many results
const SEARCH_RESULT_CAP = 1000;

async function githubRequest<T>(
  url: string,
  token: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const response = await fetch(url, {
    headers: {
      Accept: "application/vnd.github.v3+json",
      Authorization: `token ${token}`,
      "User-Agent": "pr-recap",
    },
  });

  if (!response.ok) {
    const text = await response.text();
    throw new GitHubApiError(response.status, response.statusText, text);
  }

  return schema.parse(await response.json());
}

async function githubRequestPaginated<T>(
  url: string,
  token: string,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T[]> {
  const allResults: T[] = [];
  const pageSchema = z.array(itemSchema);
  let page = 1;

  while (true) {
    const pageUrl = `${url}${url.includes("?") ? "&" : "?"}page=${page}&per_page=${PER_PAGE}`;
    const results = await githubRequest(pageUrl, token, pageSchema);

    allResults.push(...results);
    page++;

    if (results.length < PER_PAGE) {
      break;
    }
  }

  return allResults;
}

export function buildMergedSearchQuery(repo: string, sinceIso: string): string {
  return `repo:${repo} is:pr is:merged merged:>=${sinceIso}`;
}

export async function searchMergedPullRequests(
  repo: string,
  sinceIso: string,
  token: string
): Promise<SearchIssueItem[]> {
  const query = new URLSearchParams({
    q: buildMergedSearchQuery(repo, sinceIso),
  });
  const items: SearchIssueItem[] = [];
  let page = 1;

  while (true) {
    const url = `${API_ROOT}/search/issues?${query.toString()}&page=${page}&per_page=${PER_PAGE}`;
    const result = await githubRequest(url, token, searchIssuesResponseSchema);

    items.push(...result.items);
    page++;

    if (
      result.items.length < PER_PAGE ||
      items.length >= Math.min(result.total_count, SEARCH_RESULT_CAP)
    ) {
      break;
    }
  }

  return items;
}

export async function getPullRequest(
  repo: string,
  prNumber: number,
  token: string
): Promise<PullRequestDetail> {
  return githubRequest(
    `${API_ROOT}/repos/${repo}/pulls/${prNumber}`,
    token,
    pullRequestDetailSchema
  );
}

export async function getUser(
  login: string,
  token: string
): Promise<UserProfile> {
  return githubRequest(
    `${API_ROOT}/users/${encodeURIComponent(login)}`,
    token,
    userProfileSchema
  );
}

export async function listIssueComments(
  repo: string,
  prNumber: number,
  token: string
): Promise<IssueComment[]> {
  return githubRequestPaginated(
    `${API_ROOT}/repos/${repo}/issues/${prNumber}/comments`,
    token,
    issueCommentSchema
  );
}
