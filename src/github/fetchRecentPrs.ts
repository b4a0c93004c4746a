import { GitHubApiError, RecapError } from "../errors.js";
import { PullRequest, sortByMergedAt } from "../recap/pullRequest.js";
import { computeWindow, formatSearchTimestamp } from "../recap/dateUtils.js";
import type { RecapRange } from "../recap/dateUtils.js";
import {
  getPullRequest,
  getUser,
  listIssueComments,
  searchMergedPullRequests,
} from "./client.js";
import type { GitHubUserRef, SearchIssueItem } from "./types.js";

// Project-management integration whose comment carries ticket details
export const LINEAR_BOT_LOGIN = "linear[bot]";

function isBot(user: GitHubUserRef | null): boolean {
  return user?.type === "Bot";
}

// First-name heuristic: everything before the first space
export function firstName(name: string): string {
  return name.trim().split(/\s+/)[0];
}

export async function resolveAuthorDisplayName(
  user: GitHubUserRef,
  token: string
): Promise<string> {
  if (isBot(user)) {
    return user.login;
  }
  const profile = await getUser(user.login, token);
  const name = profile.name?.trim() || profile.login;
  return firstName(name);
}

export async function fetchSupplementaryDetails(
  repo: string,
  prNumber: number,
  token: string
): Promise<string | undefined> {
  const comments = await listIssueComments(repo, prNumber, token);
  const linearComment = comments.find(
    (comment) => comment.user?.login === LINEAR_BOT_LOGIN && isBot(comment.user)
  );
  return linearComment?.body ?? undefined;
}

async function buildPullRequest(
  repo: string,
  item: SearchIssueItem,
  token: string
): Promise<PullRequest> {
  const detail = await getPullRequest(repo, item.number, token);
  const supplementaryDetails = await fetchSupplementaryDetails(
    repo,
    item.number,
    token
  );
  const authorDisplayName = await resolveAuthorDisplayName(item.user, token);

  return new PullRequest({
    number: item.number,
    title: item.title,
    author: item.user.login,
    authorDisplayName,
    url: item.html_url,
    mergedAt: item.closed_at ? new Date(item.closed_at) : undefined,
    description: detail.body ?? "",
    supplementaryDetails,
  });
}

async function searchOrFail(
  repo: string,
  sinceIso: string,
  token: string
): Promise<SearchIssueItem[]> {
  try {
    return await searchMergedPullRequests(repo, sinceIso, token);
  } catch (error) {
    if (error instanceof GitHubApiError) {
      if (error.status === 401) {
        throw new RecapError("github-auth", "Error: Invalid GitHub token");
      }
      if (error.status === 404 || error.status === 422) {
        throw new RecapError(
          "github-not-found",
          "Error: Repository not found or no access"
        );
      }
    }
    throw error;
  }
}

// Merged PRs of `repo` inside the lookback window, enriched one at a time
// and ordered by merge time.
export async function fetchRecentPrs(
  repo: string,
  range: RecapRange,
  token: string,
  now: Date = new Date()
): Promise<PullRequest[]> {
  const window = computeWindow(range, now);
  const since = formatSearchTimestamp(window.start);

  console.error(`Fetching PRs for ${repo} merged since ${since}`);

  const items = await searchOrFail(repo, since, token);

  console.error(`Found ${items.length} merged PRs for ${repo}`);

  const prs: PullRequest[] = [];
  for (const item of items) {
    prs.push(await buildPullRequest(repo, item, token));
  }

  return sortByMergedAt(prs, now);
}
