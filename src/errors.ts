export type RecapErrorKind =
  | "config"
  | "usage"
  | "github-auth"
  | "github-not-found"
  | "github"
  | "slack-target"
  | "slack-post"
  | "unexpected";

// A condition that ends the run. The message is what the operator sees,
// already phrased as guidance.
export class RecapError extends Error {
  readonly kind: RecapErrorKind;
  readonly exitCode: number;

  constructor(kind: RecapErrorKind, message: string, exitCode = 1) {
    super(message);
    this.name = "RecapError";
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

function describeGitHubFailure(
  status: number,
  statusText: string,
  body: string
): string {
  const summary = `GitHub API error: ${status} ${statusText}`;
  return body ? `${summary}\n${body}` : summary;
}

export class GitHubApiError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string, body: string) {
    super(describeGitHubFailure(status, statusText, body));
    this.name = "GitHubApiError";
    this.status = status;
  }
}

export type RecapResult = { ok: true } | { ok: false; error: RecapError };
