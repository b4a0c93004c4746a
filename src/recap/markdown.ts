import type { PullRequest } from "./pullRequest.js";
import { cleanTitle } from "./title.js";

// Brackets in link text would end the link early
export function escapeLinkText(text: string): string {
  return text.replace(/[[\]]/g, "\\$&");
}

export function renderMarkdownEntry(pr: PullRequest): string {
  const lines = [`[${escapeLinkText(cleanTitle(pr.title))}](${pr.url})`];
  if (pr.summary) {
    lines.push(pr.summary);
  }
  return lines.join("\n");
}

export function renderMarkdown(prs: PullRequest[]): string {
  return prs.map(renderMarkdownEntry).join("\n\n");
}
