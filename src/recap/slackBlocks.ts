import type { HeaderBlock, KnownBlock, SectionBlock } from "@slack/web-api";
import type { PullRequest } from "./pullRequest.js";
import { cleanTitle } from "./title.js";

export const DETAILS_HEADER_TEXT = "PR Details";

// Slack rejects messages with more blocks than this
export const MAX_MESSAGE_BLOCKS = 50;

// &, < and > are control characters in mrkdwn
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function section(text: string): SectionBlock {
  return {
    type: "section",
    text: {
      type: "mrkdwn",
      text,
    },
  };
}

export function toSlackBlock(pr: PullRequest): SectionBlock {
  let text = `• <${pr.url}|${escapeMrkdwn(cleanTitle(pr.title))}>`;
  if (pr.summary) {
    text += `\n${escapeMrkdwn(pr.summary)}`;
  }
  return section(text);
}

function detailsHeader(): HeaderBlock {
  return {
    type: "header",
    text: {
      type: "plain_text",
      text: DETAILS_HEADER_TEXT,
      emoji: true,
    },
  };
}

export function buildThreadBlocks(prs: PullRequest[]): KnownBlock[] {
  const header = detailsHeader();
  if (prs.length + 1 <= MAX_MESSAGE_BLOCKS) {
    return [header, ...prs.map(toSlackBlock)];
  }

  // Header and the overflow line take two of the slots
  const shown = prs.slice(0, MAX_MESSAGE_BLOCKS - 2);
  const hidden = prs.length - shown.length;
  return [
    header,
    ...shown.map(toSlackBlock),
    section(`…and ${hidden} more`),
  ];
}
