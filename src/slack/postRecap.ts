import { RecapError } from "../errors.js";
import type { PullRequest } from "../recap/pullRequest.js";
import { DETAILS_HEADER_TEXT, buildThreadBlocks } from "../recap/slackBlocks.js";
import { formatLongDate, rangeLabel } from "../recap/dateUtils.js";
import type { RecapWindow } from "../recap/dateUtils.js";
import { platformErrorCode } from "./client.js";
import type { SlackApi } from "./client.js";

const USERS_PAGE_SIZE = 200;

export function slackErrorMessage(code: string, target: string): string {
  switch (code) {
    case "not_in_channel":
      return `Error: Bot needs to be invited to the channel first. Please invite the bot to ${target} and try again.`;
    case "channel_not_found":
      return `Error: Channel ${target} not found. Please check the channel name and try again.`;
    case "user_not_found":
      return `Error: User ${target} not found. Please check the username and try again.`;
    default:
      return `Error posting to Slack: ${code}`;
  }
}

function toSlackPostError(error: unknown, target: string): RecapError {
  if (error instanceof RecapError) {
    return error;
  }
  const code = platformErrorCode(error);
  if (code) {
    return new RecapError("slack-post", slackErrorMessage(code, target));
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RecapError("slack-post", `Error posting to Slack: ${message}`);
}

async function findUserId(
  slack: SlackApi,
  username: string
): Promise<string | undefined> {
  let cursor: string | undefined;

  do {
    const response = await slack.users.list({ cursor, limit: USERS_PAGE_SIZE });
    const user = response.members?.find((member) => member.name === username);
    if (user?.id) {
      return user.id;
    }
    cursor = response.response_metadata?.next_cursor || undefined;
  } while (cursor);

  return undefined;
}

// `#channel` is used as given; anything else is a username (with or without
// a leading `@`) looked up by exact name and replaced by the user's ID.
export async function resolveSlackTarget(
  slack: SlackApi,
  target: string
): Promise<string> {
  if (target.startsWith("#")) {
    return target;
  }

  const username = target.replace(/^@/, "");
  const userId = await findUserId(slack, username);
  if (!userId) {
    throw new RecapError(
      "slack-target",
      `Error: Could not find Slack user '${target}'`
    );
  }
  return userId;
}

export function buildHeaderText(window: RecapWindow, timezone: string): string {
  const start = formatLongDate(window.start, timezone);
  const end = formatLongDate(window.end, timezone);
  return `${rangeLabel(window.range)} PR Summary: ${start} to ${end}`;
}

// Posts the header message, then the PR details as a reply in its thread.
export async function postRecapToSlack(
  slack: SlackApi,
  target: string,
  prs: PullRequest[],
  window: RecapWindow,
  timezone: string
): Promise<void> {
  try {
    const channel = await resolveSlackTarget(slack, target);

    const header = await slack.chat.postMessage({
      channel,
      text: buildHeaderText(window, timezone),
    });
    if (!header.ts) {
      throw new RecapError(
        "slack-post",
        "Error posting to Slack: header message has no timestamp"
      );
    }

    await slack.chat.postMessage({
      channel,
      thread_ts: header.ts,
      blocks: buildThreadBlocks(prs),
      text: DETAILS_HEADER_TEXT,
      unfurl_links: false,
    });
  } catch (error) {
    throw toSlackPostError(error, target);
  }

  console.log(`\nSummary posted to Slack ${target}`);
}
