import { ErrorCode, WebClient } from "@slack/web-api";
import type {
  ChatPostMessageArguments,
  ChatPostMessageResponse,
  UsersListArguments,
  UsersListResponse,
} from "@slack/web-api";

// The slice of the Slack Web API a recap needs.
export interface SlackApi {
  users: {
    list(args: UsersListArguments): Promise<UsersListResponse>;
  };
  chat: {
    postMessage(args: ChatPostMessageArguments): Promise<ChatPostMessageResponse>;
  };
}

export function createSlackClient(token: string): SlackApi {
  return new WebClient(token);
}

// The Slack error code (e.g. `not_in_channel`) carried by a platform error
// thrown from the Web API client, if `error` is one.
export function platformErrorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    error.code === ErrorCode.PlatformError &&
    "data" in error &&
    typeof error.data === "object" &&
    error.data !== null &&
    "error" in error.data &&
    typeof error.data.error === "string"
  ) {
    return error.data.error;
  }
  return undefined;
}
