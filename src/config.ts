import dotenv from "dotenv";
import { RecapError } from "./errors.js";

export interface Config {
  githubRepo: string;
  githubToken: string;

  // Summaries are only generated when this is set
  claudeApiKey?: string;
  slackToken?: string;

  timezone: string;
}

export interface ConfigRequirements {
  slack: boolean;
}

const SLACK_TOKEN_VAR = "SLACK_API_TOKEN";

export function loadDotenv(): void {
  dotenv.config();
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new RecapError(
      "config",
      `Error: ${name} environment variable is required`
    );
  }
  return value;
}

export function loadConfig(
  requirements: ConfigRequirements = { slack: false },
  env: NodeJS.ProcessEnv = process.env
): Config {
  const githubRepo = required(env, "GITHUB_REPO");
  const githubToken = required(env, "GITHUB_TOKEN");

  const slackToken = requirements.slack
    ? required(env, SLACK_TOKEN_VAR)
    : env[SLACK_TOKEN_VAR] || undefined;

  const timezone =
    env.TIMEZONE || Intl.DateTimeFormat().resolvedOptions().timeZone;

  return {
    githubRepo,
    githubToken,
    claudeApiKey: env.CLAUDE_API_KEY || undefined,
    slackToken,
    timezone,
  };
}

export function requireSlackToken(config: Config): string {
  return required({ [SLACK_TOKEN_VAR]: config.slackToken }, SLACK_TOKEN_VAR);
}
