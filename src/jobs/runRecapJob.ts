import { parseOptions, resolveOutputPath } from "../cli/options.js";
import type { CliOptions } from "../cli/options.js";
import { loadConfig, requireSlackToken } from "../config.js";
import { GitHubApiError, RecapError } from "../errors.js";
import type { RecapResult } from "../errors.js";
import { createSummarizer } from "../ai/summarizer.js";
import type { Summarize } from "../ai/summarizer.js";
import { fetchRecentPrs } from "../github/fetchRecentPrs.js";
import { computeWindow } from "../recap/dateUtils.js";
import { renderMarkdown, renderMarkdownEntry } from "../recap/markdown.js";
import { writeRecapFile } from "../recap/persist.js";
import type { PullRequest } from "../recap/pullRequest.js";
import { renderRtf } from "../recap/rtf.js";
import { createSlackClient } from "../slack/client.js";
import type { SlackApi } from "../slack/client.js";
import { postRecapToSlack } from "../slack/postRecap.js";

export interface JobDependencies {
  env: NodeJS.ProcessEnv;
  now: () => Date;
  createSummarizer: (apiKey: string) => Summarize;
  createSlackClient: (token: string) => SlackApi;
}

const defaultDependencies: JobDependencies = {
  env: process.env,
  now: () => new Date(),
  createSummarizer,
  createSlackClient,
};

async function summarizeAndPrint(
  prs: PullRequest[],
  options: CliOptions,
  summarize: Summarize | undefined
): Promise<void> {
  for (const pr of prs) {
    if (summarize) {
      await pr.generateSummary(summarize);
    }
    if (options.format !== "rtf") {
      console.log(renderMarkdownEntry(pr));
      console.log("");
    }
  }
}

async function writeOutput(
  prs: PullRequest[],
  options: CliOptions,
  outputPath: string | undefined
): Promise<void> {
  if (outputPath) {
    const content =
      options.format === "rtf" ? renderRtf(prs) : renderMarkdown(prs);
    await writeRecapFile(outputPath, content);
  } else if (options.format === "rtf") {
    process.stdout.write(renderRtf(prs));
  }
}

async function recap(args: string[], deps: JobDependencies): Promise<void> {
  const options = parseOptions(args);
  if (!options) {
    return;
  }

  const config = loadConfig({ slack: Boolean(options.slackTarget) }, deps.env);
  const now = deps.now();
  const outputPath = resolveOutputPath(options, now, config.timezone);

  const prs = await fetchRecentPrs(
    config.githubRepo,
    options.range,
    config.githubToken,
    now
  );

  const summarize = config.claudeApiKey
    ? deps.createSummarizer(config.claudeApiKey)
    : undefined;
  await summarizeAndPrint(prs, options, summarize);

  await writeOutput(prs, options, outputPath);

  if (options.slackTarget) {
    const slack = deps.createSlackClient(requireSlackToken(config));
    await postRecapToSlack(
      slack,
      options.slackTarget,
      prs,
      computeWindow(options.range, now),
      config.timezone
    );
  }
}

// One full recap run. Every failure comes back as a failed result.
export async function runRecapJob(
  args: string[],
  overrides: Partial<JobDependencies> = {}
): Promise<RecapResult> {
  try {
    await recap(args, { ...defaultDependencies, ...overrides });
    return { ok: true };
  } catch (error) {
    if (error instanceof RecapError) {
      return { ok: false, error };
    }
    if (error instanceof GitHubApiError) {
      return { ok: false, error: new RecapError("github", `Error: ${error.message}`) };
    }
    // Malformed payloads (ZodError) and transport failures end here
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new RecapError("unexpected", `Error: ${message}`) };
  }
}
