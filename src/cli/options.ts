import { Command, CommanderError, Option } from "commander";
import { RecapError } from "../errors.js";
import { formatDateStamp } from "../recap/dateUtils.js";
import type { RecapRange } from "../recap/dateUtils.js";

export type RecapFormat = "markdown" | "rtf";

export interface CliOptions {
  format: RecapFormat;
  range: RecapRange;
  // `true` when `--output` was given without a file
  output?: string | true;
  slackTarget?: string;
}

type RawOptions = {
  format: RecapFormat;
  range: RecapRange;
  output?: string | boolean;
  slackUser?: string;
};

function buildProgram(): Command {
  return new Command()
    .name("recap")
    .description("Summarize pull requests merged in the last day or week")
    .addOption(
      new Option("-f, --format <format>", "output format")
        .choices(["markdown", "rtf"])
        .default("markdown")
    )
    .option(
      "-o, --output [file]",
      "write to a file (default: ./recaps/YYYY-MM-DD.{md,rtf})"
    )
    .option(
      "--slack-user <target>",
      "send the summary to a Slack user (@username) or channel (#channel)"
    )
    .addOption(
      new Option("-r, --range <range>", "time range for the summary")
        .choices(["daily", "weekly"])
        .default("daily")
    )
    .helpOption("-h, --help", "show this help message")
    .exitOverride()
    .configureOutput({
      // Usage errors are reported by the caller
      writeErr: () => undefined,
    });
}

// Returns `undefined` when help was printed.
export function parseOptions(args: string[]): CliOptions | undefined {
  const program = buildProgram();

  try {
    program.parse(args, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        return undefined;
      }
      throw new RecapError("usage", error.message, error.exitCode);
    }
    throw error;
  }

  const raw = program.opts<RawOptions>();
  let output: string | true | undefined;
  if (typeof raw.output === "string") {
    output = raw.output;
  } else if (raw.output) {
    output = true;
  }

  return {
    format: raw.format,
    range: raw.range,
    output,
    slackTarget: raw.slackUser,
  };
}

export function defaultOutputPath(
  format: RecapFormat,
  now: Date,
  timezone: string
): string {
  const ext = format === "rtf" ? "rtf" : "md";
  return `recaps/${formatDateStamp(now, timezone)}.${ext}`;
}

export function resolveOutputPath(
  options: CliOptions,
  now: Date,
  timezone: string
): string | undefined {
  if (options.output === true) {
    return defaultOutputPath(options.format, now, timezone);
  }
  return options.output;
}
