import { fetch } from "undici";
import { z } from "zod";

const MESSAGES_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";

export const SUMMARY_MODEL = "claude-3-haiku-20240307";
export const SUMMARY_MAX_TOKENS = 200;

export type SummaryResult =
  | { status: "ok"; text: string }
  | { status: "failed"; reason: string }
  | { status: "skipped" };

export interface SummaryInput {
  description?: string;
  supplementaryDetails?: string;
}

export type Summarize = (
  input: SummaryInput,
  author: string
) => Promise<SummaryResult>;

const messagesResponseSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .min(1),
});

export function buildSystemPrompt(author: string): string {
  return `You are an expert at summarizing technical pull requests. Create a single bullet point that starts with the author's name and describes what they did. Be concise but specific. Format as '${author} fixed/added/updated/etc...'`;
}

// Joins the non-empty parts of a PR into the text sent for summarizing.
// Returns an empty string when there is nothing to summarize.
export function buildSummaryText(input: SummaryInput): string {
  const parts: string[] = [];
  if (input.description) {
    parts.push(`PR Description:\n${input.description}`);
  }
  if (input.supplementaryDetails) {
    parts.push(`Linear Details:\n${input.supplementaryDetails}`);
  }
  return parts.join("\n\n");
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createSummarizer(apiKey: string): Summarize {
  return async (input, author) => {
    const text = buildSummaryText(input);
    if (!text) {
      return { status: "skipped" };
    }

    try {
      const response = await fetch(MESSAGES_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: JSON.stringify({
          model: SUMMARY_MODEL,
          system: buildSystemPrompt(author),
          max_tokens: SUMMARY_MAX_TOKENS,
          messages: [
            {
              role: "user",
              content: `Summarize this pull request information into a single bullet point that starts with '${author}' and describes what they did:\n\n${text}`,
            },
          ],
        }),
      });

      if (!response.ok) {
        return {
          status: "failed",
          reason: `Anthropic API error: ${response.status} ${response.statusText}`,
        };
      }

      const parsed = messagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { status: "failed", reason: "Malformed completion response" };
      }

      const summary = parsed.data.content[0].text?.trim();
      if (!summary) {
        return { status: "failed", reason: "Completion contained no text" };
      }

      return { status: "ok", text: summary };
    } catch (error) {
      return { status: "failed", reason: describeFailure(error) };
    }
  };
}
