import type { Summarize } from "../ai/summarizer.js";

export interface PullRequestFields {
  number: number;
  title: string;
  author: string;
  authorDisplayName: string;
  url: string;
  mergedAt?: Date;
  description: string;
  supplementaryDetails?: string;
}

type SummaryState = { computed: false } | { computed: true; value?: string };

// A merged pull request as it appears in a recap. Fields are fixed at
// construction; the summary is filled in at most once.
export class PullRequest {
  readonly number: number;
  readonly title: string;
  readonly author: string;
  readonly authorDisplayName: string;
  readonly url: string;
  readonly mergedAt?: Date;
  readonly description: string;
  readonly supplementaryDetails?: string;

  private summaryState: SummaryState = { computed: false };

  constructor(fields: PullRequestFields) {
    if (!fields.url) {
      throw new Error(`Pull request #${fields.number} has no URL`);
    }
    this.number = fields.number;
    this.title = fields.title;
    this.author = fields.author;
    this.authorDisplayName = fields.authorDisplayName || fields.author;
    this.url = fields.url;
    this.mergedAt = fields.mergedAt;
    this.description = fields.description;
    this.supplementaryDetails = fields.supplementaryDetails;
  }

  get summary(): string | undefined {
    return this.summaryState.computed ? this.summaryState.value : undefined;
  }

  // Runs the summarizer the first time it is called; later calls return the
  // stored outcome, including "no summary".
  async generateSummary(summarize: Summarize): Promise<string | undefined> {
    if (this.summaryState.computed) {
      return this.summaryState.value;
    }

    const result = await summarize(
      {
        description: this.description,
        supplementaryDetails: this.supplementaryDetails,
      },
      this.authorDisplayName
    );

    let value: string | undefined;
    if (result.status === "ok") {
      value = result.text;
    } else if (result.status === "failed") {
      console.warn(`Warning: Failed to generate summary: ${result.reason}`);
    }

    this.summaryState = { computed: true, value };
    return value;
  }
}

// Ascending by merge time. A missing merge time counts as `now`, so those
// sort after everything merged earlier; ties go by PR number.
export function sortByMergedAt(
  prs: PullRequest[],
  now: Date = new Date()
): PullRequest[] {
  const mergedTime = (pr: PullRequest): number =>
    (pr.mergedAt ?? now).getTime();

  return prs
    .slice()
    .sort((a, b) => mergedTime(a) - mergedTime(b) || a.number - b.number);
}
