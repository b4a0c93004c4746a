import { z } from "zod";

export const githubUserRefSchema = z.object({
  login: z.string(),
  type: z.string(),
});

export const searchIssueItemSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  user: githubUserRefSchema,
  html_url: z.string(),
  closed_at: z.string().nullable(),
});

export const searchIssuesResponseSchema = z.object({
  total_count: z.number().int(),
  items: z.array(searchIssueItemSchema),
});

export const pullRequestDetailSchema = z.object({
  number: z.number().int(),
  body: z.string().nullable(),
  merged_at: z.string().nullable(),
});

export const userProfileSchema = z.object({
  login: z.string(),
  name: z.string().nullable(),
});

export const issueCommentSchema = z.object({
  user: githubUserRefSchema.nullable(),
  body: z.string().nullable().optional(),
});

export type GitHubUserRef = z.infer<typeof githubUserRefSchema>;
export type SearchIssueItem = z.infer<typeof searchIssueItemSchema>;
export type PullRequestDetail = z.infer<typeof pullRequestDetailSchema>;
export type UserProfile = z.infer<typeof userProfileSchema>;
export type IssueComment = z.infer<typeof issueCommentSchema>;
