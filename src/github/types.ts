import { z } from 'zod';

// Only the fields the collector reads are declared; GitHub sends many more,
// which zod strips.

export const UserRefSchema = z.object({
  login: z.string()
});

export const RepositorySchema = z.object({
  name: z.string(),
  owner: UserRefSchema
});

export const PullRequestSchema = z.object({
  id: z.union([z.number(), z.string()]),
  number: z.number().optional(),
  state: z.string(),
  title: z.string(),
  user: UserRefSchema.nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  merged_at: z.string().nullable().optional(),
  diff_url: z.string(),
  body: z.string().nullable().optional(),
  requested_reviewers: z.array(UserRefSchema).optional(),
  comments: z.number().optional(),
  comments_url: z.string(),
  commits_url: z.string()
});

export const CommentSchema = z.object({
  body: z.string().nullable().optional()
});

export const CommitRefSchema = z.object({
  sha: z.string().optional(),
  url: z.string()
});

export const CommitDetailSchema = z.object({
  sha: z.string(),
  stats: z.object({
    additions: z.number(),
    deletions: z.number()
  }),
  files: z
    .array(
      z.object({
        filename: z.string(),
        patch: z.string().optional()
      })
    )
    .optional()
});

export type Repository = z.infer<typeof RepositorySchema>;
export type PullRequest = z.infer<typeof PullRequestSchema>;
export type Comment = z.infer<typeof CommentSchema>;
export type CommitRef = z.infer<typeof CommitRefSchema>;
export type CommitDetail = z.infer<typeof CommitDetailSchema>;

export interface CommitStats {
  commitId: string;
  additions: number;
  deletions: number;
  /** filename → unified diff patch */
  filesDiff: Record<string, string>;
}

export interface CommitFailure {
  error: string;
}

export type CommitInfo = CommitStats | CommitFailure;

export const NO_DIFF_AVAILABLE = 'No diff available';
