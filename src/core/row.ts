import { scoreBody, type PrTemplate } from '../analysis/template.js';
import type { GitHubClient } from '../github/client.js';
import { describeError } from '../github/errors.js';
import type { CommitInfo } from '../github/types.js';
import { getLogger } from '../utils/logger.js';

export const NOT_AVAILABLE = 'N/A';

/**
 * One CSV row per pull request. Column names are the CSV header.
 */
export interface PullRequestRow {
  repo_name: string;
  pr_id: string | number;
  pr_number: number | null;
  pr_state: string;
  pr_created_at: string;
  pr_updated_at: string;
  pr_merged_at: string | null;
  pr_title: string;
  pr_user_login: string | null;
  pr_diff_url: string;
  pr_body: string | null;
  pr_reviewers: string[];
  pr_comments_count: number;
  pr_comments: string;
  pr_commits_count: number | typeof NOT_AVAILABLE;
  pr_commits_info: CommitInfo[];
  prt_sections_matched?: number;
  prt_sections_total?: number;
  prt_checkboxes_checked?: number;
  prt_checkboxes_total?: number;
  prt_adherence?: number;
}

/**
 * Fetch comments and commits for `rawPr` and assemble its row.
 * Returns null (and logs) when the payload is malformed or a follow-up fetch throws.
 */
export async function buildPullRequestRow(
  client: GitHubClient,
  rawPr: unknown,
  repoName: string,
  template?: PrTemplate
): Promise<PullRequestRow | null> {
  try {
    const pr = client.parsePullRequest(rawPr);
    const comments = await client.fetchComments(pr.comments_url);
    const commits = await client.fetchCommits(pr.commits_url);

    const row: PullRequestRow = {
      repo_name: repoName,
      pr_id: pr.id,
      pr_number: pr.number ?? null,
      pr_state: pr.state,
      pr_created_at: pr.created_at,
      pr_updated_at: pr.updated_at,
      pr_merged_at: pr.merged_at ?? null,
      pr_title: pr.title,
      pr_user_login: pr.user?.login ?? null,
      pr_diff_url: pr.diff_url,
      pr_body: pr.body ?? null,
      pr_reviewers: (pr.requested_reviewers ?? []).map((r) => r.login),
      pr_comments_count: pr.comments ?? 0,
      pr_comments: comments,
      pr_commits_count: commits.length > 0 ? commits.length : NOT_AVAILABLE,
      pr_commits_info: commits
    };

    if (template) {
      const score = scoreBody(template, pr.body);
      row.prt_sections_matched = score.sectionsMatched;
      row.prt_sections_total = score.sectionsTotal;
      row.prt_checkboxes_checked = score.checkboxesChecked;
      row.prt_checkboxes_total = score.checkboxesTotal;
      row.prt_adherence = score.adherence;
    }

    return row;
  } catch (err) {
    getLogger().error(`Error building PR data row: ${describeError(err)}`, { repo: repoName });
    return null;
  }
}
