import picomatch from 'picomatch';

import type { PrTemplate } from '../analysis/template.js';
import type { CollectorConfig } from '../config/schema.js';
import type { GitHubClient } from '../github/client.js';
import { getLogger } from '../utils/logger.js';
import { buildPullRequestRow, type PullRequestRow } from './row.js';

export interface CollectHooks {
  onRepo?(info: { owner: string; name: string; index: number; total: number }): void;
  onPullRequest?(info: { repo: string; index: number; total: number }): void;
}

export interface CollectResult {
  rows: PullRequestRow[];
  repos: string[];
  /** PRs whose row could not be built. */
  skipped: number;
}

export type CollectOptions = Pick<CollectorConfig, 'org' | 'repo' | 'repoFilter'> & {
  template?: PrTemplate;
};

/**
 * Collect one row per pull request, either for `org/repo` or for every
 * repository of the organisation that passes `repoFilter`.
 */
export async function collectPullRequests(
  client: GitHubClient,
  opts: CollectOptions,
  hooks: CollectHooks = {}
): Promise<CollectResult> {
  const logger = getLogger();
  const targets: Array<{ owner: string; name: string }> = [];

  if (opts.repo) {
    targets.push({ owner: opts.org, name: opts.repo });
  } else {
    const repos = await client.getRepos();
    const matches = opts.repoFilter.length > 0 ? picomatch(opts.repoFilter) : null;
    for (const r of repos) {
      if (matches && !matches(r.name)) {
        logger.debug('repository filtered out', { repo: r.name });
        continue;
      }
      targets.push({ owner: r.owner.login, name: r.name });
    }
    logger.info(`Found ${repos.length} repositories in ${opts.org}, collecting ${targets.length}`);
  }

  const rows: PullRequestRow[] = [];
  let skipped = 0;

  for (const [i, target] of targets.entries()) {
    hooks.onRepo?.({ ...target, index: i + 1, total: targets.length });
    const prs = await client.getPullRequests(target.owner, target.name);
    logger.debug('pull requests listed', { repo: target.name, count: prs.length });

    for (const [j, pr] of prs.entries()) {
      hooks.onPullRequest?.({ repo: target.name, index: j + 1, total: prs.length });
      const row = await buildPullRequestRow(client, pr, target.name, opts.template);
      if (row) rows.push(row);
      else skipped += 1;
    }
  }

  return { rows, repos: targets.map((t) => t.name), skipped };
}
