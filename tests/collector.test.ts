import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseTemplate } from '../src/analysis/template.js';
import { collectPullRequests } from '../src/core/collector.js';
import { buildPullRequestRow } from '../src/core/row.js';
import { Logger, setLogger } from '../src/utils/logger.js';
import { API, createGitHubFixture, pullRequestPayload, type GitHubFixture } from './github-fixture.js';

function mockEmptyDetails(fx: GitHubFixture, n: number): void {
  fx.api.intercept({ path: `/repos/testOwner/repo1/issues/${n}/comments`, method: 'GET' }).reply(200, []);
  fx.api.intercept({ path: `/repos/testOwner/repo1/pulls/${n}/commits`, method: 'GET' }).reply(200, []);
}

describe('collector', () => {
  let fx: GitHubFixture;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    setLogger(new Logger({ level: 'debug', sink: (line) => logs.push(line) }));
  });

  afterEach(async () => {
    await fx.agent.close();
  });

  it('collects every repository of the organization', async () => {
    fx = createGitHubFixture();
    fx.api
      .intercept({ path: '/orgs/testOrg/repos?per_page=5', method: 'GET' })
      .reply(200, [{ name: 'repo1', owner: { login: 'testOwner' } }]);
    fx.api
      .intercept({ path: '/repos/testOwner/repo1/pulls?state=all&per_page=5', method: 'GET' })
      .reply(200, [pullRequestPayload(1, { id: 'pr1' })]);
    mockEmptyDetails(fx, 1);

    const result = await collectPullRequests(fx.client, { org: 'testOrg', repoFilter: [] });

    expect(result.repos).toEqual(['repo1']);
    expect(result.skipped).toBe(0);
    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]).toEqual({
      repo_name: 'repo1',
      pr_id: 'pr1',
      pr_number: 1,
      pr_state: 'open',
      pr_created_at: '2020-01-01T00:00:00Z',
      pr_updated_at: '2020-01-02T00:00:00Z',
      pr_merged_at: null,
      pr_title: 'Test PR 1',
      pr_user_login: 'user1',
      pr_diff_url: 'https://github.com/testOwner/repo1/pull/1.diff',
      pr_body: 'Test body',
      pr_reviewers: [],
      pr_comments_count: 0,
      pr_comments: '',
      pr_commits_count: 'N/A',
      pr_commits_info: []
    });
  });

  it('uses the organization as owner when a single repository is named', async () => {
    fx = createGitHubFixture({ org: 'testOwner' });
    fx.api
      .intercept({ path: '/repos/testOwner/repo1/pulls?state=all&per_page=5', method: 'GET' })
      .reply(200, [pullRequestPayload(1), pullRequestPayload(2)]);
    mockEmptyDetails(fx, 1);
    mockEmptyDetails(fx, 2);

    const result = await collectPullRequests(fx.client, { org: 'testOwner', repo: 'repo1', repoFilter: [] });

    expect(result.rows.map((r) => r.pr_number)).toEqual([1, 2]);
    expect(fx.agent.pendingInterceptors()).toHaveLength(0);
  });

  it('applies repository name globs', async () => {
    fx = createGitHubFixture();
    fx.api.intercept({ path: '/orgs/testOrg/repos?per_page=5', method: 'GET' }).reply(200, [
      { name: 'project_team01', owner: { login: 'testOrg' } },
      { name: 'sandbox', owner: { login: 'testOrg' } }
    ]);
    fx.api
      .intercept({ path: '/repos/testOrg/project_team01/pulls?state=all&per_page=5', method: 'GET' })
      .reply(200, []);

    const seen: string[] = [];
    const result = await collectPullRequests(
      fx.client,
      { org: 'testOrg', repoFilter: ['project_*'] },
      { onRepo: ({ name, index, total }) => seen.push(`${index}/${total} ${name}`) }
    );

    expect(result.repos).toEqual(['project_team01']);
    expect(seen).toEqual(['1/1 project_team01']);
  });

  it('skips pull requests whose payload is malformed', async () => {
    fx = createGitHubFixture();
    fx.api
      .intercept({ path: '/repos/testOrg/repo1/pulls?state=all&per_page=5', method: 'GET' })
      .reply(200, [{ id: 7, state: 'open' }]);

    const result = await collectPullRequests(fx.client, { org: 'testOrg', repo: 'repo1', repoFilter: [] });

    expect(result.rows).toEqual([]);
    expect(result.skipped).toBe(1);
    expect(logs.some((l) => l.includes('ERROR Error building PR data row:'))).toBe(true);
  });
});

describe('buildPullRequestRow', () => {
  let fx: GitHubFixture;

  afterEach(async () => {
    await fx.agent.close();
  });

  it('counts commits, lists reviewers and scores the body against a template', async () => {
    fx = createGitHubFixture();
    fx.api
      .intercept({ path: '/repos/testOwner/repo1/issues/3/comments', method: 'GET' })
      .reply(200, [{ body: 'nice' }]);
    fx.api
      .intercept({ path: '/repos/testOwner/repo1/pulls/3/commits', method: 'GET' })
      .reply(200, [{ sha: 'c1', url: `${API}/repos/testOwner/repo1/commits/c1` }]);
    fx.api.intercept({ path: '/repos/testOwner/repo1/commits/c1', method: 'GET' }).reply(200, {
      sha: 'c1',
      stats: { additions: 10, deletions: 2 },
      files: [{ filename: 'README.md', patch: '+hello' }]
    });

    const template = parseTemplate('## Description\n\n## Testing\n\n- [ ] Tests added\n');
    const pr = pullRequestPayload(3, {
      body: '## Description\nFixes the parser.\n- [x] Tests added',
      comments: 1,
      merged_at: '2020-01-03T00:00:00Z',
      requested_reviewers: [{ login: 'ta1' }, { login: 'ta2' }]
    });

    const row = await buildPullRequestRow(fx.client, pr, 'repo1', template);

    expect(row).toMatchObject({
      pr_merged_at: '2020-01-03T00:00:00Z',
      pr_reviewers: ['ta1', 'ta2'],
      pr_comments_count: 1,
      pr_comments: 'nice',
      pr_commits_count: 1,
      pr_commits_info: [{ commitId: 'c1', additions: 10, deletions: 2, filesDiff: { 'README.md': '+hello' } }],
      prt_sections_matched: 1,
      prt_sections_total: 2,
      prt_checkboxes_checked: 1,
      prt_checkboxes_total: 1,
      prt_adherence: 0.5
    });
  });
});
