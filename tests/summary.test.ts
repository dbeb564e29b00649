import { describe, expect, it } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { readRowsCsv, summarize, TOTAL_LABEL } from '../src/analysis/summary.js';
import { writeRowsCsv } from '../src/export/csv.js';
import { makeRow } from './rows-fixture.js';

describe('summary', () => {
  it('summarizes a collected CSV per repository', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'prt-summary-'));
    const path = join(dir, 'org_all_prs_with_details.csv');
    await writeRowsCsv(path, [
      makeRow({
        repo_name: 'b-repo',
        pr_state: 'closed',
        pr_merged_at: '2020-02-01T00:00:00Z',
        pr_body: '## Description\nmulti\nline',
        pr_comments_count: 2,
        pr_commits_count: 3,
        prt_adherence: 1
      }),
      makeRow({ repo_name: 'b-repo', pr_state: 'open', prt_adherence: 0.5 }),
      makeRow({ repo_name: 'a-repo', pr_state: 'closed', pr_comments_count: 1, pr_commits_count: 1 })
    ]);

    const rows = await readRowsCsv(path);
    expect(rows).toHaveLength(3);

    expect(summarize(rows)).toEqual([
      { repo: 'a-repo', pullRequests: 1, merged: 0, open: 0, meanComments: 1, meanCommits: 1, meanAdherence: null },
      { repo: 'b-repo', pullRequests: 2, merged: 1, open: 1, meanComments: 1, meanCommits: 1.5, meanAdherence: 0.75 },
      {
        repo: TOTAL_LABEL,
        pullRequests: 3,
        merged: 1,
        open: 1,
        meanComments: 1,
        meanCommits: 4 / 3,
        meanAdherence: 0.75
      }
    ]);
  });

  it('returns only a zero total for no rows', () => {
    expect(summarize([])).toEqual([
      { repo: TOTAL_LABEL, pullRequests: 0, merged: 0, open: 0, meanComments: 0, meanCommits: 0, meanAdherence: null }
    ]);
  });
});
