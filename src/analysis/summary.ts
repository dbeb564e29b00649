import Papa from 'papaparse';
import { z } from 'zod';

import { readText } from '../utils/fs.js';

const CountCell = z
  .string()
  .transform((v) => (/^\d+$/.test(v.trim()) ? Number(v) : 0));

export const CollectedRowSchema = z.object({
  repo_name: z.string().min(1),
  pr_state: z.string(),
  pr_merged_at: z.string().default(''),
  pr_comments_count: CountCell,
  // 'N/A' for PRs without commits
  pr_commits_count: CountCell,
  prt_adherence: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
});

export type CollectedRow = z.output<typeof CollectedRowSchema>;

export interface RepoSummary {
  repo: string;
  pullRequests: number;
  merged: number;
  open: number;
  meanComments: number;
  meanCommits: number;
  /** null when no row carries template adherence */
  meanAdherence: number | null;
}

export const TOTAL_LABEL = '(all)';

export async function readRowsCsv(path: string): Promise<CollectedRow[]> {
  const text = await readText(path);
  const parsed = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true });
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`CSV parse failed at row ${first.row ?? '?'}: ${first.message}`);
  }
  return parsed.data.map((raw, i) => {
    const res = CollectedRowSchema.safeParse(raw);
    if (!res.success) {
      const issue = res.error.issues[0];
      throw new Error(`Invalid row ${i + 1} in ${path}: ${issue.path.join('.')} ${issue.message}`);
    }
    return res.data;
  });
}

/**
 * Per-repository summary, sorted by repository name, followed by a total row.
 */
export function summarize(rows: CollectedRow[]): RepoSummary[] {
  const byRepo = new Map<string, CollectedRow[]>();
  for (const row of rows) {
    const list = byRepo.get(row.repo_name) ?? [];
    list.push(row);
    byRepo.set(row.repo_name, list);
  }

  const repos = [...byRepo.keys()].sort((a, b) => a.localeCompare(b));
  const out = repos.map((repo) => summarizeGroup(repo, byRepo.get(repo) ?? []));
  out.push(summarizeGroup(TOTAL_LABEL, rows));
  return out;
}

function summarizeGroup(repo: string, rows: CollectedRow[]): RepoSummary {
  const n = rows.length;
  const adherence = rows.map((r) => r.prt_adherence).filter((v): v is number => v !== undefined && Number.isFinite(v));
  return {
    repo,
    pullRequests: n,
    merged: rows.filter((r) => r.pr_merged_at.trim() !== '').length,
    open: rows.filter((r) => r.pr_state === 'open').length,
    meanComments: mean(rows.map((r) => r.pr_comments_count)),
    meanCommits: mean(rows.map((r) => r.pr_commits_count)),
    meanAdherence: adherence.length > 0 ? mean(adherence) : null
  };
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}
