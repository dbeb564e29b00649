import Papa from 'papaparse';

import type { PullRequestRow } from '../core/row.js';
import { writeText } from '../utils/fs.js';

export const BASE_COLUMNS = [
  'repo_name',
  'pr_id',
  'pr_number',
  'pr_state',
  'pr_created_at',
  'pr_updated_at',
  'pr_merged_at',
  'pr_title',
  'pr_user_login',
  'pr_diff_url',
  'pr_body',
  'pr_reviewers',
  'pr_comments_count',
  'pr_comments',
  'pr_commits_count',
  'pr_commits_info'
] as const satisfies ReadonlyArray<keyof PullRequestRow>;

export const TEMPLATE_COLUMNS = [
  'prt_sections_matched',
  'prt_sections_total',
  'prt_checkboxes_checked',
  'prt_checkboxes_total',
  'prt_adherence'
] as const satisfies ReadonlyArray<keyof PullRequestRow>;

type Column = (typeof BASE_COLUMNS)[number] | (typeof TEMPLATE_COLUMNS)[number];
type Cell = string | number | null;

export function defaultOutputFile(org: string, repo?: string): string {
  return `${org}_${repo ?? 'all'}_prs_with_details.csv`;
}

export function columnsFor(rows: PullRequestRow[]): Column[] {
  const withTemplate = rows.some((r) => r.prt_adherence !== undefined);
  return withTemplate ? [...BASE_COLUMNS, ...TEMPLATE_COLUMNS] : [...BASE_COLUMNS];
}

export function rowsToCsv(rows: PullRequestRow[]): string {
  const columns = columnsFor(rows);
  // unparse emits nothing at all for an empty array; keep the header.
  if (rows.length === 0) return `${columns.join(',')}\n`;
  const records = rows.map((row) => {
    const record: Record<string, Cell> = {};
    for (const col of columns) record[col] = toCell(row[col]);
    return record;
  });
  return `${Papa.unparse(records, { columns, header: true, newline: '\n' })}\n`;
}

export async function writeRowsCsv(path: string, rows: PullRequestRow[]): Promise<void> {
  await writeText(path, rowsToCsv(rows));
}

function toCell(value: PullRequestRow[Column]): Cell {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  return JSON.stringify(value);
}
