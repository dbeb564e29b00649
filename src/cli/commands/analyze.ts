import { readRowsCsv, summarize } from '../../analysis/summary.js';
import { describeError } from '../../github/errors.js';
import { fileExists } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';

export interface AnalyzeCommandOptions {
  csvPath: string;
}

/**
 * `prt-collector analyze <csv>` — per-repository summary of a collected CSV.
 */
export async function runAnalyzeCommand(opts: AnalyzeCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  if (!(await fileExists(opts.csvPath))) {
    return { ok: false, details: `File not found: ${opts.csvPath}` };
  }

  try {
    const rows = await readRowsCsv(opts.csvPath);
    if (rows.length === 0) {
      r.warn(`${opts.csvPath} has no pull request rows.`);
      return { ok: true };
    }
    r.summaryTable(summarize(rows));
    return { ok: true };
  } catch (err) {
    return { ok: false, details: describeError(err) };
  }
}
