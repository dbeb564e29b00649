import { describe, expect, it } from 'vitest';

import type { RepoSummary } from '../src/analysis/summary.js';
import { alignColumns, formatMs, formatPercent, stripAnsi } from '../src/cli/ui/format.js';
import { InteractiveRenderer, QuietRenderer, type RendererIo } from '../src/cli/ui/renderer.js';

function captureIo(): RendererIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (chunk) => stdout.push(chunk),
    err: (chunk) => stderr.push(chunk)
  };
}

const summaries: RepoSummary[] = [
  { repo: 'team01', pullRequests: 4, merged: 3, open: 1, meanComments: 2.5, meanCommits: 3, meanAdherence: 0.5 },
  { repo: '(all)', pullRequests: 4, merged: 3, open: 1, meanComments: 2.5, meanCommits: 3, meanAdherence: 0.5 }
];

describe('format', () => {
  it('aligns the first column left and the rest right', () => {
    expect(alignColumns(['name', 'n'], [['a', '1'], ['long', '10']])).toEqual(['name   n', 'a      1', 'long  10']);
  });

  it('formats durations and ratios', () => {
    expect(formatMs(250)).toBe('250ms');
    expect(formatMs(3200)).toBe('3.2s');
    expect(formatMs(102_000)).toBe('1m 42s');
    expect(formatPercent(0.755)).toBe('75.5%');
    expect(formatPercent(null)).toBe('-');
  });
});

describe('renderer', () => {
  it('prints the summary table on stdout with a rule before the total', () => {
    const io = captureIo();
    new InteractiveRenderer(io).summaryTable(summaries);

    const lines = io.stdout.map((l) => stripAnsi(l).replace(/\n$/, ''));
    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe('repository  PRs  merged  open  comments/PR  commits/PR  template');
    expect(lines[1]).toBe('─'.repeat(lines[0].length));
    expect(lines[2].split(/\s+/)).toEqual(['team01', '4', '3', '1', '2.50', '3.00', '50.0%']);
    expect(lines[3]).toBe(lines[1]);
    expect(lines[4].startsWith('(all)')).toBe(true);
    expect(io.stderr).toEqual([]);
  });

  it('emits one JSON line per summary row in quiet mode', () => {
    const io = captureIo();
    new QuietRenderer(io).summaryTable(summaries);

    const events = io.stdout.map((l) => JSON.parse(l) as Record<string, unknown>);
    expect(events.map((e) => [e.type, e.repo])).toEqual([
      ['summary', 'team01'],
      ['summary', '(all)']
    ]);
  });
});
