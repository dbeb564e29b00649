import type { RepoSummary } from '../../analysis/summary.js';
import { theme, INDENT } from './theme.js';
import { alignColumns, formatMean, formatMs, formatPercent, horizontalRule, keyValue } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

export interface CollectSummary {
  org: string;
  repos: number;
  pullRequests: number;
  skipped: number;
  outputFile: string;
  durationMs: number;
}

/**
 * The Renderer is the single output coordinator for the CLI.
 * - InteractiveRenderer: colors and spinners on stderr, tables on stdout
 * - QuietRenderer: one JSON object per line (--quiet)
 */
export interface Renderer {
  brand(version: string): void;

  // ── Results ──
  collectComplete(info: CollectSummary): void;
  summaryTable(rows: RepoSummary[]): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  spinner(message: string): SpinnerHandle;
}

export interface RendererIo {
  out(chunk: string): void;
  err(chunk: string): void;
}

const processIo: RendererIo = {
  out: (chunk) => {
    process.stdout.write(chunk);
  },
  err: (chunk) => {
    process.stderr.write(chunk);
  },
};

export const SUMMARY_HEADER = ['repository', 'PRs', 'merged', 'open', 'comments/PR', 'commits/PR', 'template'];

export function summaryCells(s: RepoSummary): string[] {
  return [
    s.repo,
    String(s.pullRequests),
    String(s.merged),
    String(s.open),
    formatMean(s.meanComments),
    formatMean(s.meanCommits),
    formatPercent(s.meanAdherence),
  ];
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  constructor(private io: RendererIo = processIo) {}

  private writeln(msg: string = ''): void {
    this.io.err(msg + '\n');
  }

  brand(version: string): void {
    this.writeln(`${INDENT}${theme.bold('prt-collector')} ${theme.dim(`v${version}`)}`);
    this.writeln();
  }

  collectComplete(info: CollectSummary): void {
    this.writeln();
    this.writeln(keyValue('Organization', info.org));
    this.writeln(keyValue('Repositories', String(info.repos)));
    this.writeln(keyValue('Pull requests', String(info.pullRequests)));
    if (info.skipped > 0) {
      this.writeln(keyValue('Skipped', theme.warning(String(info.skipped))));
    }
    this.writeln(keyValue('Duration', formatMs(info.durationMs)));
    this.writeln();
    this.writeln(`${INDENT}${theme.check} Pull request details saved to ${theme.bold(info.outputFile)}.`);
  }

  summaryTable(rows: RepoSummary[]): void {
    const lines = alignColumns(SUMMARY_HEADER, rows.map(summaryCells));
    const [header, ...body] = lines;
    this.io.out(`${theme.header(header)}\n`);
    this.io.out(`${horizontalRule(header.length)}\n`);
    body.forEach((line, i) => {
      const isTotal = i === body.length - 1;
      if (isTotal) this.io.out(`${horizontalRule(header.length)}\n`);
      this.io.out(`${isTotal ? theme.total(line) : line}\n`);
    });
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }
}

// ── Quiet Renderer (Machine-Friendly JSON Lines) ────────────────────────────

export class QuietRenderer implements Renderer {
  constructor(private io: RendererIo = processIo) {}

  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    this.io.out(JSON.stringify(event) + '\n');
  }

  brand(): void { /* no-op in quiet mode */ }

  collectComplete(info: CollectSummary): void {
    this.emit('collect_complete', { ...info });
  }

  summaryTable(rows: RepoSummary[]): void {
    for (const row of rows) this.emit('summary', { ...row });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return {
      update: () => {},
      succeed: () => {},
      fail: () => {},
    };
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.PRT_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
