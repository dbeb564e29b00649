import { theme, INDENT, RULE_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

export function padLeft(str: string, width: number): string {
  if (str.length >= width) return str;
  return ' '.repeat(width - str.length) + str;
}

/**
 * Render rows as aligned plain-text columns. The first column is left-aligned,
 * the rest right-aligned (they are numbers).
 */
export function alignColumns(header: string[], rows: string[][]): string[] {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const fmt = (cells: string[]) =>
    cells.map((c, i) => (i === 0 ? padRight(c, widths[i]) : padLeft(c, widths[i]))).join('  ');
  return [fmt(header), ...rows.map(fmt)];
}

/**
 * A solid dim horizontal rule: ──────────────────────
 */
export function horizontalRule(width: number = RULE_WIDTH): string {
  return theme.dim('─'.repeat(width));
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Output      acme_all_prs_with_details.csv"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Numbers ─────────────────────────────────────────────────────────────────

export function formatMean(n: number): string {
  return n.toFixed(2);
}

export function formatPercent(ratio: number | null): string {
  if (ratio === null) return '-';
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Strip ANSI escape codes from a string (for width calculations).
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
