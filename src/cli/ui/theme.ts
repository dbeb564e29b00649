import chalk from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  check: chalk.green('✔'),

  // Tables
  header: chalk.bold.cyan,
  total: chalk.bold,
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules. */
export const RULE_WIDTH = 56;
