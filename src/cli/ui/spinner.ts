import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora` with a consistent API. Falls back to static lines in non-TTY
// contexts (CI, piped output). Writes to stderr to keep stdout clean.

export interface SpinnerHandle {
  /** Update the spinner text while it's running. */
  update(text: string): void;
  /** Stop with a success checkmark and message. */
  succeed(text?: string): void;
  /** Stop with a failure cross and message. */
  fail(text?: string): void;
}

/**
 * Create and start a spinner with the given text.
 * In non-TTY environments, prints a static line instead.
 */
export function startSpinner(text: string): SpinnerHandle {
  const stream = process.stderr;

  if (!stream.isTTY || process.env.PRT_QUIET === '1') {
    // Static mode prints only the start and stop lines; per-PR updates would flood a log.
    stream.write(`  ${text}\n`);
    return {
      update() {},
      succeed(t?: string) {
        if (t) stream.write(`  ✔ ${t}\n`);
      },
      fail(t?: string) {
        if (t) stream.write(`  ✖ ${t}\n`);
      },
    };
  }

  // `ora` disables itself when CI=1 even on a TTY; force it on.
  const spinner: Ora = ora({
    text,
    stream,
    spinner: 'dots',
    indent: 2,
    isEnabled: true,
  }).start();

  return {
    update(t: string) {
      spinner.text = t;
    },
    succeed(t?: string) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t?: string) {
      spinner.fail(t ?? spinner.text);
    },
  };
}
