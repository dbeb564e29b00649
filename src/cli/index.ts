#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runAnalyzeCommand } from './commands/analyze.js';
import { collectExitCode, runCollectCommand } from './commands/collect.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

type GlobalFlags = {
  verbose: boolean;
  quiet: boolean;
};

interface CollectFlags {
  org?: string;
  url?: string;
  token?: string;
  maxPages?: number;
  perPage?: number;
  repo?: string;
  repoFilter: string[];
  template?: string;
  output?: string;
  config?: string;
  logFile?: string;
}

export function buildCli(argv: string[]) {
  const program = new Command();

  let globalFlags: GlobalFlags = { verbose: false, quiet: false };

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('prt-collector')
    .description('Collect GitHub pull request metadata for studying pull request templates')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<Partial<GlobalFlags>>();
    globalFlags = { verbose: o.verbose === true, quiet: o.quiet === true };
    process.env.PRT_QUIET = globalFlags.quiet ? '1' : '0';
    const r = createRenderer({ quiet: globalFlags.quiet });
    r.brand(version);
  });

  program
    .command('collect')
    .description('Fetch pull requests, comments and commits into a CSV file')
    .option('--org <org>', 'GitHub organization, e.g. my-course-2024')
    .option('--url <url>', 'GitHub API base URL, e.g. https://api.github.com or https://<host>/api/v3')
    .option('--token <token>', 'GitHub API token (or set GITHUB_TOKEN)')
    .option('--max-pages <n>', 'Maximum number of pages to fetch per listing', parseInteger)
    .option('--per-page <n>', 'Items per page (max 100)', parseInteger)
    .option('--repo <name>', 'Only this repository of the organization')
    .option('--repo-filter <glob>', 'Only repositories whose name matches (repeatable)', collectRepeatable, [])
    .option('--template <path>', 'Pull request template to score PR bodies against')
    .option('--output <path>', 'CSV output path (default: <org>_<repo|all>_prs_with_details.csv)')
    .option('--config <path>', 'YAML config file with the same options in camelCase')
    .option('--log-file <path>', 'Also write debug-level logs to this file')
    .action(async (opts: CollectFlags) => {
      const res = await runCollectCommand({
        ...opts,
        env: process.env,
        verbose: globalFlags.verbose,
        quiet: globalFlags.quiet,
        interactive: Boolean(process.stdin.isTTY) && !globalFlags.quiet,
      });
      if (!res.ok) {
        const r = getRenderer();
        if (collectExitCode(res) === 130) {
          r.warn('Cancelled.');
          process.exitCode = 130;
          return;
        }
        r.error(
          'Collect failed',
          String(res.details ?? 'unknown error'),
          'Run with --verbose for request-level logs.',
        );
        process.exitCode = 1;
      }
    });

  program
    .command('analyze')
    .description('Summarize a collected CSV per repository')
    .argument('<csv>', 'CSV written by `prt-collector collect`')
    .action(async (csvPath: string) => {
      const res = await runAnalyzeCommand({ csvPath });
      if (!res.ok) {
        const r = getRenderer();
        r.error('Analyze failed', String(res.details ?? 'unknown error'));
        process.exitCode = 1;
      }
    });

  return program.parseAsync(argv);
}

process.on('SIGINT', () => {
  process.exit(130);
});

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected failure', err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed = JSON.parse(content) as { version?: unknown };
        return typeof parsed.version === 'string' ? parsed.version : null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}
