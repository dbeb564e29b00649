import type { Dispatcher } from 'undici';

import { loadTemplate } from '../../analysis/template.js';
import { collectPullRequests } from '../../core/collector.js';
import { loadConfigFile, resolveConfig, type ConfigEnv, type ConfigFlags } from '../../config/loader.js';
import type { ConfigFile } from '../../config/schema.js';
import { defaultOutputFile, writeRowsCsv } from '../../export/csv.js';
import { GitHubClient } from '../../github/client.js';
import { describeError } from '../../github/errors.js';
import { Logger, setLogger } from '../../utils/logger.js';
import { getRenderer } from '../ui/renderer.js';
import { promptToken } from '../ui/prompts.js';

export const INVALID_TOKEN_MESSAGE = 'Please fix the token for the particular org and url';

export interface CollectCommandOptions extends ConfigFlags {
  /** YAML config file path. */
  config?: string;
  env?: ConfigEnv;
  verbose?: boolean;
  quiet?: boolean;
  /** Prompt for a token when none is configured (TTY only). */
  interactive?: boolean;
  dispatcher?: Dispatcher;
  /** Defaults to `promptToken`; tests replace it. */
  askToken?: () => Promise<string>;
}

export interface CollectCommandResult {
  ok: boolean;
  /** Set when the user pressed Ctrl+C at the token prompt. */
  reason?: 'cancelled';
  details?: unknown;
  outputFile?: string;
  pullRequests?: number;
}

/**
 * `prt-collector collect`: write one CSV row per pull request of the org.
 */
export async function runCollectCommand(opts: CollectCommandOptions): Promise<CollectCommandResult> {
  const r = getRenderer();
  const startedAt = Date.now();

  let file: ConfigFile = {};
  let flags: ConfigFlags = opts;
  try {
    if (opts.config) file = await loadConfigFile(opts.config);

    const env = opts.env ?? {};
    const haveToken = Boolean(opts.token ?? file.token ?? env.GITHUB_TOKEN?.trim());
    if (!haveToken && opts.interactive) {
      const ask = opts.askToken ?? (() => promptToken());
      flags = { ...opts, token: await ask() };
    }

    const config = resolveConfig(flags, env, file);

    const logger = new Logger({
      level: opts.verbose ? 'debug' : 'info',
      json: opts.quiet === true,
      filePath: config.logFile,
    });
    setLogger(logger);

    const client = new GitHubClient({
      baseUrl: config.url,
      token: config.token,
      org: config.org,
      maxPages: config.maxPages,
      perPage: config.perPage,
      dispatcher: opts.dispatcher,
      logger,
    });

    if (!(await client.isTokenValid())) {
      logger.error(INVALID_TOKEN_MESSAGE);
      return { ok: false, details: INVALID_TOKEN_MESSAGE };
    }

    const template = config.template ? await loadTemplate(config.template) : undefined;
    if (template) {
      logger.info(`Scoring PR bodies against ${config.template} (${template.sections.length} sections)`);
    }

    const target = config.repo ? `${config.org}/${config.repo}` : config.org;
    const spin = r.spinner(`Collecting pull requests from ${target}`);
    const result = await collectPullRequests(
      client,
      { org: config.org, repo: config.repo, repoFilter: config.repoFilter, template },
      {
        onRepo: ({ name, index, total }) => spin.update(`[${index}/${total}] ${name}`),
        onPullRequest: ({ repo, index, total }) => spin.update(`${repo}: pull request ${index}/${total}`),
      },
    ).catch((err: unknown) => {
      spin.fail(`Collection failed for ${target}`);
      throw err;
    });
    spin.succeed(`Collected ${result.rows.length} pull requests from ${result.repos.length} repositories`);

    const outputFile = config.output ?? defaultOutputFile(config.org, config.repo);
    await writeRowsCsv(outputFile, result.rows);
    logger.info(`Pull request details saved to ${outputFile}.`);

    r.collectComplete({
      org: config.org,
      repos: result.repos.length,
      pullRequests: result.rows.length,
      skipped: result.skipped,
      outputFile,
      durationMs: Date.now() - startedAt,
    });

    return { ok: true, outputFile, pullRequests: result.rows.length };
  } catch (err) {
    if (isPromptCancel(err)) return { ok: false, reason: 'cancelled' };
    return { ok: false, details: describeError(err) };
  }
}

/** 0 on success, 130 when cancelled, 1 otherwise. */
export function collectExitCode(res: CollectCommandResult): number {
  if (res.ok) return 0;
  return res.reason === 'cancelled' ? 130 : 1;
}

// @inquirer/prompts rejects with ExitPromptError on Ctrl+C: the raw-mode TTY never raises SIGINT.
function isPromptCancel(err: unknown): boolean {
  return err instanceof Error && err.name === 'ExitPromptError';
}
