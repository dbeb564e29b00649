import { ZodError } from 'zod';

import { fileExists, readYaml } from '../utils/fs.js';
import { CollectorConfigSchema, ConfigFileSchema, type CollectorConfig, type ConfigFile } from './schema.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

/** Flags as commander hands them over; numbers are already parsed. */
export interface ConfigFlags {
  org?: string;
  token?: string;
  url?: string;
  maxPages?: number;
  perPage?: number;
  repo?: string;
  repoFilter?: string[];
  template?: string;
  output?: string;
  logFile?: string;
}

export type ConfigEnv = Partial<Record<'GITHUB_TOKEN' | 'GITHUB_API_URL' | 'PRT_ORG', string | undefined>>;

export async function loadConfigFile(path: string): Promise<ConfigFile> {
  if (!(await fileExists(path))) {
    throw new ConfigError(`Config file not found: ${path}`);
  }
  const raw = (await readYaml(path)) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Merge configuration sources. Precedence: flags, then config file, then environment.
 */
export function resolveConfig(flags: ConfigFlags, env: ConfigEnv = {}, file: ConfigFile = {}): CollectorConfig {
  const fileFilter = file.repoFilter === undefined ? undefined : ([] as string[]).concat(file.repoFilter);
  const merged = {
    org: flags.org ?? file.org ?? blankToUndefined(env.PRT_ORG),
    token: flags.token ?? file.token ?? blankToUndefined(env.GITHUB_TOKEN),
    url: flags.url ?? file.url ?? blankToUndefined(env.GITHUB_API_URL),
    maxPages: flags.maxPages ?? file.maxPages,
    perPage: flags.perPage ?? file.perPage,
    repo: flags.repo ?? file.repo,
    repoFilter: flags.repoFilter && flags.repoFilter.length > 0 ? flags.repoFilter : fileFilter,
    template: flags.template ?? file.template,
    output: flags.output ?? file.output,
    logFile: flags.logFile ?? file.logFile
  };

  const parsed = CollectorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

function blankToUndefined(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}

function formatIssues(err: ZodError): string[] {
  return err.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}
