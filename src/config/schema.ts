import { z } from 'zod';

export const DEFAULT_MAX_PAGES = 100_000;
/** GitHub's largest accepted `per_page`. */
export const MAX_PER_PAGE = 100;

export function normalizePerPage(n: number | undefined): number {
  if (n !== undefined && Number.isInteger(n) && n > 0 && n < MAX_PER_PAGE) return n;
  return MAX_PER_PAGE;
}

export function normalizeMaxPages(n: number | undefined): number {
  if (n !== undefined && Number.isInteger(n) && n > 0) return n;
  return DEFAULT_MAX_PAGES;
}

const OptionalInt = z
  .union([z.number(), z.string().regex(/^-?\d+$/, 'must be an integer')])
  .transform((v) => Number(v))
  .optional();

/**
 * Shape of a YAML config file; keys mirror the CLI flags in camelCase.
 * Every key is optional here, completeness is checked after merging.
 */
export const ConfigFileSchema = z
  .object({
    org: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
    url: z.string().url().optional(),
    maxPages: OptionalInt,
    perPage: OptionalInt,
    repo: z.string().min(1).optional(),
    repoFilter: z.union([z.string(), z.array(z.string())]).optional(),
    template: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    logFile: z.string().min(1).optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const CollectorConfigSchema = z.object({
  org: z.string({ required_error: 'organization is required (--org or PRT_ORG)' }).min(1),
  token: z.string({ required_error: 'API token is required (--token or GITHUB_TOKEN)' }).min(1),
  url: z
    .string({ required_error: 'API base URL is required (--url or GITHUB_API_URL)' })
    .url()
    .transform((u) => u.replace(/\/+$/, '')),
  maxPages: z.number().optional().transform(normalizeMaxPages),
  perPage: z.number().optional().transform(normalizePerPage),
  repo: z.string().min(1).optional(),
  repoFilter: z.array(z.string().min(1)).default([]),
  template: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  logFile: z.string().min(1).optional()
});

export type CollectorConfigInput = z.input<typeof CollectorConfigSchema>;
export type CollectorConfig = z.output<typeof CollectorConfigSchema>;
