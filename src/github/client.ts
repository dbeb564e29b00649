import { request, type Dispatcher } from 'undici';
import type { z } from 'zod';

import { getLogger, type Logger } from '../utils/logger.js';
import { describeError, GitHubRequestError } from './errors.js';
import { nextPageUrl } from './link-header.js';
import {
  CommentSchema,
  CommitDetailSchema,
  CommitRefSchema,
  NO_DIFF_AVAILABLE,
  PullRequestSchema,
  RepositorySchema,
  type CommitInfo,
  type PullRequest,
  type Repository
} from './types.js';

export const USER_AGENT = 'prt-collector';

/** GitHub answers 301 for renamed and transferred repositories. */
export const MAX_REDIRECTIONS = 5;

export interface GitHubClientOptions {
  /** API base URL, e.g. https://api.github.com or https://ghe.example.edu/api/v3 */
  baseUrl: string;
  token: string;
  org: string;
  maxPages: number;
  perPage: number;
  /** undici dispatcher override (tests inject a MockAgent). */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export interface ApiResponse {
  url: string;
  status: number;
  headers: Record<string, string | string[] | undefined>;
  data: unknown;
}

export class GitHubClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(private readonly opts: GitHubClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.logger = opts.logger ?? getLogger();
  }

  // -- Auth -----------------------------------------------------------------

  /**
   * GET the API root with the configured token. Only a 200 counts as valid.
   */
  async isTokenValid(): Promise<boolean> {
    try {
      const { statusCode, body } = await request(this.baseUrl, {
        method: 'GET',
        headers: this.headers(),
        maxRedirections: MAX_REDIRECTIONS,
        dispatcher: this.opts.dispatcher
      });
      await body.text();
      if (statusCode !== 200) {
        this.logger.error('API token is not valid', { status: statusCode });
        return false;
      }
      return true;
    } catch (err) {
      this.logger.error('API token is not valid', { error: describeError(err) });
      return false;
    }
  }

  // -- Listing --------------------------------------------------------------

  async getRepos(): Promise<Repository[]> {
    const url = `${this.baseUrl}/orgs/${this.opts.org}/repos?per_page=${this.opts.perPage}`;
    return parseEach(RepositorySchema, await this.getAllPaginatedItems(url), url);
  }

  async getPullRequests(owner: string, repo: string): Promise<unknown[]> {
    const url = `${this.baseUrl}/repos/${owner}/${repo}/pulls?state=all&per_page=${this.opts.perPage}`;
    return await this.getAllPaginatedItems(url);
  }

  /**
   * Follow `rel="next"` links, concatenating every page's array.
   * Stops on a missing Link header, a missing next relation, a failed page or after `maxPages` pages.
   */
  async getAllPaginatedItems(startUrl: string): Promise<unknown[]> {
    const items: unknown[] = [];
    let url: string | null = startUrl;
    let pageCount = 0;

    while (url && pageCount < this.opts.maxPages) {
      const res = await this.tryRequest(url);
      if (!res) break;
      if (!Array.isArray(res.data)) {
        this.logger.error('API request failed: expected a JSON array', { url });
        break;
      }
      items.push(...res.data);

      const link = headerValue(res.headers, 'link');
      if (!link) break;
      url = nextPageUrl(link);
      pageCount += 1;
    }

    this.logger.debug('paginated fetch finished', { url: startUrl, items: items.length, pages: pageCount });
    return items;
  }

  // -- Pull request details -------------------------------------------------

  /** Bodies of the PR's issue comments (first page), space-joined. */
  async fetchComments(commentsUrl: string): Promise<string> {
    const res = await this.tryRequest(commentsUrl);
    if (!res || !Array.isArray(res.data)) return '';
    return parseEach(CommentSchema, res.data, commentsUrl)
      .map((c) => c.body ?? '')
      .join(' ');
  }

  async fetchCommits(commitsUrl: string): Promise<CommitInfo[]> {
    const res = await this.tryRequest(commitsUrl);
    if (!res || !Array.isArray(res.data)) return [];

    const out: CommitInfo[] = [];
    for (const ref of parseEach(CommitRefSchema, res.data, commitsUrl)) {
      out.push(await this.createCommitInfo(ref.url));
    }
    return out;
  }

  async createCommitInfo(commitUrl: string): Promise<CommitInfo> {
    const failure = { error: `Failed to fetch commit data for ${commitUrl}` };
    const res = await this.tryRequest(commitUrl);
    if (!res) return failure;
    const parsed = CommitDetailSchema.safeParse(res.data);
    if (!parsed.success) {
      this.logger.warn('unexpected commit payload', { url: commitUrl });
      return failure;
    }

    const filesDiff: Record<string, string> = {};
    for (const f of parsed.data.files ?? []) {
      filesDiff[f.filename] = f.patch ?? NO_DIFF_AVAILABLE;
    }
    return {
      commitId: parsed.data.sha,
      additions: parsed.data.stats.additions,
      deletions: parsed.data.stats.deletions,
      filesDiff
    };
  }

  parsePullRequest(raw: unknown): PullRequest {
    return PullRequestSchema.parse(raw);
  }

  // -- HTTP helpers ---------------------------------------------------------

  async request(url: string): Promise<ApiResponse> {
    const { statusCode, headers, body } = await request(url, {
      method: 'GET',
      headers: this.headers(),
      maxRedirections: MAX_REDIRECTIONS,
      dispatcher: this.opts.dispatcher
    });
    const text = await body.text();
    if (statusCode < 200 || statusCode >= 300) {
      if (statusCode === 403 && headerValue(headers, 'x-ratelimit-remaining') === '0') {
        this.logger.warn('GitHub rate limit exhausted', { reset: headerValue(headers, 'x-ratelimit-reset') });
      }
      throw new GitHubRequestError(url, statusCode, text.slice(0, 200));
    }
    this.logger.debug('GET', { url, status: statusCode });
    return { url, status: statusCode, headers, data: text ? (JSON.parse(text) as unknown) : null };
  }

  /** `request`, but failures are logged and become `null`. */
  async tryRequest(url: string): Promise<ApiResponse | null> {
    try {
      return await this.request(url);
    } catch (err) {
      this.logger.error(`API request failed: ${describeError(err)}`);
      return null;
    }
  }

  private headers(): Record<string, string> {
    return {
      authorization: `token ${this.opts.token}`,
      accept: 'application/vnd.github.v3+json',
      'user-agent': USER_AGENT
    };
  }
}

function headerValue(headers: Record<string, string | string[] | undefined>, name: string): string | undefined {
  const v = headers[name];
  return Array.isArray(v) ? v.join(', ') : v;
}

function parseEach<T extends z.ZodTypeAny>(schema: T, items: unknown[], source: string): z.infer<T>[] {
  return items.map((item, i) => {
    const res = schema.safeParse(item);
    if (!res.success) {
      throw new Error(`Unexpected payload from ${source} at index ${i}: ${res.error.issues[0]?.message ?? 'invalid'}`);
    }
    return res.data;
  });
}
