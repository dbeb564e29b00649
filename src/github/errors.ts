export class GitHubRequestError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly bodyExcerpt: string
  ) {
    super(`GET ${url} returned ${status}${bodyExcerpt ? `: ${bodyExcerpt}` : ''}`);
    this.name = 'GitHubRequestError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
