/**
 * Repository resolution and pull request pagination
 */

import type { PullRequestSource } from '../azure/client';
import { ConfigError } from '../config';
import type { PullRequest, Repository } from './models';

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGES = 1000;

export class PaginationLimitError extends Error {
  constructor(
    message: string,
    public repositoryId: string,
    public pages: number,
  ) {
    super(message);
    this.name = 'PaginationLimitError';
  }
}

export interface PaginationOptions {
  pageSize?: number;
  maxPages?: number;
  onPage?: (fetched: number, page: number) => void;
}

/**
 * Pick the requested repositories out of the project, in API order
 */
export async function resolveRepositories(
  source: PullRequestSource,
  names: readonly string[],
): Promise<Repository[]> {
  const wanted = new Set(names);
  const repos = (await source.listRepositories()).filter((repo) => wanted.has(repo.name));

  if (repos.length === 0) {
    throw new ConfigError(
      `No matching repositories found for: ${names.join(', ')}\n` +
      'Check the repository names and that the token can read the project.'
    );
  }

  return repos;
}

/**
 * Fetch every pull request of a repository with skip/top paging.
 * A page shorter than the page size is the last one.
 */
export async function fetchAllPullRequests(
  source: PullRequestSource,
  repositoryId: string,
  options: PaginationOptions = {},
): Promise<PullRequest[]> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const results: PullRequest[] = [];

  for (let page = 0; page < maxPages; page++) {
    const batch = await source.listPullRequests(repositoryId, page * pageSize, pageSize);
    results.push(...batch);
    options.onPage?.(results.length, page + 1);

    if (batch.length < pageSize) {
      return results;
    }
  }

  throw new PaginationLimitError(
    `Stopped paging repository ${repositoryId} after ${maxPages} pages of ${pageSize}`,
    repositoryId,
    maxPages,
  );
}
