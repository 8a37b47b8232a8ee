import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../src/config';
import {
  fetchAllPullRequests,
  PaginationLimitError,
  resolveRepositories,
} from '../../src/domain/fetch';
import { pullRequest } from '../utils/fixtures';
import { FakeSource } from '../utils/fakes';

const repositories = [
  { id: 'id-web', name: 'web' },
  { id: 'id-api', name: 'api' },
  { id: 'id-docs', name: 'docs' },
];

function numbered(count: number) {
  return Array.from({ length: count }, (_, i) => pullRequest({ id: i + 1 }));
}

describe('resolveRepositories', () => {
  it('keeps requested repositories in API order', async () => {
    const source = new FakeSource(repositories);

    const repos = await resolveRepositories(source, ['docs', 'web', 'missing']);

    expect(repos).toEqual([
      { id: 'id-web', name: 'web' },
      { id: 'id-docs', name: 'docs' },
    ]);
  });

  it('fails with a configuration error when nothing matches', async () => {
    const source = new FakeSource(repositories);

    await expect(resolveRepositories(source, ['Web'])).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('fetchAllPullRequests', () => {
  it('pages with skip/top until a short page', async () => {
    const source = new FakeSource(repositories, { 'id-web': numbered(5) });

    const prs = await fetchAllPullRequests(source, 'id-web', { pageSize: 2 });

    expect(prs.map((pr) => pr.id)).toEqual([1, 2, 3, 4, 5]);
    expect(source.calls).toEqual([
      { repositoryId: 'id-web', skip: 0, top: 2 },
      { repositoryId: 'id-web', skip: 2, top: 2 },
      { repositoryId: 'id-web', skip: 4, top: 2 },
    ]);
  });

  it('asks for one more empty page when the count is a multiple of the page size', async () => {
    const source = new FakeSource(repositories, { 'id-web': numbered(4) });

    const prs = await fetchAllPullRequests(source, 'id-web', { pageSize: 2 });

    expect(prs).toHaveLength(4);
    expect(source.calls.map((c) => c.skip)).toEqual([0, 2, 4]);
  });

  it('uses pages of 100 by default', async () => {
    const source = new FakeSource(repositories, { 'id-api': numbered(150) });

    const prs = await fetchAllPullRequests(source, 'id-api');

    expect(prs).toHaveLength(150);
    expect(source.calls).toEqual([
      { repositoryId: 'id-api', skip: 0, top: 100 },
      { repositoryId: 'id-api', skip: 100, top: 100 },
    ]);
  });

  it('reports progress after every page', async () => {
    const source = new FakeSource(repositories, { 'id-web': numbered(3) });
    const progress: Array<[number, number]> = [];

    await fetchAllPullRequests(source, 'id-web', {
      pageSize: 2,
      onPage: (fetched, page) => progress.push([fetched, page]),
    });

    expect(progress).toEqual([
      [2, 1],
      [3, 2],
    ]);
  });

  it('stops a source that never returns a short page', async () => {
    const endless = {
      listRepositories: async () => repositories,
      listPullRequests: async (_id: string, _skip: number, top: number) => numbered(top),
    };

    const error = await fetchAllPullRequests(endless, 'id-web', { pageSize: 2, maxPages: 3 }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(PaginationLimitError);
    expect(error).toMatchObject({
      message: 'Stopped paging repository id-web after 3 pages of 2',
      repositoryId: 'id-web',
      pages: 3,
    });
  });
});
