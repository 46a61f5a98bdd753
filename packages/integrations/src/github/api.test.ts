import { beforeEach, describe, expect, it } from 'vitest';
import { initLogger, type LogEntry } from '@standup-report/core';
import { createGitHubClient, createGitHubCommitSource, listOrgRepos } from './api.js';

type Route = { status?: number; body: unknown };

/** Build a fetch stand-in for Octokit from a table of pathnames */
function fakeGitHub(routes: Record<string, Route>) {
  const queries: URLSearchParams[] = [];
  const fetchImpl = async (input: string | URL | Request): Promise<Response> => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    queries.push(url.searchParams);
    const route = routes[url.pathname] ?? { status: 404, body: { message: 'Not Found' } };
    return new Response(JSON.stringify(route.body), {
      status: route.status ?? 200,
      headers: { 'content-type': 'application/json; charset=utf-8' },
    });
  };
  return { fetchImpl, queries };
}

const apiCommits = [
  {
    sha: 'a1b2c3d4e5f6',
    html_url: 'https://github.com/acme/api/commit/a1b2c3d4e5f6',
    commit: {
      message: 'DATA-1 - Add endpoint\n\nLonger description',
      author: { name: 'Jo Doe', date: '2024-06-07T09:00:00Z' },
    },
    author: { login: 'jdoe' },
  },
  {
    sha: 'f6e5d4c3b2a1',
    html_url: 'https://github.com/acme/api/commit/f6e5d4c3b2a1',
    commit: {
      message: 'Fix typo',
      author: { name: 'Jo Doe', date: '2024-06-07T15:30:00Z' },
    },
    author: null,
  },
];

describe('createGitHubCommitSource', () => {
  let logs: LogEntry[];

  beforeEach(async () => {
    logs = [];
    await initLogger({ onLog: (entry) => logs.push(entry) });
  });

  it('collects commits from every repository, empty ones included', async () => {
    const { fetchImpl, queries } = fakeGitHub({
      '/orgs/acme/repos': { body: [{ name: 'api' }, { name: 'empty' }, { name: 'web' }] },
      '/repos/acme/api/commits': { body: apiCommits },
      '/repos/acme/empty/commits': { status: 409, body: { message: 'Git Repository is empty.' } },
      '/repos/acme/web/commits': { body: [] },
    });
    const octokit = createGitHubClient({ token: 'test-gh-token', fetch: fetchImpl });
    const source = createGitHubCommitSource(octokit, { org: 'acme', username: 'jdoe' });

    const commits = await source.fetchCommits({ start: '2024-06-07', end: '2024-06-07' });

    expect(commits).toEqual([
      {
        sha: 'a1b2c3d4e5f6',
        message: 'DATA-1 - Add endpoint',
        author: 'jdoe',
        timestamp: '2024-06-07T09:00:00Z',
        repo: 'api',
        url: 'https://github.com/acme/api/commit/a1b2c3d4e5f6',
      },
      {
        sha: 'f6e5d4c3b2a1',
        message: 'Fix typo',
        author: 'Jo Doe',
        timestamp: '2024-06-07T15:30:00Z',
        repo: 'api',
        url: 'https://github.com/acme/api/commit/f6e5d4c3b2a1',
      },
    ]);

    const commitQuery = queries[1];
    expect(commitQuery.get('author')).toBe('jdoe');
    expect(commitQuery.get('since')).toBe('2024-06-07T00:00:00Z');
    expect(commitQuery.get('until')).toBe('2024-06-07T23:59:59Z');

    expect(logs.filter((e) => e.level === 'warn')).toEqual([]);
    expect(logs.find((e) => e.message === 'empty: 0 commits')?.level).toBe('debug');
  });

  it('skips repositories it cannot access with a warning', async () => {
    const { fetchImpl } = fakeGitHub({
      '/orgs/acme/repos': { body: [{ name: 'secret' }, { name: 'api' }] },
      '/repos/acme/api/commits': { body: apiCommits },
    });
    const octokit = createGitHubClient({ token: 'test-gh-token', fetch: fetchImpl });
    const source = createGitHubCommitSource(octokit, { org: 'acme', username: 'jdoe' });

    const commits = await source.fetchCommits({ start: '2024-06-07', end: '2024-06-07' });

    expect(commits.map((c) => c.sha)).toEqual(['a1b2c3d4e5f6', 'f6e5d4c3b2a1']);
    const warnings = logs.filter((e) => e.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toMatch(/^Skipping acme\/secret: /);
    expect(warnings[0].data).toEqual({ status: 404 });
  });

  it('propagates other API failures', async () => {
    const { fetchImpl } = fakeGitHub({
      '/orgs/acme/repos': { body: [{ name: 'api' }] },
      '/repos/acme/api/commits': { status: 500, body: { message: 'Server Error' } },
    });
    const octokit = createGitHubClient({ token: 'test-gh-token', fetch: fetchImpl });
    const source = createGitHubCommitSource(octokit, { org: 'acme', username: 'jdoe' });

    await expect(
      source.fetchCommits({ start: '2024-06-07', end: '2024-06-07' })
    ).rejects.toThrow(/^Failed to list commits for acme\/api: /);
  });
});

describe('listOrgRepos', () => {
  it('wraps organisation lookup failures', async () => {
    const { fetchImpl } = fakeGitHub({});
    const octokit = createGitHubClient({ token: 'test-gh-token', fetch: fetchImpl });

    await expect(listOrgRepos(octokit, 'nope')).rejects.toThrow(
      /^Failed to list repositories for nope: /
    );
  });
});
