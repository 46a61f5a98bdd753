/**
 * GitHub API client wrapper.
 * Lists an organisation's repositories and the commits a user pushed to
 * their default branches, via Octokit.
 */

import { Octokit } from '@octokit/rest';
import {
  dayWindow,
  getLogger,
  type CommitRecord,
  type CommitSource,
  type DateRange,
} from '@standup-report/core';

// ─── Types ────────────────────────────────────────────────────────

/** Options for creating a GitHub API client */
export interface GitHubClientOptions {
  /** Personal access token (scopes: repo, read:org) */
  token: string;
  /** Optional base URL for GitHub Enterprise */
  baseUrl?: string;
  /** Custom fetch implementation, passed through to Octokit */
  fetch?: typeof fetch;
}

/** Repository owner and name pair */
export interface RepoRef {
  owner: string;
  repo: string;
}

/** Filters for listing commits */
export interface CommitQuery {
  author: string;
  since: string;
  until: string;
}

// ─── Client ──────────────────────────────────────────────────────

/** Create a configured Octokit instance */
export function createGitHubClient(options: GitHubClientOptions): Octokit {
  return new Octokit({
    auth: options.token,
    ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
  });
}

// ─── API Functions ───────────────────────────────────────────────

/**
 * List the names of every repository in an organisation.
 */
export async function listOrgRepos(octokit: Octokit, org: string): Promise<string[]> {
  try {
    const repos = await octokit.paginate(octokit.repos.listForOrg, {
      org,
      type: 'all',
      per_page: 100,
    });
    return repos.map((repo) => repo.name);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to list repositories for ${org}: ${message}`);
  }
}

/**
 * List commits on a repository's default branch matching an author and
 * time window. Errors are left to the caller so it can tell an empty
 * repository from a failure.
 */
export async function listCommits(
  octokit: Octokit,
  ref: RepoRef,
  query: CommitQuery
): Promise<CommitRecord[]> {
  const commits = await octokit.paginate(octokit.repos.listCommits, {
    owner: ref.owner,
    repo: ref.repo,
    author: query.author,
    since: query.since,
    until: query.until,
    per_page: 100,
  });

  return commits.map((commit) => ({
    sha: commit.sha,
    message: firstLine(commit.commit.message),
    author: commit.author?.login ?? commit.commit.author?.name ?? query.author,
    timestamp: commit.commit.author?.date ?? commit.commit.committer?.date ?? '',
    repo: ref.repo,
    url: commit.html_url,
  }));
}

// ─── Commit Source ───────────────────────────────────────────────

export interface GitHubCommitSourceOptions {
  org: string;
  username: string;
}

/**
 * A {@link CommitSource} scanning every repository of an organisation.
 * Inaccessible (404) repositories are skipped with a warning; empty ones
 * (409) already come back from `paginate` as no commits.
 */
export function createGitHubCommitSource(
  octokit: Octokit,
  options: GitHubCommitSourceOptions
): CommitSource {
  return {
    name: 'github',

    async fetchCommits(range: DateRange): Promise<CommitRecord[]> {
      const logger = getLogger();
      const { since, until } = dayWindow(range);
      const repos = await listOrgRepos(octokit, options.org);
      logger.info(
        'github',
        `Scanning ${repos.length} repos in ${options.org} (default branch, ${range.start}–${range.end})`
      );

      const commits: CommitRecord[] = [];
      for (const repo of repos) {
        try {
          const found = await listCommits(
            octokit,
            { owner: options.org, repo },
            { author: options.username, since, until }
          );
          logger.debug('github', `${repo}: ${found.length} commits`);
          commits.push(...found);
        } catch (error) {
          if (isOctokitError(error) && error.status === 404) {
            logger.warn('github', `Skipping ${options.org}/${repo}: ${error.message}`, {
              status: error.status,
            });
            continue;
          }
          const message = error instanceof Error ? error.message : String(error);
          throw new Error(`Failed to list commits for ${options.org}/${repo}: ${message}`);
        }
      }
      return commits;
    },
  };
}

// ─── Helpers ─────────────────────────────────────────────────────

function firstLine(message: string): string {
  return message.split(/\r?\n/, 1)[0] ?? '';
}

/** Type guard for Octokit errors with a status property */
export function isOctokitError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}
