import type { CommitRecord, StandupReport, TrackedIssue } from '@standup-report/core';

export function trackedIssue(overrides: Partial<TrackedIssue> = {}): TrackedIssue {
  return {
    id: 'issue-id',
    identifier: 'DATA-1',
    title: 'Some work',
    stateGroup: 'started',
    stateName: 'In Progress',
    updatedAt: '2024-06-07T10:00:00Z',
    assigneeIds: ['m1'],
    labels: [],
    projectId: 'p1',
    url: 'https://plane.test/acme/projects/p1/issues/issue-id',
    ...overrides,
  };
}

export function commit(sha: string, message: string): CommitRecord {
  return {
    sha,
    message,
    author: 'jdoe',
    timestamp: '2024-06-07T12:00:00Z',
    repo: 'api',
    url: `https://github.com/acme/api/commit/${sha}`,
  };
}

/** A report touching every section */
export function sampleReport(): StandupReport {
  const doneCommit = commit('a1a1a1a1a1', 'DATA-1 - Ship export');
  return {
    reportDate: '2024-06-10',
    range: { start: '2024-06-07', end: '2024-06-09' },
    done: [{ identifier: 'DATA-1', title: 'Ship export', url: 'https://plane.test/DATA-1' }],
    review: [{ identifier: 'DATA-2', title: 'Review me', url: 'https://plane.test/DATA-2' }],
    inProgress: [
      {
        identifier: 'DATA-3',
        title: 'Active one',
        url: 'https://plane.test/DATA-3',
        tracked: true,
        commits: [
          commit('c3c3c3c3c3', 'DATA-3 - Add parser'),
          commit('c4c4c4c4c4', 'DATA-3 - Add parser'),
          commit('c5c5c5c5c5', 'DATA-3 Write tests'),
        ],
      },
    ],
    blocked: [{ identifier: 'DATA-7', title: 'Waiting on infra', url: 'https://plane.test/DATA-7' }],
    backlog: [{ identifier: 'DATA-5', title: 'Later', url: 'https://plane.test/DATA-5' }],
    doneCommits: new Map([['DATA-1', [doneCommit]]]),
    orphanCommits: [commit('g7g7g7g7g7', 'Bump deps')],
  };
}

/** A report with nothing to say */
export function emptyReport(): StandupReport {
  return {
    reportDate: '2024-06-10',
    range: { start: '2024-06-07', end: '2024-06-07' },
    done: [],
    review: [],
    inProgress: [],
    blocked: [],
    backlog: [],
    doneCommits: new Map(),
    orphanCommits: [],
  };
}
