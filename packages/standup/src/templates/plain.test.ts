import { describe, expect, it } from 'vitest';
import { COMMIT_GROUPS, type CommitGroup } from '@standup-report/core';
import { createTicketMatcher } from '../tickets.js';
import { emptyReport, sampleReport } from '../__fixtures__/report.js';
import { renderPlainBacklog, renderPlainReport, reportBody } from './plain.js';

const matcher = createTicketMatcher('DATA');
const all = new Set<CommitGroup>(COMMIT_GROUPS);
const none = new Set<CommitGroup>();

describe('renderPlainReport', () => {
  it('renders every section with all commit groups', () => {
    const text = renderPlainReport(sampleReport(), {
      showCommits: all,
      matcher,
      addLinks: false,
    });

    expect(text).toBe(
      [
        'Daily standup — 2024-06-10',
        '',
        ':white_check_mark: Done:',
        '• DATA-1 — Ship export',
        '  ↳ Ship export (a1a1a1a)',
        '',
        ':eyes: Moved to review:',
        '• DATA-2 — Review me',
        '',
        ':arrows_counterclockwise: In progress / planned (with ETA):',
        '• DATA-3 — Active one',
        '  ↳ Add parser (c3c3c3c, c4c4c4c)',
        '  ↳ Write tests (c5c5c5c)',
        '',
        ':ghost: Commits without ticket:',
        '  ↳ Bump deps (g7g7g7g)',
        '',
        ':no_entry: Blocked:',
        '• DATA-7 — Waiting on infra blocked',
        '',
        ':jigsaw: Need tasks (Optional):',
        '• Need tasks: no',
      ].join('\n')
    );
  });

  it('appends links when asked', () => {
    const text = renderPlainReport(sampleReport(), {
      showCommits: new Set<CommitGroup>(['done']),
      matcher,
      addLinks: true,
    });
    const lines = text.split('\n');

    expect(lines[3]).toBe('• DATA-1 — Ship export https://plane.test/DATA-1');
    expect(lines[4]).toBe(
      '  ↳ Ship export (a1a1a1a https://github.com/acme/api/commit/a1a1a1a1a1)'
    );
    expect(lines).toContain('• DATA-7 — Waiting on infra blocked https://plane.test/DATA-7');
    expect(lines).not.toContain(':ghost: Commits without ticket:');
  });

  it('fills empty sections with placeholders', () => {
    const text = renderPlainReport(emptyReport(), { showCommits: all, matcher, addLinks: false });

    expect(text).toBe(
      [
        'Daily standup — 2024-06-10',
        '',
        ':white_check_mark: Done:',
        '• —',
        '',
        ':arrows_counterclockwise: In progress / planned (with ETA):',
        '• —',
        '',
        ':no_entry: Blocked:',
        '• No',
        '',
        ':jigsaw: Need tasks (Optional):',
        '• Need tasks: no',
      ].join('\n')
    );
  });

  it('omits commit lines when no group is selected', () => {
    const text = renderPlainReport(sampleReport(), { showCommits: none, matcher, addLinks: false });
    expect(text).not.toContain('↳');
  });
});

describe('reportBody', () => {
  it('drops the header and the blank line after it', () => {
    const text = renderPlainReport(emptyReport(), { showCommits: none, matcher, addLinks: false });
    expect(reportBody(text).split('\n').slice(0, 2)).toEqual([':white_check_mark: Done:', '• —']);
  });
});

describe('renderPlainBacklog', () => {
  it('lists backlog issues under a rule', () => {
    expect(renderPlainBacklog(sampleReport(), false)).toBe(
      '--- Backlog (assigned, not started) ---\n• DATA-5 — Later'
    );
    expect(renderPlainBacklog(sampleReport(), true)).toBe(
      '--- Backlog (assigned, not started) ---\n• DATA-5 — Later https://plane.test/DATA-5'
    );
  });

  it('is empty without backlog', () => {
    expect(renderPlainBacklog(emptyReport(), true)).toBe('');
  });
});
