import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import {
  getDefaultConfig,
  resolveSettings,
  type CommitRecord,
  type IssueSource,
  type Settings,
  type TrackedIssue,
} from '@standup-report/core';
import {
  createGitHubCommitSource,
  createPlaneIssueSource,
  createSlackClient,
  sendStandupMessage,
} from '@standup-report/integrations';
import { copyToClipboard } from '../clipboard.js';
import {
  parseDateArgument,
  registerReportCommand,
  resolveCommitGroups,
  slackErrors,
} from './report.js';

vi.mock('@standup-report/integrations', () => ({
  createPlaneClient: vi.fn(),
  createPlaneIssueSource: vi.fn(),
  createGitHubClient: vi.fn(),
  createGitHubCommitSource: vi.fn(),
  createSlackClient: vi.fn(),
  sendStandupMessage: vi.fn(),
}));

vi.mock('../clipboard.js', () => ({
  copyToClipboard: vi.fn(),
}));

function settings(env: Record<string, string>): Settings {
  const result = resolveSettings(getDefaultConfig(), {
    PLANE_API_KEY: 'test-key',
    PLANE_WORKSPACE_SLUG: 'acme',
    ...env,
  });
  if (!result.ok) throw new Error(result.errors.join('; '));
  return result.settings;
}

describe('parseDateArgument', () => {
  it('accepts ISO dates', () => {
    expect(parseDateArgument('2024-06-07')).toBe('2024-06-07');
  });

  it('rejects anything else as an invalid argument', () => {
    expect(() => parseDateArgument('07/06/2024')).toThrow(InvalidArgumentError);
    expect(() => parseDateArgument('07/06/2024')).toThrow(
      "Invalid date '07/06/2024'. Expected YYYY-MM-DD."
    );
  });
});

describe('resolveCommitGroups', () => {
  it('selects nothing by default', () => {
    expect([...resolveCommitGroups()]).toEqual([]);
  });

  it('combines groups and expands all', () => {
    expect([...resolveCommitGroups(['orphan', 'done', 'orphan'])]).toEqual(['orphan', 'done']);
    expect([...resolveCommitGroups(['done', 'all'])]).toEqual(['done', 'in_progress', 'orphan']);
  });
});

describe('slackErrors', () => {
  it('names each missing variable', () => {
    expect(slackErrors(settings({}))).toEqual([
      'SLACK_BOT_TOKEN is not set',
      'SLACK_USER_ID is not set',
    ]);
    expect(slackErrors(settings({ SLACK_BOT_TOKEN: 'test-token' }))).toEqual([
      'SLACK_USER_ID is not set',
    ]);
  });

  it('is empty when both are set', () => {
    expect(
      slackErrors(settings({ SLACK_BOT_TOKEN: 'test-token', SLACK_USER_ID: 'U123' }))
    ).toEqual([]);
  });
});

// ─── Command flow ─────────────────────────────────────────────────

function issue(
  identifier: string,
  title: string,
  stateGroup: TrackedIssue['stateGroup']
): TrackedIssue {
  return {
    id: identifier.toLowerCase(),
    identifier,
    title,
    stateGroup,
    stateName: '',
    updatedAt: '2024-06-07T09:00:00Z',
    assigneeIds: ['m1'],
    labels: [],
    projectId: 'p1',
    url: `https://plane.test/${identifier}`,
  };
}

const spikeCommit: CommitRecord = {
  sha: 'abc1234def',
  message: 'DATA-3 - Spike caching',
  author: 'jdoe',
  timestamp: '2024-06-07T10:00:00Z',
  repo: 'api',
  url: 'https://github.com/acme/api/commit/abc1234def',
};

const REPORT = [
  'Daily standup — 2024-06-10',
  '',
  ':white_check_mark: Done:',
  '• DATA-1 — Ship export',
  '',
  ':arrows_counterclockwise: In progress / planned (with ETA):',
  '• DATA-3 — Spike caching',
  '',
  ':no_entry: Blocked:',
  '• No',
  '',
  ':jigsaw: Need tasks (Optional):',
  '• Need tasks: no',
].join('\n');

const BACKLOG = '--- Backlog (assigned, not started) ---\n• DATA-5 — Later';

const missingConfig = path.join(os.tmpdir(), 'standup-report-missing', '.standup.yml');

async function runCommand(...args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  registerReportCommand(program);
  await program.parseAsync([
    'node',
    'standup',
    'report',
    '--date',
    '2024-06-07',
    '--config',
    missingConfig,
    ...args,
  ]);
}

describe('report command', () => {
  let log: MockInstance<typeof console.log>;
  let stderr: MockInstance<typeof console.error>;

  const stderrText = (): string =>
    stderr.mock.calls.map((call) => call.map(String).join(' ')).join('\n');

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2024, 5, 10, 12, 0, 0));

    vi.stubEnv('PLANE_API_KEY', 'test-plane-key');
    vi.stubEnv('PLANE_WORKSPACE_SLUG', 'acme');
    vi.stubEnv('PLANE_PROJECT_ID', '');
    vi.stubEnv('GITHUB_TOKEN', 'test-gh-token');
    vi.stubEnv('GITHUB_ORG', 'acme');
    vi.stubEnv('GITHUB_USERNAME', 'jdoe');
    vi.stubEnv('SLACK_BOT_TOKEN', 'test-slack-token');
    vi.stubEnv('SLACK_USER_ID', 'U123');

    const issueSource: IssueSource = {
      name: 'plane',
      fetchAssignedIssues: async () => [
        issue('DATA-1', 'Ship export', 'completed'),
        issue('DATA-5', 'Later', 'backlog'),
      ],
      browseUrl: (identifier) => `https://plane.test/browse/${identifier}`,
    };
    vi.mocked(createPlaneIssueSource).mockReturnValue(issueSource);
    vi.mocked(createGitHubCommitSource).mockReturnValue({
      name: 'github',
      fetchCommits: async () => [spikeCommit],
    });
    vi.mocked(copyToClipboard).mockResolvedValue('pbcopy');
    vi.mocked(sendStandupMessage).mockResolvedValue({ ok: true, ts: '1.0', channel: 'U123' });

    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('prints the report, copies it without its header and prints the backlog last', async () => {
    await runCommand();

    expect(log.mock.calls).toEqual([[''], [REPORT], [''], [BACKLOG]]);
    expect(copyToClipboard).toHaveBeenCalledWith(REPORT.split('\n').slice(2).join('\n'));
    expect(sendStandupMessage).not.toHaveBeenCalled();
    expect(stderrText()).toContain('Reporting period: 2024-06-07');
    expect(stderrText()).not.toContain('[INFO]');
  });

  it('prints progress details with --verbose', async () => {
    await runCommand('--verbose');

    expect(stderrText()).toContain('[INFO] Fetched 2 item(s) from plane');
    expect(stderrText()).toContain('[INFO] Fetched 1 item(s) from github');
  });

  it('only warns when the clipboard fails', async () => {
    vi.mocked(copyToClipboard).mockRejectedValue(new Error('no clipboard command'));

    await runCommand();

    expect(stderrText()).toContain('[WARN] Could not copy to clipboard: no clipboard command');
    expect(log.mock.calls).toEqual([[''], [REPORT], [''], [BACKLOG]]);
  });

  it('skips the clipboard with --no-clipboard', async () => {
    await runCommand('--no-clipboard');

    expect(copyToClipboard).not.toHaveBeenCalled();
    expect(log.mock.calls).toEqual([[''], [REPORT], [''], [BACKLOG]]);
  });

  it('stops before fetching when --slack lacks its variables', async () => {
    vi.stubEnv('SLACK_BOT_TOKEN', '');

    await expect(runCommand('--slack')).rejects.toThrow('process.exit(1)');

    expect(stderrText()).toContain('[ERROR] SLACK_BOT_TOKEN is not set');
    expect(createPlaneIssueSource).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it('sends the Slack report to the user', async () => {
    await runCommand('--slack');

    expect(createSlackClient).toHaveBeenCalledWith('test-slack-token');
    expect(sendStandupMessage).toHaveBeenCalledWith(
      undefined,
      'U123',
      expect.stringMatching(/^\*Daily standup — 2024-06-10\*\n/)
    );
    expect(stderrText()).toContain('✓ Sent to Slack');
    expect(log.mock.calls).toEqual([[''], [REPORT], [''], [BACKLOG]]);
  });

  it('fails when the Slack post fails', async () => {
    vi.mocked(sendStandupMessage).mockResolvedValue({
      ok: false,
      channel: 'U123',
      error: 'channel_not_found',
    });

    await expect(runCommand('--slack')).rejects.toThrow(
      'Failed to send to Slack: channel_not_found'
    );
    expect(log.mock.calls).toEqual([[''], [REPORT]]);
  });
});
