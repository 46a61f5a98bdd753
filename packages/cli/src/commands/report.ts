/**
 * `standup report` command, the default.
 *
 * Collects the previous workday's Plane issues and GitHub commits, prints
 * the standup, copies it to the clipboard and optionally sends it to
 * Slack as a DM.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import * as path from 'node:path';
import {
  COMMIT_GROUPS,
  formatRange,
  getLogger,
  initLogger,
  LEVEL_PRIORITY,
  loadConfig,
  parseIsoDate,
  resolveReportingRange,
  resolveSettings,
  today,
  type CommitGroup,
  type IsoDate,
  type LogEntry,
  type LogLevel,
  type Settings,
} from '@standup-report/core';
import {
  createGitHubClient,
  createGitHubCommitSource,
  createPlaneClient,
  createPlaneIssueSource,
  createSlackClient,
  sendStandupMessage,
} from '@standup-report/integrations';
import {
  collectReport,
  renderPlainBacklog,
  renderPlainReport,
  renderSlackReport,
  reportBody,
  type CollectorEvent,
} from '@standup-report/standup';
import { copyToClipboard } from '../clipboard.js';

interface ReportOptions {
  date?: IsoDate;
  addLinks?: boolean;
  slack?: boolean;
  commits?: string[];
  config?: string;
  verbose?: boolean;
  clipboard: boolean;
}

/** `--date` argument parser */
export function parseDateArgument(value: string): IsoDate {
  try {
    return parseIsoDate(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/** Expand `--commits` values; `all` selects every group */
export function resolveCommitGroups(values: readonly string[] = []): Set<CommitGroup> {
  const groups = new Set<CommitGroup>();
  for (const value of values) {
    if (value === 'all') {
      COMMIT_GROUPS.forEach((group) => groups.add(group));
      continue;
    }
    const group = COMMIT_GROUPS.find((candidate) => candidate === value);
    if (group) groups.add(group);
  }
  return groups;
}

/** Missing Slack variables, as `[ERROR]` messages */
export function slackErrors(settings: Settings): string[] {
  const errors: string[] = [];
  if (!settings.slack.botToken) errors.push(`${settings.slack.botTokenEnv} is not set`);
  if (!settings.slack.userId) errors.push(`${settings.slack.userIdEnv} is not set`);
  return errors;
}

/** Print config errors and stop */
function exitWithErrors(errors: string[]): never {
  for (const error of errors) {
    console.error(chalk.red(`[ERROR] ${error}`));
  }
  console.error(chalk.gray('Set the required environment variables and re-run.'));
  process.exit(1);
}

/** Terminal sink for log entries; info and debug only when verbose */
function createLogPrinter(verbose: boolean, spinner: Ora): (entry: LogEntry) => void {
  return (entry) => {
    const threshold: LogLevel = verbose ? 'debug' : 'warn';
    if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[threshold]) return;

    const line = `[${entry.level.toUpperCase()}] ${entry.message}`;
    const colored =
      entry.level === 'error'
        ? chalk.red(line)
        : entry.level === 'warn'
          ? chalk.yellow(line)
          : chalk.gray(line);

    const spinning = spinner.isSpinning;
    if (spinning) spinner.clear();
    console.error(colored);
    if (spinning) spinner.render();
  };
}

function reportProgress(event: CollectorEvent, spinner: Ora): void {
  const logger = getLogger();
  switch (event.type) {
    case 'fetching':
      spinner.text = event.source === 'plane' ? 'Fetching assigned issues...' : 'Fetching commits...';
      break;
    case 'fetched':
      logger.info('collector', `Fetched ${event.count} item(s) from ${event.source}`);
      break;
    case 'skipped':
      logger.info('collector', `Skipped ${event.source}: ${event.reason}`);
      break;
  }
}

async function runReport(options: ReportOptions): Promise<void> {
  const config = loadConfig(path.resolve(options.config ?? '.'));
  const resolved = resolveSettings(config, process.env);
  if (!resolved.ok) exitWithErrors(resolved.errors);
  const { settings } = resolved;

  if (options.slack) {
    const errors = slackErrors(settings);
    if (errors.length > 0) exitWithErrors(errors);
  }

  const spinner = ora({ text: 'Preparing...', stream: process.stderr });
  const logger = await initLogger({
    logDir: settings.logDir,
    onLog: createLogPrinter(options.verbose ?? false, spinner),
  });

  try {
    const reportDate = today();
    const { range } = resolveReportingRange(options.date, reportDate);
    console.error(chalk.gray(`Reporting period: ${formatRange(range)}`));

    const plane = createPlaneClient({
      apiKey: settings.plane.apiKey,
      workspaceSlug: settings.plane.workspaceSlug,
      baseUrl: settings.plane.baseUrl,
      appUrl: settings.plane.appUrl,
      timeoutMs: settings.plane.requestTimeoutMs,
    });
    const issueSource = createPlaneIssueSource(plane, { projectId: settings.plane.projectId });

    const commitSource = settings.github
      ? createGitHubCommitSource(
          createGitHubClient({ token: settings.github.token, baseUrl: settings.github.baseUrl }),
          { org: settings.github.org, username: settings.github.username }
        )
      : null;
    if (!commitSource) {
      logger.warn('github', 'GitHub token not set; commits are left out');
    }

    spinner.start();
    const { report, matcher } = await collectReport({
      issueSource,
      commitSource,
      range,
      reportDate,
      ticketPrefix: settings.ticketPrefix,
      blockedLabel: settings.blockedLabel,
      reviewKeyword: settings.reviewKeyword,
      onProgress: (event) => reportProgress(event, spinner),
    }).catch((error: unknown) => {
      spinner.fail('Failed to build the report');
      throw error;
    });
    spinner.stop();

    const showCommits = resolveCommitGroups(options.commits);
    const addLinks = options.addLinks ?? false;

    const text = renderPlainReport(report, { showCommits, matcher, addLinks });
    console.log('');
    console.log(text);

    if (options.clipboard) {
      try {
        await copyToClipboard(reportBody(text));
        console.error(chalk.green('\n✓ Copied to clipboard'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('clipboard', `Could not copy to clipboard: ${message}`);
      }
    }

    if (options.slack && settings.slack.botToken && settings.slack.userId) {
      const slackText = renderSlackReport(report, { showCommits, matcher });
      const result = await sendStandupMessage(
        createSlackClient(settings.slack.botToken),
        settings.slack.userId,
        slackText
      );
      if (!result.ok) {
        throw new Error(`Failed to send to Slack: ${result.error ?? 'unknown error'}`);
      }
      console.error(chalk.green('✓ Sent to Slack'));
    }

    const backlog = renderPlainBacklog(report, addLinks);
    if (backlog) {
      console.log('');
      console.log(backlog);
    }
  } finally {
    await logger.close();
  }
}

export function registerReportCommand(program: Command): void {
  program
    .command('report', { isDefault: true })
    .description("Build the standup for the previous workday's activity")
    .option('--date <YYYY-MM-DD>', 'Report on this single day instead', parseDateArgument)
    .option('--add-links', 'Append issue and commit URLs')
    .option('--slack', 'Also send the report to yourself on Slack')
    .addOption(
      new Option('--commits <group...>', 'List commits under issues: all, done, in_progress, orphan')
        .choices(['all', ...COMMIT_GROUPS])
    )
    .option('--config <file>', 'Config file or directory holding .standup.yml')
    .option('--verbose', 'Print progress details to stderr')
    .option('--no-clipboard', 'Do not copy the report to the clipboard')
    .action(async (options: ReportOptions) => {
      await runReport(options);
    });
}
