/**
 * Plain-text standup template, printed to the terminal and copied to
 * the clipboard.
 */

import type { CommitRecord, IssueRef, StandupReport } from '@standup-report/core';
import {
  EMPTY_LINE,
  NEED_TASKS_LINE,
  NOT_BLOCKED_LINE,
  SECTION,
  groupCommitLines,
  shortSha,
  type TemplateOptions,
} from './sections.js';

export interface PlainTemplateOptions extends TemplateOptions {
  /** Append issue and commit URLs */
  addLinks: boolean;
}

/**
 * Render the report. The first line is the header and the second is
 * blank; {@link reportBody} drops both.
 */
export function renderPlainReport(
  report: StandupReport,
  options: PlainTemplateOptions
): string {
  const { showCommits, addLinks } = options;
  const lines = [`Daily standup — ${report.reportDate}`, ''];

  const issueLine = (issue: IssueRef, suffix = ''): string => {
    const title = issue.title ? ` — ${issue.title}` : '';
    const link = addLinks && issue.url ? ` ${issue.url}` : '';
    return `• ${issue.identifier}${title}${suffix}${link}`;
  };
  const commitLines = (commits: CommitRecord[]): string[] =>
    renderPlainCommits(commits, options);

  lines.push(SECTION.done);
  if (report.done.length > 0) {
    for (const issue of report.done) {
      lines.push(issueLine(issue));
      if (showCommits.has('done')) {
        lines.push(...commitLines(report.doneCommits.get(issue.identifier) ?? []));
      }
    }
  } else {
    lines.push(EMPTY_LINE);
  }

  if (report.review.length > 0) {
    lines.push('', SECTION.review);
    for (const issue of report.review) {
      lines.push(issueLine(issue));
      if (showCommits.has('done')) {
        lines.push(...commitLines(report.doneCommits.get(issue.identifier) ?? []));
      }
    }
  }

  lines.push('', SECTION.inProgress);
  if (report.inProgress.length > 0) {
    for (const item of report.inProgress) {
      lines.push(issueLine(item));
      if (showCommits.has('in_progress')) {
        lines.push(...commitLines(item.commits));
      }
    }
  } else {
    lines.push(EMPTY_LINE);
  }

  if (showCommits.has('orphan') && report.orphanCommits.length > 0) {
    lines.push('', SECTION.orphanCommits);
    lines.push(...commitLines(report.orphanCommits));
  }

  lines.push('', SECTION.blocked);
  if (report.blocked.length > 0) {
    for (const issue of report.blocked) {
      lines.push(issueLine(issue, ' blocked'));
    }
  } else {
    lines.push(NOT_BLOCKED_LINE);
  }

  lines.push('', SECTION.needTasks, NEED_TASKS_LINE);

  return lines.join('\n');
}

/** Indented `↳ message (sha, sha)` lines */
export function renderPlainCommits(
  commits: CommitRecord[],
  options: PlainTemplateOptions
): string[] {
  return groupCommitLines(commits, options.matcher).map(({ message, commits: grouped }) => {
    const shas = grouped
      .map((c) => (options.addLinks ? `${shortSha(c.sha)} ${c.url}` : shortSha(c.sha)))
      .join(', ');
    return `  ↳ ${message} (${shas})`;
  });
}

/** The report without its header line and the blank line after it */
export function reportBody(text: string): string {
  return text.split('\n').slice(2).join('\n');
}

/**
 * Backlog listing for the terminal. Empty when there is no backlog.
 */
export function renderPlainBacklog(report: StandupReport, addLinks: boolean): string {
  if (report.backlog.length === 0) return '';
  const lines = ['--- Backlog (assigned, not started) ---'];
  for (const issue of report.backlog) {
    const link = addLinks ? ` ${issue.url}` : '';
    lines.push(`• ${issue.identifier} — ${issue.title}${link}`);
  }
  return lines.join('\n');
}
