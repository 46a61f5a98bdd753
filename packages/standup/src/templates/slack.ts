/**
 * Slack mrkdwn standup template. Issues and SHAs become links, section
 * titles are bold, and the backlog is appended below a rule.
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

/** Escape the three characters Slack treats as control sequences */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Bold the title after a section's emoji */
export function boldSection(section: string): string {
  const space = section.indexOf(' ');
  if (space === -1) return `*${section}*`;
  return `${section.slice(0, space)} *${section.slice(space + 1)}*`;
}

function slackLink(url: string, label: string): string {
  return url ? `<${url}|${label}>` : label;
}

export function renderSlackReport(report: StandupReport, options: TemplateOptions): string {
  const { showCommits } = options;
  const lines = [`*Daily standup — ${report.reportDate}*`, ''];

  const issueLine = (issue: IssueRef, suffix = ''): string => {
    const title = issue.title ? ` — ${escapeMrkdwn(issue.title)}` : '';
    return `• ${slackLink(issue.url, issue.identifier)}${title}${suffix}`;
  };
  const commitLines = (commits: CommitRecord[]): string[] =>
    renderSlackCommits(commits, options);

  lines.push(boldSection(SECTION.done));
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
    lines.push('', boldSection(SECTION.review));
    for (const issue of report.review) {
      lines.push(issueLine(issue));
      if (showCommits.has('done')) {
        lines.push(...commitLines(report.doneCommits.get(issue.identifier) ?? []));
      }
    }
  }

  lines.push('', boldSection(SECTION.inProgress));
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
    lines.push('', boldSection(SECTION.orphanCommits));
    lines.push(...commitLines(report.orphanCommits));
  }

  lines.push('', boldSection(SECTION.blocked));
  if (report.blocked.length > 0) {
    for (const issue of report.blocked) {
      lines.push(issueLine(issue, ' — blocked'));
    }
  } else {
    lines.push(NOT_BLOCKED_LINE);
  }

  lines.push('', boldSection(SECTION.needTasks), NEED_TASKS_LINE);

  if (report.backlog.length > 0) {
    lines.push('', '---', boldSection(SECTION.backlog));
    for (const issue of report.backlog) {
      lines.push(issueLine(issue));
    }
  }

  return lines.join('\n');
}

/** Indented `↳ message (<url|sha>, …)` lines */
export function renderSlackCommits(
  commits: CommitRecord[],
  options: TemplateOptions
): string[] {
  return groupCommitLines(commits, options.matcher).map(({ message, commits: grouped }) => {
    const shas = grouped.map((c) => slackLink(c.url, shortSha(c.sha))).join(', ');
    return `  ↳ ${escapeMrkdwn(message)} (${shas})`;
  });
}
