/**
 * Merges classified issues with ticket-indexed commits into the report
 * structure the templates render.
 */

import type {
  CommitRecord,
  DateRange,
  IsoDate,
  IssueRef,
  StandupReport,
  WorkItem,
} from '@standup-report/core';
import type { ClassifiedIssues } from './classifier.js';
import { compareStrings, titleFromCommits, type TicketIndex } from './tickets.js';

export interface AssembleOptions {
  reportDate: IsoDate;
  range: DateRange;
  /** Link for tickets the tracker did not return */
  browseUrl: (identifier: string) => string;
}

/**
 * Build the report.
 *
 * Commits of done or review tickets are kept aside for `--commits done`.
 * Any other referenced ticket becomes in-progress work, described by the
 * active issue, any other known issue, or failing both by its commits.
 * Active issues with no commits are in progress too.
 */
export function assembleReport(
  issues: ClassifiedIssues,
  commits: TicketIndex,
  options: AssembleOptions
): StandupReport {
  const doneIds = new Set(
    [...issues.done, ...issues.review].map((issue) => issue.identifier)
  );
  const active = new Map(issues.active.map((issue) => [issue.identifier, issue]));

  const doneCommits = new Map<string, CommitRecord[]>();
  const inProgress = new Map<string, WorkItem>();

  for (const [ticket, ticketCommits] of commits.byTicket) {
    if (doneIds.has(ticket)) {
      doneCommits.set(ticket, ticketCommits);
      continue;
    }

    const known: IssueRef | undefined = active.get(ticket) ?? issues.lookup.get(ticket);
    active.delete(ticket);
    inProgress.set(ticket, {
      identifier: ticket,
      title: known ? known.title : titleFromCommits(ticket, ticketCommits),
      url: known ? known.url : options.browseUrl(ticket),
      commits: ticketCommits,
      tracked: known !== undefined,
    });
  }

  for (const [identifier, issue] of active) {
    inProgress.set(identifier, { ...issue, commits: [], tracked: true });
  }

  return {
    reportDate: options.reportDate,
    range: options.range,
    done: issues.done,
    review: issues.review,
    inProgress: [...inProgress.values()].sort((a, b) =>
      compareStrings(a.identifier, b.identifier)
    ),
    blocked: issues.blocked,
    backlog: [...issues.backlog].sort(compareIssueRefs),
    doneCommits,
    orphanCommits: commits.orphans,
  };
}

/** Sort by identifier, then title, then URL */
function compareIssueRefs(a: IssueRef, b: IssueRef): number {
  return (
    compareStrings(a.identifier, b.identifier) ||
    compareStrings(a.title, b.title) ||
    compareStrings(a.url, b.url)
  );
}
