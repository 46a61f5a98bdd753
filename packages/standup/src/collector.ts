/**
 * Data collector for standup reports.
 * Pulls assigned issues and the user's commits from their sources, then
 * classifies, indexes and merges them into a {@link StandupReport}.
 */

import {
  getLogger,
  type CommitRecord,
  type CommitSource,
  type DateRange,
  type IsoDate,
  type IssueSource,
  type StandupReport,
} from '@standup-report/core';
import { assembleReport } from './assembler.js';
import { classifyIssues } from './classifier.js';
import { createTicketMatcher, indexCommitsByTicket, type TicketMatcher } from './tickets.js';

// ─── Interfaces ───────────────────────────────────────────────────

/** Progress notifications for a UI layer */
export type CollectorEvent =
  | { type: 'fetching'; source: string }
  | { type: 'fetched'; source: string; count: number }
  | { type: 'skipped'; source: string; reason: string };

/** Options for the collection process */
export interface CollectorOptions {
  issueSource: IssueSource;
  /** Null when no code host is configured; the report then has no commits */
  commitSource: CommitSource | null;
  range: DateRange;
  reportDate: IsoDate;
  ticketPrefix: string;
  blockedLabel?: string;
  reviewKeyword?: string;
  onProgress?: (event: CollectorEvent) => void;
}

export interface CollectedReport {
  report: StandupReport;
  /** The matcher used for ticket references, reused by the templates */
  matcher: TicketMatcher;
}

// ─── Collection Logic ─────────────────────────────────────────────

/**
 * Fetch, classify and merge everything the report needs.
 * Source failures propagate.
 */
export async function collectReport(options: CollectorOptions): Promise<CollectedReport> {
  const { issueSource, commitSource, range, onProgress } = options;
  const logger = getLogger();
  const matcher = createTicketMatcher(options.ticketPrefix);

  onProgress?.({ type: 'fetching', source: issueSource.name });
  const issues = await issueSource.fetchAssignedIssues();
  onProgress?.({ type: 'fetched', source: issueSource.name, count: issues.length });

  const classified = classifyIssues(issues, {
    range,
    blockedLabel: options.blockedLabel,
    reviewKeyword: options.reviewKeyword,
  });
  logger.debug('collector', 'Classified issues', {
    backlog: classified.backlog.length,
    done: classified.done.length,
    review: classified.review.length,
    blocked: classified.blocked.length,
    active: classified.active.length,
  });

  let commits: CommitRecord[] = [];
  if (commitSource) {
    onProgress?.({ type: 'fetching', source: commitSource.name });
    commits = await commitSource.fetchCommits(range);
    onProgress?.({ type: 'fetched', source: commitSource.name, count: commits.length });
  } else {
    onProgress?.({ type: 'skipped', source: 'commits', reason: 'no code host configured' });
  }

  const index = indexCommitsByTicket(commits, matcher);
  logger.debug('collector', 'Indexed commits', {
    tickets: index.byTicket.size,
    orphans: index.orphans.length,
  });

  const report = assembleReport(classified, index, {
    reportDate: options.reportDate,
    range,
    browseUrl: (identifier) => issueSource.browseUrl(identifier),
  });

  return { report, matcher };
}
