/**
 * Section titles and commit grouping shared by the plain-text and
 * Slack templates.
 */

import type { CommitGroup, CommitRecord } from '@standup-report/core';
import type { TicketMatcher } from '../tickets.js';
import { displayMessage } from '../tickets.js';

export const SECTION = {
  done: ':white_check_mark: Done:',
  review: ':eyes: Moved to review:',
  inProgress: ':arrows_counterclockwise: In progress / planned (with ETA):',
  orphanCommits: ':ghost: Commits without ticket:',
  blocked: ':no_entry: Blocked:',
  needTasks: ':jigsaw: Need tasks (Optional):',
  backlog: ':card_index: Backlog (assigned, not started):',
} as const;

export const EMPTY_LINE = '• —';
export const NOT_BLOCKED_LINE = '• No';
export const NEED_TASKS_LINE = '• Need tasks: no';

/** Short SHA as shown in reports */
export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}

/** Commits sharing a display message */
export interface CommitLine {
  message: string;
  commits: CommitRecord[];
}

/**
 * Group commits by display message, keeping first-seen order.
 */
export function groupCommitLines(
  commits: CommitRecord[],
  matcher: TicketMatcher
): CommitLine[] {
  const groups = new Map<string, CommitRecord[]>();
  for (const commit of commits) {
    const message = displayMessage(commit.message, matcher);
    const group = groups.get(message) ?? [];
    group.push(commit);
    groups.set(message, group);
  }
  return [...groups].map(([message, grouped]) => ({ message, commits: grouped }));
}

/** Options shared by both templates */
export interface TemplateOptions {
  /** Commit groups to list under their issues */
  showCommits: ReadonlySet<CommitGroup>;
  matcher: TicketMatcher;
}
