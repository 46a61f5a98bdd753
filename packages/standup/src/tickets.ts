/**
 * Ticket references in commit messages.
 * A reference is `<PREFIX>-<digits>` as a whole word, matched without
 * regard to case and normalised to upper case.
 */

import type { CommitRecord } from '@standup-report/core';

const MERGE_RE = /^Merge /i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matcher for one ticket prefix */
export interface TicketMatcher {
  readonly prefix: string;
  /** Every ticket referenced in `text`, upper-cased, in order of appearance */
  extract(text: string): string[];
  /** `text` with every ticket reference removed */
  strip(text: string): string;
}

export function createTicketMatcher(prefix: string): TicketMatcher {
  const source = `\\b(${escapeRegExp(prefix)}-\\d+)\\b`;

  return {
    prefix: prefix.toUpperCase(),

    extract(text: string): string[] {
      return Array.from(text.matchAll(new RegExp(source, 'gi')), (m) => m[1].toUpperCase());
    },

    strip(text: string): string {
      return text.replace(new RegExp(source, 'gi'), '');
    },
  };
}

/** Merge commits carry no work of their own */
export function isMergeCommit(message: string): boolean {
  return MERGE_RE.test(message);
}

/** Commits grouped by the tickets they reference */
export interface TicketIndex {
  /** Ticket → commits, tickets and commits sorted */
  byTicket: Map<string, CommitRecord[]>;
  /** Commits that reference no ticket, sorted */
  orphans: CommitRecord[];
}

/**
 * Group commits by ticket reference.
 * Merge commits are dropped; a commit naming several tickets is filed
 * under each; duplicates (same SHA) collapse.
 */
export function indexCommitsByTicket(
  commits: CommitRecord[],
  matcher: TicketMatcher
): TicketIndex {
  const byTicket = new Map<string, Map<string, CommitRecord>>();
  const orphans = new Map<string, CommitRecord>();

  for (const commit of commits) {
    if (isMergeCommit(commit.message)) continue;

    const tickets = matcher.extract(commit.message);
    if (tickets.length === 0) {
      orphans.set(commit.sha, commit);
      continue;
    }
    for (const ticket of tickets) {
      const bucket = byTicket.get(ticket) ?? new Map<string, CommitRecord>();
      bucket.set(commit.sha, commit);
      byTicket.set(ticket, bucket);
    }
  }

  const sorted = new Map<string, CommitRecord[]>();
  for (const ticket of [...byTicket.keys()].sort(compareStrings)) {
    sorted.set(ticket, sortCommits([...(byTicket.get(ticket)?.values() ?? [])]));
  }

  return { byTicket: sorted, orphans: sortCommits([...orphans.values()]) };
}

/**
 * The commit message as shown under a ticket: references removed and
 * leading separators trimmed.
 */
export function displayMessage(message: string, matcher: TicketMatcher): string {
  return matcher
    .strip(message)
    .replace(/^[ \-–—]+/, '')
    .trim();
}

/**
 * A title for a ticket that only appears in commit messages.
 * Uses the first message that still has text after removing a leading
 * `TICKET -`, `TICKET:`, `TICKET –` or `TICKET —`.
 */
export function titleFromCommits(ticket: string, commits: CommitRecord[]): string {
  const prefixRe = new RegExp(`^\\s*${escapeRegExp(ticket)}\\s*[-–—:]\\s*`, 'i');
  for (const commit of commits) {
    const cleaned = commit.message.replace(prefixRe, '').trim();
    if (cleaned) return cleaned;
  }
  return '';
}

/** Code-point order, matching a plain sort of ASCII identifiers */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortCommits(commits: CommitRecord[]): CommitRecord[] {
  return commits.sort((a, b) => compareStrings(a.sha, b.sha));
}
