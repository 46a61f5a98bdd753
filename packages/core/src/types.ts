/**
 * Shared type definitions for standup-report.
 * Everything here is transient: built once per run and discarded.
 */

// ─── Dates ─────────────────────────────────────────────────────────

/** Calendar date in `YYYY-MM-DD` form */
export type IsoDate = string;

/** Inclusive range of calendar days a report covers */
export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

// ─── Issue Types ───────────────────────────────────────────────────

/** The tracker's coarse status category */
export type StateGroup =
  | 'backlog'
  | 'unstarted'
  | 'started'
  | 'completed'
  | 'cancelled'
  | 'triage';

/** A work item assigned to the reporting user */
export interface TrackedIssue {
  /** Tracker-internal id (UUID in Plane) */
  id: string;
  /** Human identifier, e.g. `DATA-123` */
  identifier: string;
  title: string;
  stateGroup: StateGroup | null;
  stateName: string;
  /** ISO timestamp of the last update, if the tracker reported one */
  updatedAt: string | null;
  assigneeIds: string[];
  /** Lower-cased label names */
  labels: string[];
  projectId: string;
  url: string;
}

/** Where an issue lands in the report */
export type IssueBucket = 'backlog' | 'done' | 'review' | 'blocked' | 'active';

/** The part of an issue that reports render */
export interface IssueRef {
  identifier: string;
  title: string;
  url: string;
}

// ─── Commit Types ──────────────────────────────────────────────────

/** A single commit on a repository's default branch */
export interface CommitRecord {
  sha: string;
  /** First line of the commit message */
  message: string;
  author: string;
  timestamp: string;
  repo: string;
  url: string;
}

/** Report groups whose commits can be shown with `--commits` */
export type CommitGroup = 'done' | 'in_progress' | 'orphan';

export const COMMIT_GROUPS: readonly CommitGroup[] = ['done', 'in_progress', 'orphan'];

// ─── Report Types ──────────────────────────────────────────────────

/** An in-progress entry: a ticket plus the commits that referenced it */
export interface WorkItem extends IssueRef {
  commits: CommitRecord[];
  /** False when the ticket only appeared in commit messages */
  tracked: boolean;
}

/** Everything the report templates need */
export interface StandupReport {
  /** The day the report is produced (shown in its header) */
  reportDate: IsoDate;
  range: DateRange;
  done: IssueRef[];
  review: IssueRef[];
  inProgress: WorkItem[];
  blocked: IssueRef[];
  backlog: IssueRef[];
  /** Commits of done and review tickets, keyed by ticket */
  doneCommits: Map<string, CommitRecord[]>;
  orphanCommits: CommitRecord[];
}

// ─── Source Interfaces ─────────────────────────────────────────────

/**
 * A project tracker that can list the issues assigned to the
 * authenticated user.
 */
export interface IssueSource {
  readonly name: string;
  fetchAssignedIssues(): Promise<TrackedIssue[]>;
  /** Link for a ticket the tracker did not return */
  browseUrl(identifier: string): string;
}

/** A code host that can list a user's commits within a date range */
export interface CommitSource {
  readonly name: string;
  fetchCommits(range: DateRange): Promise<CommitRecord[]>;
}
