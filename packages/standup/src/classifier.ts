/**
 * Sorts tracked issues into report buckets.
 *
 * Precedence, first match wins:
 *   backlog/unstarted → backlog (whatever the update date)
 *   not updated within the range → skipped
 *   completed → done
 *   state name mentions review → review
 *   blocked label → blocked
 *   started → active
 *   anything else → skipped
 */

import {
  isWithinRange,
  type DateRange,
  type IssueBucket,
  type IssueRef,
  type TrackedIssue,
} from '@standup-report/core';

export interface ClassifierOptions {
  range: DateRange;
  /** Lower-case label that marks an issue blocked */
  blockedLabel?: string;
  /** Lower-case word that marks a review state */
  reviewKeyword?: string;
}

/** Issues grouped by bucket, each list in tracker order */
export interface ClassifiedIssues {
  backlog: IssueRef[];
  done: IssueRef[];
  review: IssueRef[];
  blocked: IssueRef[];
  active: IssueRef[];
  /** Every issue by identifier, skipped ones included */
  lookup: Map<string, IssueRef>;
}

/**
 * The bucket for a single issue, or null when it does not belong in
 * the report.
 */
export function classifyIssue(
  issue: TrackedIssue,
  options: ClassifierOptions
): IssueBucket | null {
  const blockedLabel = options.blockedLabel ?? 'blocked';
  const reviewKeyword = options.reviewKeyword ?? 'review';

  if (issue.stateGroup === 'backlog' || issue.stateGroup === 'unstarted') {
    return 'backlog';
  }
  if (!isWithinRange(issue.updatedAt, options.range)) {
    return null;
  }
  if (issue.stateGroup === 'completed') {
    return 'done';
  }
  if (issue.stateName.toLowerCase().includes(reviewKeyword)) {
    return 'review';
  }
  if (issue.labels.includes(blockedLabel)) {
    return 'blocked';
  }
  if (issue.stateGroup === 'started') {
    return 'active';
  }
  return null;
}

export function toIssueRef(issue: TrackedIssue): IssueRef {
  return { identifier: issue.identifier, title: issue.title, url: issue.url };
}

/** Classify every issue; each lands in at most one bucket */
export function classifyIssues(
  issues: TrackedIssue[],
  options: ClassifierOptions
): ClassifiedIssues {
  const result: ClassifiedIssues = {
    backlog: [],
    done: [],
    review: [],
    blocked: [],
    active: [],
    lookup: new Map(),
  };

  for (const issue of issues) {
    const ref = toIssueRef(issue);
    result.lookup.set(ref.identifier, ref);

    const bucket = classifyIssue(issue, options);
    if (bucket) {
      result[bucket].push(ref);
    }
  }

  return result;
}
