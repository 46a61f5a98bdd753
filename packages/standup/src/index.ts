/**
 * @standup-report/standup - Turns tracked issues and commits into a
 * daily standup: classification, ticket extraction, merging and the
 * plain-text and Slack templates.
 */

// ─── Main API ─────────────────────────────────────────────────────

export {
  collectReport,
  type CollectorOptions,
  type CollectorEvent,
  type CollectedReport,
} from './collector.js';

// ─── Classification ───────────────────────────────────────────────

export {
  classifyIssue,
  classifyIssues,
  toIssueRef,
  type ClassifierOptions,
  type ClassifiedIssues,
} from './classifier.js';

// ─── Tickets ──────────────────────────────────────────────────────

export {
  createTicketMatcher,
  indexCommitsByTicket,
  isMergeCommit,
  displayMessage,
  titleFromCommits,
  compareStrings,
  type TicketMatcher,
  type TicketIndex,
} from './tickets.js';

export { assembleReport, type AssembleOptions } from './assembler.js';

// ─── Templates ────────────────────────────────────────────────────

export {
  renderPlainReport,
  renderPlainCommits,
  renderPlainBacklog,
  reportBody,
  type PlainTemplateOptions,
} from './templates/plain.js';
export {
  renderSlackReport,
  renderSlackCommits,
  escapeMrkdwn,
  boldSection,
} from './templates/slack.js';
export {
  SECTION,
  groupCommitLines,
  shortSha,
  type CommitLine,
  type TemplateOptions,
} from './templates/sections.js';
