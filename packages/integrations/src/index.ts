/**
 * @standup-report/integrations - External service clients.
 * Plane for tracked issues, GitHub for commits and Slack for delivery.
 */

// ─── Plane ────────────────────────────────────────────────────────

export {
  createPlaneClient,
  createPlaneIssueSource,
  getMe,
  listProjects,
  getProject,
  listStates,
  listWorkItems,
  isAssignedTo,
  issueUrl,
  browseUrl,
  toTrackedIssue,
  PlaneApiError,
  type PlaneClientOptions,
  type PlaneClient,
  type PlaneMember,
  type PlaneProject,
  type PlaneState,
  type PlaneIssueSourceOptions,
  type RawWorkItem,
} from './plane/api.js';

// ─── GitHub ───────────────────────────────────────────────────────

export {
  createGitHubClient,
  createGitHubCommitSource,
  listOrgRepos,
  listCommits,
  isOctokitError,
  type GitHubClientOptions,
  type GitHubCommitSourceOptions,
  type RepoRef,
  type CommitQuery,
} from './github/api.js';

// ─── Slack ────────────────────────────────────────────────────────

export {
  createSlackClient,
  sendStandupMessage,
  type NotificationResult,
  type SlackClient,
} from './slack/notifications.js';
