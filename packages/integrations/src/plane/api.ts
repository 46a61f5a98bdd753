/**
 * Plane REST API v1 client.
 * Provides typed functions for the handful of Plane endpoints a standup
 * needs: the current member, projects, states and work items.
 * Uses the standard fetch API with `X-API-Key` authentication.
 */

import {
  getLogger,
  type IssueSource,
  type StateGroup,
  type TrackedIssue,
} from '@standup-report/core';

// ─── Types ────────────────────────────────────────────────────────

/** Options for creating a Plane API client */
export interface PlaneClientOptions {
  /** Personal access token */
  apiKey: string;
  /** Workspace slug, e.g. "my-workspace" */
  workspaceSlug: string;
  /** API base URL (default: Plane Cloud) */
  baseUrl?: string;
  /** Web app URL used to build issue links */
  appUrl?: string;
  /** Per-request timeout */
  timeoutMs?: number;
}

/** Plane API client instance */
export interface PlaneClient {
  apiKey: string;
  workspaceSlug: string;
  baseUrl: string;
  appUrl: string;
  timeoutMs: number;
}

/** The authenticated member */
export interface PlaneMember {
  id: string;
  displayName: string;
}

/** A Plane project */
export interface PlaneProject {
  id: string;
  name: string;
  /** Short key used in issue identifiers, e.g. "DATA" */
  identifier: string;
}

/** A workflow state of a project */
export interface PlaneState {
  id: string;
  name: string;
  group: StateGroup | null;
}

// ─── Client ──────────────────────────────────────────────────────

const PLANE_CLOUD_BASE = 'https://api.plane.so/api/v1';
const PLANE_CLOUD_APP = 'https://app.plane.so';
const DEFAULT_TIMEOUT_MS = 15_000;

const STATE_GROUPS: readonly StateGroup[] = [
  'backlog',
  'unstarted',
  'started',
  'completed',
  'cancelled',
  'triage',
];

/**
 * Create a Plane API client.
 */
export function createPlaneClient(options: PlaneClientOptions): PlaneClient {
  return {
    apiKey: options.apiKey,
    workspaceSlug: options.workspaceSlug,
    baseUrl: options.baseUrl ?? PLANE_CLOUD_BASE,
    appUrl: options.appUrl ?? PLANE_CLOUD_APP,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };
}

// ─── API Functions ───────────────────────────────────────────────

/** Return the authenticated member */
export async function getMe(client: PlaneClient): Promise<PlaneMember> {
  const raw = await fetchJson<RawMember>(client, '/users/me/');
  return {
    id: raw.id,
    displayName: raw.display_name ?? raw.email ?? raw.id,
  };
}

/** Return every project in the workspace */
export async function listProjects(client: PlaneClient): Promise<PlaneProject[]> {
  const data = await fetchJson<Paginated<RawProject>>(
    client,
    `/workspaces/${client.workspaceSlug}/projects/`
  );
  return unwrap(data).map(mapProject);
}

/** Return a single project */
export async function getProject(
  client: PlaneClient,
  projectId: string
): Promise<PlaneProject> {
  const raw = await fetchJson<RawProject>(
    client,
    `/workspaces/${client.workspaceSlug}/projects/${projectId}/`
  );
  return mapProject(raw);
}

/** Return a project's states keyed by state id */
export async function listStates(
  client: PlaneClient,
  projectId: string
): Promise<Map<string, PlaneState>> {
  const data = await fetchJson<Paginated<RawState>>(
    client,
    `/workspaces/${client.workspaceSlug}/projects/${projectId}/states/`
  );
  const states = new Map<string, PlaneState>();
  for (const raw of unwrap(data)) {
    states.set(raw.id, {
      id: raw.id,
      name: raw.name ?? '',
      group: toStateGroup(raw.group ?? raw.type),
    });
  }
  return states;
}

/**
 * Fetch every work item of a project.
 * The API ignores assignee filters, so callers filter the result
 * client-side with {@link isAssignedTo}.
 */
export async function listWorkItems(
  client: PlaneClient,
  projectId: string
): Promise<RawWorkItem[]> {
  const items: RawWorkItem[] = [];
  const path = `/workspaces/${client.workspaceSlug}/projects/${projectId}/work-items/`;

  for (let page = 1; ; page++) {
    const data = await fetchJson<Paginated<RawWorkItem>>(client, path, { page: String(page) });
    if (Array.isArray(data)) {
      items.push(...data);
      break;
    }
    const results = data.results ?? [];
    items.push(...results);
    if (results.length === 0 || !hasNextPage(data)) break;
  }

  return items;
}

/** Whether a member is among a work item's assignees */
export function isAssignedTo(item: RawWorkItem, memberId: string): boolean {
  return (item.assignees ?? []).some((assignee) =>
    typeof assignee === 'string' ? assignee === memberId : assignee.id === memberId
  );
}

/** Web link to an issue */
export function issueUrl(client: PlaneClient, projectId: string, issueId: string): string {
  return `${client.appUrl}/${client.workspaceSlug}/projects/${projectId}/issues/${issueId}`;
}

/** Shortlink for a ticket identifier, used for tickets Plane did not return */
export function browseUrl(client: PlaneClient, identifier: string): string {
  return `${client.appUrl}/${client.workspaceSlug}/browse/${identifier}/`;
}

/** Convert a raw work item into the shared issue shape */
export function toTrackedIssue(
  client: PlaneClient,
  project: PlaneProject,
  states: Map<string, PlaneState>,
  item: RawWorkItem
): TrackedIssue {
  const state = item.state ? states.get(item.state) : undefined;
  // Label ids without details carry no name
  const labelSource: Array<string | { name?: string }> =
    item.label_details ?? item.labels ?? [];
  const labels = labelSource
    .map((label) => (typeof label === 'string' ? '' : (label.name ?? '')))
    .filter((name) => name.length > 0)
    .map((name) => name.toLowerCase());

  return {
    id: item.id,
    identifier: `${project.identifier}-${item.sequence_id ?? item.id}`,
    title: item.name ?? item.title ?? 'Untitled',
    stateGroup: state?.group ?? null,
    stateName: state?.name ?? '',
    updatedAt: item.updated_at ?? null,
    assigneeIds: (item.assignees ?? []).flatMap((a) =>
      typeof a === 'string' ? [a] : a.id ? [a.id] : []
    ),
    labels,
    projectId: project.id,
    url: issueUrl(client, project.id, item.id),
  };
}

// ─── Issue Source ────────────────────────────────────────────────

export interface PlaneIssueSourceOptions {
  /** Restrict the scan to a single project */
  projectId?: string;
}

/**
 * An {@link IssueSource} over a Plane workspace.
 * The member lookup and project listing are fatal; a project whose
 * states or work items fail to load is skipped with a warning.
 */
export function createPlaneIssueSource(
  client: PlaneClient,
  options: PlaneIssueSourceOptions = {}
): IssueSource {
  return {
    name: 'plane',

    async fetchAssignedIssues(): Promise<TrackedIssue[]> {
      const logger = getLogger();
      const me = await getMe(client);
      logger.info('plane', `Authenticated as: ${me.displayName} (${me.id})`);

      const projects = options.projectId
        ? [await getProject(client, options.projectId)]
        : await listProjects(client);

      const issues: TrackedIssue[] = [];
      for (const project of projects) {
        logger.info('plane', `Project: ${project.name}`);
        try {
          const states = await listStates(client, project.id);
          const items = await listWorkItems(client, project.id);
          for (const item of items) {
            if (isAssignedTo(item, me.id)) {
              issues.push(toTrackedIssue(client, project, states, item));
            }
          }
        } catch (error) {
          if (!(error instanceof PlaneApiError)) throw error;
          logger.warn('plane', `Skipping project ${project.id}: ${error.message}`, {
            status: error.status,
          });
        }
      }
      return issues;
    },

    browseUrl(identifier: string): string {
      return browseUrl(client, identifier);
    },
  };
}

// ─── HTTP Helpers ────────────────────────────────────────────────

/** Make an authenticated GET request and decode the JSON body */
async function fetchJson<T>(
  client: PlaneClient,
  path: string,
  params: Record<string, string> = {}
): Promise<T> {
  const query = new URLSearchParams(params).toString();
  const url = `${client.baseUrl}${path}${query ? `?${query}` : ''}`;
  getLogger().request('plane', 'GET', url);

  const response = await fetch(url, {
    headers: {
      'X-API-Key': client.apiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    signal: AbortSignal.timeout(client.timeoutMs),
  });

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new PlaneApiError(response.status, body, url);
  }

  return response.json() as Promise<T>;
}

/** Plane returns either a bare list or a `{ results }` envelope */
function unwrap<T>(data: Paginated<T>): T[] {
  return Array.isArray(data) ? data : (data.results ?? []);
}

function hasNextPage(data: PageEnvelope<unknown>): boolean {
  return Boolean(data.next) || data.next_page_results === true;
}

function mapProject(raw: RawProject): PlaneProject {
  return {
    id: raw.id,
    name: raw.name ?? raw.id,
    identifier: raw.identifier ?? raw.name ?? '??',
  };
}

function toStateGroup(value: string | undefined): StateGroup | null {
  return STATE_GROUPS.find((group) => group === value) ?? null;
}

// ─── Error Types ─────────────────────────────────────────────────

/** Custom error for Plane API responses */
export class PlaneApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string
  ) {
    super(`Plane API error ${status} for ${url}${body ? `: ${body}` : ''}`);
    this.name = 'PlaneApiError';
  }
}

// ─── Raw API Response Types ──────────────────────────────────────

interface PageEnvelope<T> {
  results?: T[];
  next?: string | null;
  next_page_results?: boolean;
}

type Paginated<T> = T[] | PageEnvelope<T>;

interface RawMember {
  id: string;
  display_name?: string;
  email?: string;
}

interface RawProject {
  id: string;
  name?: string;
  identifier?: string;
}

interface RawState {
  id: string;
  name?: string;
  group?: string;
  type?: string;
}

/** Raw work item from the API */
export interface RawWorkItem {
  id: string;
  name?: string;
  title?: string;
  sequence_id?: number | string;
  state?: string | null;
  updated_at?: string | null;
  assignees?: Array<string | { id?: string }>;
  label_details?: Array<{ name?: string }>;
  labels?: Array<string | { name?: string }>;
}
