/**
 * YAML configuration loader for .standup.yml files.
 * Handles loading, validation, default values and resolving the
 * environment variables the config points at.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';

export const CONFIG_FILENAME = '.standup.yml';

const configSchema = z.object({
  version: z.number().default(1),
  plane: z
    .object({
      baseUrl: z.string().url().default('https://api.plane.so/api/v1'),
      appUrl: z.string().url().default('https://app.plane.so'),
      apiKeyEnv: z.string().default('PLANE_API_KEY'),
      workspaceSlugEnv: z.string().default('PLANE_WORKSPACE_SLUG'),
      projectIdEnv: z.string().default('PLANE_PROJECT_ID'),
      requestTimeoutMs: z.number().int().positive().default(15_000),
    })
    .default({}),
  github: z
    .object({
      tokenEnv: z.string().default('GITHUB_TOKEN'),
      orgEnv: z.string().default('GITHUB_ORG'),
      usernameEnv: z.string().default('GITHUB_USERNAME'),
      baseUrl: z.string().url().optional(),
    })
    .default({}),
  slack: z
    .object({
      botTokenEnv: z.string().default('SLACK_BOT_TOKEN'),
      userIdEnv: z.string().default('SLACK_USER_ID'),
    })
    .default({}),
  tickets: z
    .object({
      prefix: z
        .string()
        .regex(/^[A-Za-z][A-Za-z0-9]*$/, 'ticket prefix must be alphanumeric')
        .default('DATA'),
    })
    .default({}),
  report: z
    .object({
      blockedLabel: z.string().default('blocked'),
      reviewKeyword: z.string().default('review'),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().optional(),
    })
    .default({}),
});

export type StandupConfig = z.infer<typeof configSchema>;

/** Default configuration when no .standup.yml is found */
export function getDefaultConfig(): StandupConfig {
  return configSchema.parse({});
}

/**
 * Load and validate a config file.
 * `configPath` may be a file or a directory holding `.standup.yml`;
 * falls back to defaults if the file doesn't exist.
 */
export function loadConfig(configPath: string): StandupConfig {
  const filePath =
    fs.existsSync(configPath) && fs.statSync(configPath).isDirectory()
      ? path.join(configPath, CONFIG_FILENAME)
      : configPath;

  if (!fs.existsSync(filePath)) {
    return getDefaultConfig();
  }

  const raw = fs.readFileSync(filePath, 'utf-8');
  const parsed = yaml.load(raw) ?? {};

  // Convert snake_case YAML keys to camelCase for TS
  const result = configSchema.safeParse(normalizeKeys(parsed));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${path.basename(filePath)}: ${issues}`);
  }
  return result.data;
}

/**
 * Write a default .standup.yml to the given directory.
 */
export function writeDefaultConfig(dir: string): string {
  const configPath = path.join(dir, CONFIG_FILENAME);
  const defaultYaml = `version: 1

# Plane project tracker. Secrets stay in the environment; these
# settings name the variables to read them from.
plane:
  base_url: https://api.plane.so/api/v1
  app_url: https://app.plane.so
  api_key_env: PLANE_API_KEY
  workspace_slug_env: PLANE_WORKSPACE_SLUG
  # Leave the variable unset to scan every project in the workspace
  project_id_env: PLANE_PROJECT_ID
  request_timeout_ms: 15000

# GitHub commits (skipped when the token variable is empty)
github:
  token_env: GITHUB_TOKEN
  org_env: GITHUB_ORG
  username_env: GITHUB_USERNAME

# Slack DM delivery for --slack
slack:
  bot_token_env: SLACK_BOT_TOKEN
  user_id_env: SLACK_USER_ID

# Ticket references in commit messages look like PREFIX-123
tickets:
  prefix: DATA

report:
  blocked_label: blocked
  # Issues whose state name contains this word are "moved to review"
  review_keyword: review

# logging:
#   dir: .standup/logs
`;

  fs.writeFileSync(configPath, defaultYaml, 'utf-8');
  return configPath;
}

/** Recursively convert snake_case keys to camelCase */
export function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}

// ─── Environment ───────────────────────────────────────────────────

export interface PlaneSettings {
  apiKey: string;
  workspaceSlug: string;
  projectId?: string;
  baseUrl: string;
  appUrl: string;
  requestTimeoutMs: number;
}

export interface GitHubSettings {
  token: string;
  org: string;
  username: string;
  baseUrl?: string;
}

export interface SlackSettings {
  botToken?: string;
  userId?: string;
  botTokenEnv: string;
  userIdEnv: string;
}

export interface Settings {
  plane: PlaneSettings;
  /** Null when no GitHub token is configured */
  github: GitHubSettings | null;
  slack: SlackSettings;
  ticketPrefix: string;
  blockedLabel: string;
  reviewKeyword: string;
  logDir?: string;
}

export type SettingsResult =
  | { ok: true; settings: Settings }
  | { ok: false; errors: string[] };

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve the config against the environment.
 * The Plane key and workspace are required; everything else is optional.
 */
export function resolveSettings(config: StandupConfig, env: Env): SettingsResult {
  const errors: string[] = [];

  const apiKey = read(env, config.plane.apiKeyEnv);
  const workspaceSlug = read(env, config.plane.workspaceSlugEnv);
  if (!apiKey) errors.push(`${config.plane.apiKeyEnv} is not set`);
  if (!workspaceSlug) errors.push(`${config.plane.workspaceSlugEnv} is not set`);

  const token = read(env, config.github.tokenEnv);
  const org = read(env, config.github.orgEnv);
  const username = read(env, config.github.usernameEnv);
  if (token && !org) errors.push(`${config.github.orgEnv} is not set`);
  if (token && !username) errors.push(`${config.github.usernameEnv} is not set`);

  if (!apiKey || !workspaceSlug || errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    settings: {
      plane: {
        apiKey,
        workspaceSlug,
        projectId: read(env, config.plane.projectIdEnv),
        baseUrl: config.plane.baseUrl.replace(/\/+$/, ''),
        appUrl: config.plane.appUrl.replace(/\/+$/, ''),
        requestTimeoutMs: config.plane.requestTimeoutMs,
      },
      github:
        token && org && username
          ? { token, org, username, baseUrl: config.github.baseUrl }
          : null,
      slack: {
        botToken: read(env, config.slack.botTokenEnv),
        userId: read(env, config.slack.userIdEnv),
        botTokenEnv: config.slack.botTokenEnv,
        userIdEnv: config.slack.userIdEnv,
      },
      ticketPrefix: config.tickets.prefix.toUpperCase(),
      blockedLabel: config.report.blockedLabel.toLowerCase(),
      reviewKeyword: config.report.reviewKeyword.toLowerCase(),
      logDir: config.logging.dir,
    },
  };
}
