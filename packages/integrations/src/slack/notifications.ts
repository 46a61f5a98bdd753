/**
 * Slack delivery for standup reports.
 * Posts mrkdwn text as a direct message from a bot; a user id works as
 * the channel for `chat.postMessage`.
 */

import { WebClient } from '@slack/web-api';
import { getLogger } from '@standup-report/core';

// ─── Types ────────────────────────────────────────────────────────

/** Result of sending a Slack notification */
export interface NotificationResult {
  /** Whether the message was sent successfully */
  ok: boolean;
  /** The Slack timestamp of the sent message (used as message ID) */
  ts?: string;
  /** The channel the message was sent to */
  channel: string;
  /** Error message if sending failed */
  error?: string;
}

/** Slack client instance - the WebClient from @slack/web-api */
export type SlackClient = WebClient;

/** Create a Slack Web API client for a bot token */
export function createSlackClient(botToken: string): SlackClient {
  return new WebClient(botToken);
}

// ─── Notification Functions ───────────────────────────────────────

/**
 * Send a standup report as a DM to `userId`.
 */
export async function sendStandupMessage(
  client: SlackClient,
  userId: string,
  text: string
): Promise<NotificationResult> {
  return sendMessage(client, userId, text);
}

// ─── Core Send Function ──────────────────────────────────────────

/**
 * Send a Slack message and wrap errors into a consistent result.
 * The WebClient throws for `ok: false` API responses, so both paths
 * end up here.
 */
async function sendMessage(
  client: SlackClient,
  channel: string,
  text: string
): Promise<NotificationResult> {
  try {
    const response = await client.chat.postMessage({
      channel,
      text,
      mrkdwn: true,
      unfurl_links: false,
    });

    if (!response.ok) {
      return { ok: false, channel, error: response.error ?? 'unknown_error' };
    }
    return { ok: true, ts: response.ts, channel };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    getLogger().error('slack', `Failed to send message to ${channel}: ${errorMessage}`);

    return {
      ok: false,
      channel,
      error: errorMessage,
    };
  }
}
