/**
 * Slack notification module. Sends run outcome messages via Slack Web API (chat.postMessage). Falls back to a log line if no token.
 */

import { request } from 'node:https';

import type { Logger } from 'pino';

/** Posts `text` to a Slack channel. */
export type SlackPoster = (
  token: string,
  channel: string,
  text: string,
) => Promise<void>;

/** Notification configuration. */
export interface NotifyConfig {
  slackToken: string | null;
  logger: Logger;
  /** Replaces the HTTPS call to chat.postMessage. */
  post?: SlackPoster;
}

/** Summary of a finished run, as reported to the channel. */
export interface RunOutcome {
  runId: string;
  mode: string;
  durationMs: number;
  /** Artifact count on success. */
  artifacts?: number;
  /** Stage that failed: policy, publish or verify. */
  stage?: string;
  error?: string | null;
}

/** Notifier interface for run completion events. */
export interface Notifier {
  notifySuccess(outcome: RunOutcome, channel: string): Promise<void>;
  notifyFailure(outcome: RunOutcome, channel: string): Promise<void>;
}

/** Post a message to Slack via chat.postMessage API. */
const postToSlack: SlackPoster = (token, channel, text) =>
  new Promise((resolve, reject) => {
    const payload = JSON.stringify({ channel, text });

    const req = request(
      'https://slack.com/api/chat.postMessage',
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
          'Content-Length': Buffer.byteLength(payload),
        },
      },
      (res) => {
        let body = '';
        res.on('data', (chunk: Buffer) => {
          body += chunk.toString();
        });
        res.on('end', () => {
          if (res.statusCode === 200) {
            resolve();
          } else {
            reject(
              new Error(
                `Slack API returned ${String(res.statusCode)}: ${body}`,
              ),
            );
          }
        });
      },
    );

    req.on('error', reject);
    req.write(payload);
    req.end();
  });

/** Message text for an accepted, published run. */
export function formatSuccess(outcome: RunOutcome): string {
  const durationSec = (outcome.durationMs / 1000).toFixed(1);
  const artifacts =
    outcome.artifacts === undefined
      ? ''
      : `, ${String(outcome.artifacts)} artifacts`;
  return `✅ *${outcome.runId}* ${outcome.mode} run completed (${durationSec}s${artifacts})`;
}

/** Message text for a rejected or failed run. */
export function formatFailure(outcome: RunOutcome): string {
  const durationSec = (outcome.durationMs / 1000).toFixed(1);
  const stage = outcome.stage ? ` at ${outcome.stage}` : '';
  const errorMsg = outcome.error ? `: ${outcome.error}` : '';
  return `⚠️ *${outcome.runId}* ${outcome.mode} run failed${stage} (${durationSec}s)${errorMsg}`;
}

/**
 * Create a notifier that sends Slack messages for run events. If no token, logs a warning and returns silently.
 */
export function createNotifier(config: NotifyConfig): Notifier {
  const { slackToken, logger } = config;
  const post = config.post ?? postToSlack;

  return {
    async notifySuccess(outcome: RunOutcome, channel: string): Promise<void> {
      if (!slackToken) {
        logger.warn(
          { runId: outcome.runId },
          'No Slack token configured, skipping success notification',
        );
        return;
      }
      await post(slackToken, channel, formatSuccess(outcome));
    },

    async notifyFailure(outcome: RunOutcome, channel: string): Promise<void> {
      if (!slackToken) {
        logger.warn(
          { runId: outcome.runId },
          'No Slack token configured, skipping failure notification',
        );
        return;
      }
      await post(slackToken, channel, formatFailure(outcome));
    },
  };
}
