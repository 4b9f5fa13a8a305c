/**
 * Tests for Slack notifier with an injected poster.
 */

import { describe, expect, it, vi } from 'vitest';

import { silentLogger } from '../lib/logger.js';
import {
  createNotifier,
  formatFailure,
  formatSuccess,
  type SlackPoster,
} from './slack.js';

describe('Slack notifier', () => {
  it('should format success message correctly', () => {
    expect(
      formatSuccess({
        runId: '20260101T000000000Z',
        mode: 'LIVE',
        durationMs: 1234,
        artifacts: 3,
      }),
    ).toBe('✅ *20260101T000000000Z* LIVE run completed (1.2s, 3 artifacts)');
  });

  it('should format failure message correctly', () => {
    expect(
      formatFailure({
        runId: '20260101T000000000Z',
        mode: 'LIVE',
        durationMs: 2000,
        stage: 'policy',
        error: 'jobs_collected 40 < min_jobs 50',
      }),
    ).toBe(
      '⚠️ *20260101T000000000Z* LIVE run failed at policy (2.0s): jobs_collected 40 < min_jobs 50',
    );
  });

  it('should post to the channel when a token is set', async () => {
    const post = vi.fn<SlackPoster>().mockResolvedValue(undefined);
    const notifier = createNotifier({
      slackToken: 'test-token',
      logger: silentLogger(),
      post,
    });

    await notifier.notifyFailure(
      { runId: '20260101T000000000Z', mode: 'SNAPSHOT', durationMs: 500 },
      'alerts',
    );

    expect(post).toHaveBeenCalledWith(
      'test-token',
      'alerts',
      '⚠️ *20260101T000000000Z* SNAPSHOT run failed (0.5s)',
    );
  });

  it('should handle missing token gracefully', async () => {
    const logger = silentLogger();
    const warnSpy = vi.spyOn(logger, 'warn');
    const post = vi.fn<SlackPoster>();
    const notifier = createNotifier({ slackToken: null, logger, post });

    await expect(
      notifier.notifySuccess(
        { runId: '20260101T000000000Z', mode: 'LIVE', durationMs: 1000 },
        'test-channel',
      ),
    ).resolves.toBeUndefined();

    expect(post).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should propagate poster errors', async () => {
    const post = vi
      .fn<SlackPoster>()
      .mockRejectedValue(new Error('Slack API returned 500: channel_not_found'));
    const notifier = createNotifier({
      slackToken: 'test-token',
      logger: silentLogger(),
      post,
    });

    await expect(
      notifier.notifySuccess(
        { runId: '20260101T000000000Z', mode: 'LIVE', durationMs: 1 },
        'error-channel',
      ),
    ).rejects.toThrow('channel_not_found');
  });
});
