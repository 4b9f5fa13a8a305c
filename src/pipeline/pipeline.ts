/**
 * Pipeline orchestrator. Wires a run end to end: attempts under the policy
 * gate, report persistence, then plan, publish and verify for accepted runs,
 * and finally notifications.
 */

import type { Logger } from 'pino';

import { ConfigurationError } from '../lib/errors.js';
import { createRunIdFactory } from '../lib/run-id.js';
import type { SleepFn } from '../lib/sleep.js';
import type { Notifier, RunOutcome } from '../notify/slack.js';
import { evaluateAndRetry, type RunAttemptFn } from '../policy/engine.js';
import { resolvePolicyConfig } from '../policy/policy.js';
import { latestEntries, plan, resolveDestination } from '../publish/planner.js';
import { publish } from '../publish/publisher.js';
import { type ActualSource, verify } from '../publish/verifier.js';
import { collectArtifacts } from '../runs/artifacts.js';
import {
  createRunRepository,
  type RunRepository,
} from '../runs/run-repository.js';
import type { JobIntelConfig } from '../schemas/config.js';
import type {
  PublishPlan,
  PublishResult,
  VerifyReport,
} from '../schemas/publish.js';
import type { RunReport } from '../schemas/run-report.js';
import { createObjectStore } from '../storage/create-store.js';
import type { ObjectStoreClient } from '../storage/object-store.js';
import { createScriptAttempt } from './attempt-executor.js';

/** Terminal outcome of a pipeline run. */
export type PipelineStatus =
  | 'rejected'
  | 'accepted'
  | 'dry_run'
  | 'published'
  | 'publish_failed'
  | 'verify_failed';

/** Everything a pipeline run produced. */
export interface PipelineResult {
  runId: string;
  status: PipelineStatus;
  report: RunReport;
  plan: PublishPlan | null;
  publishResult: PublishResult | null;
  verifyReport: VerifyReport | null;
  durationMs: number;
}

/** Pipeline dependencies. */
export interface PipelineDeps {
  logger: Logger;
  /** Defaults to a file-system repository at `config.runsDir`. */
  repository?: RunRepository;
  /** Defaults to the store built from `config.store`; null means none. */
  store?: ObjectStoreClient | null;
  notifier?: Notifier | null;
  /** Defaults to spawning `config.attempt.script`. */
  runAttempt?: RunAttemptFn;
  runIdFactory?: () => string;
  /** External cancellation for the run. */
  signal?: AbortSignal;
  sleep?: SleepFn;
  random?: () => number;
}

/** Where `verifyRun` reads actual state from. */
export type VerifySourceKind = 'store' | 'local' | 'publish-result';

/** Options for verifying a recorded run. */
export interface VerifyRunOptions {
  source: VerifySourceKind;
  /** Check only the latest-pointer entries. */
  latestOnly?: boolean;
  /** Expected plan; defaults to the run's saved plan. */
  expected?: PublishPlan;
}

/** Pipeline interface. */
export interface Pipeline {
  /** Execute a new run through every stage. */
  run(): Promise<PipelineResult>;
  /** Plan a recorded run and save the plan beside it. */
  planRun(runId: string): Promise<PublishPlan>;
  /** Publish a recorded run (or simulate it) and save the result. */
  publishRun(
    runId: string,
    options?: { dryRun?: boolean },
  ): Promise<{ plan: PublishPlan; result: PublishResult }>;
  /** Verify a recorded run and save the report. */
  verifyRun(runId: string, options: VerifyRunOptions): Promise<VerifyReport>;
}

/**
 * Create the pipeline. Configuration problems surface as ConfigurationError
 * before any attempt runs or any file is written.
 */
export function createPipeline(
  config: JobIntelConfig,
  deps: PipelineDeps,
): Pipeline {
  const { logger } = deps;
  const repository = deps.repository ?? createRunRepository(config.runsDir);
  const nextRunId = deps.runIdFactory ?? createRunIdFactory();
  const notifier = deps.notifier ?? null;
  let store: ObjectStoreClient | null | undefined = deps.store;

  function getStore(): ObjectStoreClient | null {
    if (store === undefined) {
      store = config.store ? createObjectStore(config.store) : null;
    }
    return store;
  }

  function requireStore(): ObjectStoreClient {
    const client = getStore();
    if (!client) {
      throw new ConfigurationError(
        'No object store configured (set store or JOBINTEL_S3_BUCKET)',
      );
    }
    return client;
  }

  function resolveRunAttempt(): RunAttemptFn {
    if (deps.runAttempt) return deps.runAttempt;
    const { script, timeoutMs } = config.attempt;
    if (!script) {
      throw new ConfigurationError('attempt.script is required to run the pipeline');
    }
    return createScriptAttempt({
      script,
      timeoutMs,
      logger,
      outputDir: (runId) => repository.outputDir(runId),
    });
  }

  async function notify(
    success: boolean,
    outcome: RunOutcome,
  ): Promise<void> {
    if (!notifier) return;
    const channel = success
      ? config.notifications.defaultOnSuccess
      : config.notifications.defaultOnFailure;
    if (!channel) return;
    const send = success
      ? notifier.notifySuccess(outcome, channel)
      : notifier.notifyFailure(outcome, channel);
    await send.catch((err: unknown) => {
      logger.error({ runId: outcome.runId, err }, 'Notification failed');
    });
  }

  async function planRun(runId: string): Promise<PublishPlan> {
    const report = await repository.loadRunReport(runId);
    const publishPlan = plan(report, config.destination);
    await repository.savePlan(publishPlan);
    logger.info(
      { runId, entries: publishPlan.entries.length },
      'Publish plan saved',
    );
    return publishPlan;
  }

  async function publishPlanned(
    publishPlan: PublishPlan,
    dryRun: boolean,
  ): Promise<PublishResult> {
    const result = await publish(publishPlan, dryRun ? null : requireStore(), {
      dryRun,
      runDir: repository.outputDir(publishPlan.runId),
      concurrency: config.publish.concurrency,
      timeoutMs: config.publish.timeoutMs,
      pointerTimeoutMs: config.publish.pointerTimeoutMs,
      signal: deps.signal,
      logger,
    });
    await repository.savePublishResult(result);
    return result;
  }

  async function sourceFor(
    runId: string,
    kind: VerifySourceKind,
  ): Promise<ActualSource> {
    switch (kind) {
      case 'store':
        return { kind: 'store', client: requireStore() };
      case 'local':
        return { kind: 'local', runDir: repository.outputDir(runId) };
      case 'publish-result':
        return {
          kind: 'publish-result',
          result: await repository.loadPublishResult(runId),
        };
    }
  }

  async function verifyPlanned(
    expected: PublishPlan,
    source: ActualSource,
    latestOnly: boolean,
  ): Promise<VerifyReport> {
    const target = latestOnly
      ? { ...expected, entries: latestEntries(expected) }
      : expected;
    const verifyReport = await verify(target, source, {
      concurrency: config.publish.concurrency,
      timeoutMs: config.publish.timeoutMs,
      signal: deps.signal,
      logger,
    });
    await repository.saveVerifyReport(verifyReport);
    return verifyReport;
  }

  return {
    async run(): Promise<PipelineResult> {
      const startTime = Date.now();
      const { mode } = config;
      const publishing = config.publish.enabled;
      const dryRun = config.publish.dryRun;

      // Fail on configuration before side effects.
      const runAttempt = resolveRunAttempt();
      if (mode === 'LIVE') resolvePolicyConfig(config.policy);
      if (publishing) {
        resolveDestination(config.destination);
        if (!dryRun) requireStore();
      }

      const runId = nextRunId();
      await repository.createRun(runId);
      const runLogger = logger.child({ runId });
      runLogger.info({ mode, publishing, dryRun }, 'Run started');

      const report = await evaluateAndRetry(runAttempt, config.policy, {
        runId,
        mode,
        signal: deps.signal,
        collectArtifacts: () => collectArtifacts(repository.outputDir(runId)),
        sleep: deps.sleep,
        random: deps.random,
        logger: runLogger,
      });
      await repository.saveRunReport(report);
      await repository.setLastRun(runId);

      const finish = async (
        status: PipelineStatus,
        extra: Partial<
          Pick<PipelineResult, 'plan' | 'publishResult' | 'verifyReport'>
        > = {},
        failure?: { stage: string; error: string },
      ): Promise<PipelineResult> => {
        const durationMs = Date.now() - startTime;
        runLogger.info({ status, durationMs }, 'Run finished');
        await notify(!failure, {
          runId,
          mode,
          durationMs,
          artifacts: report.artifacts.length,
          stage: failure?.stage,
          error: failure?.error,
        });
        return {
          runId,
          status,
          report,
          plan: extra.plan ?? null,
          publishResult: extra.publishResult ?? null,
          verifyReport: extra.verifyReport ?? null,
          durationMs,
        };
      };

      if (!report.accepted) {
        const last = report.decisionTrace.at(-1);
        return finish('rejected', {}, {
          stage: 'policy',
          error: report.cancelled
            ? 'cancelled'
            : (last?.reasons.join('; ') ?? 'attempt failed'),
        });
      }
      if (!publishing) return finish('accepted');

      const publishPlan = plan(report, config.destination);
      await repository.savePlan(publishPlan);
      const publishResult = await publishPlanned(publishPlan, dryRun);

      if (publishResult.status === 'failed') {
        return finish(
          'publish_failed',
          { plan: publishPlan, publishResult },
          {
            stage: 'publish',
            error:
              publishResult.counts.failed > 0
                ? `${String(publishResult.counts.failed)} write(s) failed`
                : `state pointer write failed: ${publishResult.pointerWrite.error ?? 'unknown error'}`,
          },
        );
      }

      if (!config.publish.verify) {
        return finish(dryRun ? 'dry_run' : 'published', {
          plan: publishPlan,
          publishResult,
        });
      }

      const source: ActualSource = dryRun
        ? { kind: 'publish-result', result: publishResult }
        : { kind: 'store', client: requireStore() };
      const verifyReport = await verifyPlanned(publishPlan, source, false);
      const extra = { plan: publishPlan, publishResult, verifyReport };

      if (!verifyReport.ok) {
        return finish('verify_failed', extra, {
          stage: 'verify',
          error: `${String(verifyReport.missing.length)} missing, ${String(verifyReport.mismatched.length)} mismatched`,
        });
      }
      return finish(dryRun ? 'dry_run' : 'published', extra);
    },

    planRun,

    async publishRun(runId, options = {}) {
      const dryRun = options.dryRun ?? config.publish.dryRun;
      const publishPlan = await planRun(runId);
      const result = await publishPlanned(publishPlan, dryRun);
      return { plan: publishPlan, result };
    },

    async verifyRun(runId, options) {
      const expected = options.expected ?? (await repository.loadPlan(runId));
      return verifyPlanned(
        expected,
        await sourceFor(runId, options.source),
        options.latestOnly ?? false,
      );
    },
  };
}
