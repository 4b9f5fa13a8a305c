/**
 * Run policy engine. Drives provider attempts through a bounded retry loop and
 * gates LIVE runs on the acceptance predicate. SNAPSHOT runs bypass the gate.
 *
 * @module
 */

import type { Logger } from 'pino';

import { errorMessage } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import { sleep as defaultSleep, type SleepFn } from '../lib/sleep.js';
import { finalizeRunReport } from '../report/run-report.js';
import type { PolicySettings } from '../schemas/config.js';
import {
  type Artifact,
  type AttemptMetrics,
  attemptMetricsSchema,
  type DecisionRecord,
  type RunMode,
  type RunReport,
} from '../schemas/run-report.js';
import {
  backoffDelay,
  evaluateAttempt,
  type PolicyConfig,
  resolvePolicyConfig,
} from './policy.js';

/** Engine states. ACCEPTED and REJECTED are terminal. */
export type PolicyState =
  | 'PENDING'
  | 'ATTEMPTING'
  | 'BACKOFF'
  | 'ACCEPTED'
  | 'REJECTED';

const VALID_TRANSITIONS: Record<PolicyState, readonly PolicyState[]> = {
  PENDING: ['ATTEMPTING', 'REJECTED'],
  ATTEMPTING: ['BACKOFF', 'ACCEPTED', 'REJECTED'],
  BACKOFF: ['ATTEMPTING', 'REJECTED'],
  ACCEPTED: [],
  REJECTED: [],
};

/** Move to `target`, throwing on a transition the table does not allow. */
export function transitionPolicyState(
  current: PolicyState,
  target: PolicyState,
): PolicyState {
  if (!VALID_TRANSITIONS[current].includes(target)) {
    throw new Error(`Invalid policy state transition: ${current} -> ${target}`);
  }
  return target;
}

/** Whether no further attempt may follow. */
export function isTerminalPolicyState(state: PolicyState): boolean {
  return state === 'ACCEPTED' || state === 'REJECTED';
}

/** Context handed to each attempt. */
export interface AttemptContext {
  runId: string;
  mode: RunMode;
  /** 1-based attempt number. */
  attempt: number;
  /** Aborts when the run is cancelled; attempts must release their resources. */
  signal: AbortSignal;
}

/** Performs one pipeline attempt and reports its provider metrics. */
export type RunAttemptFn = (ctx: AttemptContext) => Promise<AttemptMetrics>;

/** Options for a policy-gated run. */
export interface EvaluateOptions {
  runId: string;
  mode: RunMode;
  /** External cancellation. A cancelled run is always rejected. */
  signal?: AbortSignal;
  /** Called once, only when the run is accepted, to list its artifacts. */
  collectArtifacts?: () => Promise<Artifact[]>;
  sleep?: SleepFn;
  random?: () => number;
  logger?: Logger;
}

/** Metrics recorded for an attempt that threw instead of reporting. */
const FAILED_ATTEMPT_METRICS: AttemptMetrics = {
  jobsCollected: 0,
  errors: 1,
  snapshotFallbackRatio: 0,
};

async function runSnapshot(
  runFn: RunAttemptFn,
  options: EvaluateOptions,
  signal: AbortSignal,
  logger: Logger,
): Promise<RunReport> {
  const { runId, collectArtifacts } = options;
  const rejected = () =>
    finalizeRunReport({
      runId,
      mode: 'SNAPSHOT',
      artifacts: [],
      accepted: false,
      cancelled: signal.aborted,
      decisionTrace: [],
    });

  if (signal.aborted) {
    logger.warn({ runId }, 'SNAPSHOT run cancelled before starting');
    return rejected();
  }
  try {
    await runFn({ runId, mode: 'SNAPSHOT', attempt: 1, signal });
  } catch (err: unknown) {
    logger.error({ runId, err }, 'SNAPSHOT attempt failed');
    return rejected();
  }
  const artifacts = collectArtifacts ? await collectArtifacts() : [];
  if (signal.aborted) {
    logger.warn({ runId }, 'SNAPSHOT run cancelled');
    return rejected();
  }
  logger.info(
    { runId, artifacts: artifacts.length },
    'SNAPSHOT run accepted without policy gate',
  );
  return finalizeRunReport({
    runId,
    mode: 'SNAPSHOT',
    artifacts,
    accepted: true,
    cancelled: false,
    decisionTrace: [],
  });
}

async function runLive(
  runFn: RunAttemptFn,
  policy: PolicyConfig,
  options: EvaluateOptions,
  signal: AbortSignal,
  logger: Logger,
): Promise<RunReport> {
  const { runId, collectArtifacts } = options;
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;

  let state: PolicyState = 'PENDING';
  let cancelled = false;
  let lastMetrics: AttemptMetrics | undefined;
  let artifacts: Artifact[] = [];
  const trace: DecisionRecord[] = [];

  for (let attempt = 1; !isTerminalPolicyState(state); attempt++) {
    if (signal.aborted) {
      cancelled = true;
      state = transitionPolicyState(state, 'REJECTED');
      break;
    }
    state = transitionPolicyState(state, 'ATTEMPTING');
    logger.info({ runId, attempt }, 'Starting provider attempt');

    let metrics: AttemptMetrics;
    let failure: string | null = null;
    try {
      metrics = attemptMetricsSchema.parse(
        await runFn({ runId, mode: 'LIVE', attempt, signal }),
      );
    } catch (err: unknown) {
      failure = errorMessage(err);
      metrics = FAILED_ATTEMPT_METRICS;
    }
    lastMetrics = metrics;

    const evaluation = evaluateAttempt(metrics, policy);
    const reasons = failure
      ? [`attempt failed: ${failure}`]
      : [...evaluation.reasons];
    if (signal.aborted) reasons.push('cancelled');
    const passed = evaluation.passed && !failure && !signal.aborted;
    const retry = !passed && !signal.aborted && attempt < policy.maxAttempts;
    const delay = retry ? backoffDelay(attempt, policy, random) : 0;

    trace.push({
      attemptNumber: attempt,
      errorRate: evaluation.errorRate,
      jobsCollected: metrics.jobsCollected,
      snapshotFallbackRatio: metrics.snapshotFallbackRatio,
      decision: passed ? 'accept' : failure ? 'error' : 'reject',
      backoffDelay: delay,
      reasons,
    });

    if (passed) {
      logger.info(
        { runId, attempt, errorRate: evaluation.errorRate },
        'Attempt accepted',
      );
      artifacts = collectArtifacts ? await collectArtifacts() : [];
      if (signal.aborted) {
        cancelled = true;
        artifacts = [];
        state = transitionPolicyState(state, 'REJECTED');
      } else {
        state = transitionPolicyState(state, 'ACCEPTED');
      }
    } else if (retry) {
      logger.warn(
        { runId, attempt, reasons, backoffSeconds: delay },
        'Attempt rejected, backing off',
      );
      state = transitionPolicyState(state, 'BACKOFF');
      try {
        await sleep(delay, signal);
      } catch (err: unknown) {
        if (!signal.aborted) throw err;
        // Aborted mid-backoff; the loop head records the cancellation.
      }
    } else {
      if (signal.aborted) cancelled = true;
      logger.warn({ runId, attempt, reasons }, 'Attempt rejected, no retries left');
      state = transitionPolicyState(state, 'REJECTED');
    }
  }

  const accepted = state === 'ACCEPTED';

  logger.info(
    { runId, accepted, cancelled, attempts: trace.length },
    accepted ? 'LIVE run accepted' : 'LIVE run rejected',
  );

  return finalizeRunReport({
    runId,
    mode: 'LIVE',
    providerMetrics: lastMetrics
      ? { ...lastMetrics, attemptsUsed: trace.length }
      : undefined,
    artifacts,
    accepted,
    cancelled,
    decisionTrace: trace,
  });
}

/**
 * Run the pipeline under the policy gate and return the finalized report.
 *
 * LIVE mode resolves the policy first; a missing threshold throws
 * ConfigurationError before `runFn` is ever called. Attempt failures never
 * escape: only the terminal accepted/rejected outcome is observable.
 */
export async function evaluateAndRetry(
  runFn: RunAttemptFn,
  policy: Partial<PolicySettings>,
  options: EvaluateOptions,
): Promise<RunReport> {
  const logger = options.logger ?? silentLogger();
  const signal = options.signal ?? new AbortController().signal;

  if (options.mode === 'SNAPSHOT') {
    return runSnapshot(runFn, options, signal, logger);
  }

  const resolved = resolvePolicyConfig(policy);
  return runLive(runFn, resolved, options, signal, logger);
}
