/**
 * Provider policy: threshold resolution, the per-attempt acceptance predicate
 * and the capped exponential backoff schedule.
 *
 * @module
 */

import { ConfigurationError } from '../lib/errors.js';
import type { PolicySettings } from '../schemas/config.js';
import type { AttemptMetrics } from '../schemas/run-report.js';

/** Fully resolved LIVE policy. Every threshold is present. */
export interface PolicyConfig {
  readonly errorRateMax: number;
  readonly minJobs: number;
  /** Ceiling on the snapshot-fallback ratio. */
  readonly minSnapshotRatio: number;
  readonly maxAttempts: number;
  /** Seconds. */
  readonly backoffBase: number;
  /** Seconds. */
  readonly backoffMax: number;
  readonly jitter: boolean;
}

/** Outcome of the acceptance predicate for one attempt. */
export interface AttemptEvaluation {
  passed: boolean;
  errorRate: number;
  /** Failed thresholds, empty when passed. */
  reasons: string[];
}

const REQUIRED_FIELDS = [
  'errorRateMax',
  'minJobs',
  'minSnapshotRatio',
  'maxAttempts',
  'backoffBase',
  'backoffMax',
] as const;

/**
 * Resolve raw settings into a complete LIVE policy. Missing or out-of-range
 * thresholds raise ConfigurationError; nothing is defaulted.
 */
export function resolvePolicyConfig(
  settings: Partial<PolicySettings>,
): PolicyConfig {
  const missing = REQUIRED_FIELDS.filter((field) => settings[field] === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `LIVE mode requires policy thresholds: missing ${missing.join(', ')}`,
      missing.map((field) => `policy.${field}: required in LIVE mode`),
    );
  }

  // Missing fields were rejected above; NaN only satisfies the type checker.
  const read = (field: (typeof REQUIRED_FIELDS)[number]): number =>
    settings[field] ?? Number.NaN;
  const errorRateMax = read('errorRateMax');
  const minJobs = read('minJobs');
  const minSnapshotRatio = read('minSnapshotRatio');
  const maxAttempts = read('maxAttempts');
  const backoffBase = read('backoffBase');
  const backoffMax = read('backoffMax');

  const issues: string[] = [];
  const inUnit = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;
  if (!inUnit(errorRateMax)) issues.push('policy.errorRateMax: must be in [0, 1]');
  if (!Number.isInteger(minJobs) || minJobs < 0) {
    issues.push('policy.minJobs: must be an integer >= 0');
  }
  if (!inUnit(minSnapshotRatio)) issues.push('policy.minSnapshotRatio: must be in [0, 1]');
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    issues.push('policy.maxAttempts: must be an integer >= 1');
  }
  if (!Number.isFinite(backoffBase) || backoffBase <= 0) {
    issues.push('policy.backoffBase: must be > 0');
  }
  if (!Number.isFinite(backoffMax) || backoffMax < backoffBase) {
    issues.push('policy.backoffMax: must be >= backoffBase');
  }
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid policy: ${issues.join('; ')}`, issues);
  }

  return Object.freeze({
    errorRateMax,
    minJobs,
    minSnapshotRatio,
    maxAttempts,
    backoffBase,
    backoffMax,
    jitter: settings.jitter ?? false,
  });
}

/** errors / max(1, errors + jobsCollected). */
export function computeErrorRate(metrics: AttemptMetrics): number {
  return metrics.errors / Math.max(1, metrics.errors + metrics.jobsCollected);
}

/** Apply all three thresholds. Any single failure rejects the attempt. */
export function evaluateAttempt(
  metrics: AttemptMetrics,
  policy: PolicyConfig,
): AttemptEvaluation {
  const errorRate = computeErrorRate(metrics);
  const reasons: string[] = [];
  if (errorRate > policy.errorRateMax) {
    reasons.push(
      `error_rate ${errorRate.toFixed(4)} > error_rate_max ${String(policy.errorRateMax)}`,
    );
  }
  if (metrics.jobsCollected < policy.minJobs) {
    reasons.push(
      `jobs_collected ${String(metrics.jobsCollected)} < min_jobs ${String(policy.minJobs)}`,
    );
  }
  if (metrics.snapshotFallbackRatio > policy.minSnapshotRatio) {
    reasons.push(
      `snapshot_fallback_ratio ${String(metrics.snapshotFallbackRatio)} > min_snapshot_ratio ${String(policy.minSnapshotRatio)}`,
    );
  }
  return { passed: reasons.length === 0, errorRate, reasons };
}

/**
 * Seconds to sleep after failing attempt `attempt` (1-based):
 * `min(backoffBase * 2^(attempt-1), backoffMax)`. With jitter enabled the
 * delay is scaled by a factor in [0.9, 1.1] and then capped again, so
 * `backoffMax` stays a hard ceiling: a delay already at the cap can only be
 * shortened, to as little as `0.9 * backoffMax`.
 */
export function backoffDelay(
  attempt: number,
  policy: PolicyConfig,
  random: () => number = Math.random,
): number {
  const base = Math.min(policy.backoffBase * 2 ** (attempt - 1), policy.backoffMax);
  if (!policy.jitter) return base;
  const factor = 1 + (random() * 2 - 1) * 0.1;
  return Math.min(base * factor, policy.backoffMax);
}
