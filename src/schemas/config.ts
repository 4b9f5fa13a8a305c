/**
 * JobIntel configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

import { runModeSchema } from './run-report.js';

/**
 * Provider policy thresholds. Every field is optional here; LIVE mode requires
 * all of them together, which `resolvePolicyConfig` enforces.
 */
const policySchema = z.object({
  /** Maximum tolerated errors / (errors + jobs). */
  errorRateMax: z.number().optional(),
  /** Minimum jobs an attempt must collect. */
  minJobs: z.number().optional(),
  /** Maximum tolerated snapshot-fallback ratio (a ceiling despite the name). */
  minSnapshotRatio: z.number().optional(),
  /** Attempts before the run is rejected. */
  maxAttempts: z.number().optional(),
  /** Backoff base in seconds. */
  backoffBase: z.number().optional(),
  /** Backoff cap in seconds. */
  backoffMax: z.number().optional(),
  /** Apply symmetric ±10% jitter to backoff delays. */
  jitter: z.boolean().default(false),
});

/** Destination sub-schema. Provider and profile have no defaults. */
const destinationSchema = z.object({
  prefix: z.string().default('jobintel'),
  provider: z.string().optional(),
  profile: z.string().optional(),
});

/** Object store backend. */
const storeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('s3'),
    /** Target bucket. */
    bucket: z.string().min(1),
    /** AWS region; the SDK default chain applies when unset. */
    region: z.string().optional(),
  }),
  z.object({
    kind: z.literal('fs'),
    /** Root directory of the filesystem mirror. */
    root: z.string().min(1),
  }),
]);

/** Publish behavior. */
const publishSchema = z.object({
  /** Publish accepted runs to the object store. */
  enabled: z.boolean().default(false),
  /** Compute and report writes without performing them. */
  dryRun: z.boolean().default(false),
  /** Parallel run-scoped writes. */
  concurrency: z.number().int().min(1).default(4),
  /** Deadline for the run-scoped writes, in milliseconds. */
  timeoutMs: z.number().int().positive().default(120000),
  /** Deadline for the latest batch and state pointers, in milliseconds. */
  pointerTimeoutMs: z.number().int().positive().default(30000),
  /** Verify the store against the plan after a successful publish. */
  verify: z.boolean().default(true),
});

/** Pipeline attempt execution. */
const attemptSchema = z.object({
  /** Pipeline script spawned once per attempt. */
  script: z.string().optional(),
  /** Per-attempt timeout in milliseconds. */
  timeoutMs: z.number().int().positive().optional(),
});

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal, silent). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  /** Optional log file path. */
  file: z.string().optional(),
});

/** Notification configuration sub-schema. */
const notificationsSchema = z.object({
  /** Path to Slack bot token file. */
  slackTokenPath: z.string().optional(),
  /** Slack channel ID for rejected runs and failed publishes. */
  defaultOnFailure: z.string().nullable().default(null),
  /** Slack channel ID for published runs. */
  defaultOnSuccess: z.string().nullable().default(null),
});

/** Full configuration schema. Validates and provides defaults. */
export const jobIntelConfigSchema = z.object({
  /** Run mode; SNAPSHOT unless LIVE is requested explicitly. */
  mode: runModeSchema.default('SNAPSHOT'),
  /** Directory holding one subdirectory per run. */
  runsDir: z.string().default('./data/runs'),
  policy: policySchema.default({}),
  destination: destinationSchema.default({}),
  store: storeSchema.optional(),
  publish: publishSchema.default({}),
  attempt: attemptSchema.default({}),
  log: logSchema.default({ level: 'info' }),
  notifications: notificationsSchema.default({
    defaultOnFailure: null,
    defaultOnSuccess: null,
  }),
});

/** Inferred configuration type. */
export type JobIntelConfig = z.infer<typeof jobIntelConfigSchema>;
/** Raw policy section as configured. */
export type PolicySettings = JobIntelConfig['policy'];
/** Object store section. */
export type StoreConfig = NonNullable<JobIntelConfig['store']>;
