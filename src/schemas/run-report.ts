/**
 * Run report schema and types. The run report is the envelope around one
 * pipeline execution: mode, provider telemetry, artifacts and the policy trace.
 *
 * @module
 */

import { z } from 'zod';

/** Run mode. SNAPSHOT uses local data only; LIVE calls external providers. */
export const runModeSchema = z.enum(['SNAPSHOT', 'LIVE']);

const ratioSchema = z.number().min(0).max(1);
const countSchema = z.number().int().nonnegative();

/** Metrics reported by a single provider attempt. */
export const attemptMetricsSchema = z.object({
  /** Jobs collected by the attempt. */
  jobsCollected: countSchema,
  /** Provider errors seen by the attempt. */
  errors: countSchema,
  /** Fraction of collected jobs served from a cached/snapshot fallback. */
  snapshotFallbackRatio: ratioSchema,
});

/** Provider metrics recorded on a LIVE run report (from its last attempt). */
export const providerMetricsSchema = attemptMetricsSchema.extend({
  /** Number of attempts the policy engine made. */
  attemptsUsed: z.number().int().min(1),
});

/** Relative POSIX path with no empty, `.` or `..` segments. */
export const relativePathSchema = z
  .string()
  .min(1)
  .refine(
    (path) =>
      !path.startsWith('/') &&
      !path.includes('\\') &&
      path.split('/').every((seg) => seg !== '' && seg !== '.' && seg !== '..'),
    { message: 'must be a relative POSIX path without empty, "." or ".." segments' },
  );

/** Lowercase hex SHA-256 digest. */
export const contentHashSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, 'must be a lowercase hex sha256 digest');

/** A locally materialized file produced by the pipeline. */
export const artifactSchema = z.object({
  relativePath: relativePathSchema,
  contentHash: contentHashSchema,
  sizeBytes: countSchema,
});

/** Policy decision for one attempt. */
export const attemptDecisionSchema = z.enum(['accept', 'reject', 'error']);

/** One record per attempt, for audit and replay. */
export const decisionRecordSchema = z.object({
  attemptNumber: z.number().int().min(1),
  errorRate: ratioSchema,
  jobsCollected: countSchema,
  snapshotFallbackRatio: ratioSchema,
  decision: attemptDecisionSchema,
  /** Seconds slept after this attempt (0 when no retry follows). */
  backoffDelay: z.number().nonnegative(),
  /** Thresholds the attempt failed, empty when accepted. */
  reasons: z.array(z.string()),
});

/** Complete run report schema, including the cross-field invariants. */
export const runReportSchema = z
  .object({
    runId: z.string().min(1),
    mode: runModeSchema,
    providerMetrics: providerMetricsSchema.optional(),
    artifacts: z.array(artifactSchema),
    accepted: z.boolean(),
    cancelled: z.boolean().default(false),
    decisionTrace: z.array(decisionRecordSchema),
  })
  .superRefine((report, ctx) => {
    if (
      report.mode === 'LIVE' &&
      !report.providerMetrics &&
      report.decisionTrace.length > 0
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['providerMetrics'],
        message: 'LIVE runs with attempts must carry provider metrics',
      });
    }
    if (report.mode === 'SNAPSHOT') {
      if (report.providerMetrics) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providerMetrics'],
          message: 'SNAPSHOT runs carry no provider metrics',
        });
      }
      if (report.decisionTrace.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['decisionTrace'],
          message: 'SNAPSHOT runs have an empty decision trace',
        });
      }
    }
    if (!report.accepted && report.artifacts.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['artifacts'],
        message: 'rejected runs carry no publishable artifacts',
      });
    }
    if (report.cancelled && report.accepted) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cancelled'],
        message: 'a cancelled run is never accepted',
      });
    }
    const seen = new Set<string>();
    report.artifacts.forEach((artifact, index) => {
      if (seen.has(artifact.relativePath)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['artifacts', index, 'relativePath'],
          message: `duplicate artifact path: ${artifact.relativePath}`,
        });
      }
      seen.add(artifact.relativePath);
    });
  });

export type RunMode = z.infer<typeof runModeSchema>;
export type AttemptMetrics = z.infer<typeof attemptMetricsSchema>;
export type ProviderMetrics = z.infer<typeof providerMetricsSchema>;
export type Artifact = z.infer<typeof artifactSchema>;
export type AttemptDecision = z.infer<typeof attemptDecisionSchema>;
export type DecisionRecord = z.infer<typeof decisionRecordSchema>;
export type RunReport = z.infer<typeof runReportSchema>;
