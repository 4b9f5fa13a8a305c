/**
 * Publish plan, publish result and verify report schemas.
 *
 * @module
 */

import { z } from 'zod';

import { contentHashSchema, relativePathSchema } from './run-report.js';

/** Where a run is published. */
export const destinationConfigSchema = z.object({
  /** Key prefix shared by every object, e.g. `jobintel`. */
  prefix: z.string(),
  /** Provider id, one key segment. */
  provider: z.string(),
  /** Profile id, one key segment. */
  profile: z.string(),
});

/** One object the publish must produce. */
export const planEntrySchema = z.object({
  objectKey: z.string().min(1),
  /** Artifact path relative to the run directory (the upload source). */
  relativePath: relativePathSchema,
  contentHash: contentHashSchema,
  sizeBytes: z.number().int().nonnegative(),
  isLatestPointer: z.boolean(),
});

/** Durable "last successful run" record that downstream resolvers read. */
export const lastSuccessStateSchema = z.object({
  schemaVersion: z.literal(1),
  runId: z.string().min(1),
  /** `<prefix>/runs/<runId>` */
  runPath: z.string(),
  providers: z.array(z.string()),
  profiles: z.array(z.string()),
  /** `provider:profile` to the run id that last succeeded for it. */
  providerProfiles: z.record(z.string()),
});

/** State pointers written once the latest batch has succeeded. */
export const statePointersSchema = z.object({
  /** `<prefix>/state/last_success.json` */
  globalKey: z.string().min(1),
  /** `<prefix>/state/<provider>/<profile>/last_success.json` */
  providerProfileKey: z.string().min(1),
  state: lastSuccessStateSchema,
});

/** Deterministic publish plan for one run. */
export const publishPlanSchema = z.object({
  runId: z.string().min(1),
  bucketPrefix: z.string(),
  latestPrefix: z.string(),
  entries: z.array(planEntrySchema),
  statePointers: statePointersSchema,
});

export const publishOutcomeSchema = z.enum([
  'written',
  'already_present',
  'would_write',
  'failed',
]);

export const publishResultEntrySchema = z.object({
  objectKey: z.string().min(1),
  contentHash: contentHashSchema,
  sizeBytes: z.number().int().nonnegative(),
  isLatestPointer: z.boolean(),
  outcome: publishOutcomeSchema,
  error: z.string().optional(),
});

export const publishStatusSchema = z.enum(['ok', 'failed', 'dry_run']);

export const pointerWriteOutcomeSchema = z.enum([
  'written',
  'already_present',
  'skipped',
  'failed',
]);

/** Outcome of the state pointer writes. */
export const pointerWriteSchema = z.object({
  global: pointerWriteOutcomeSchema,
  providerProfile: pointerWriteOutcomeSchema,
  error: z.string().optional(),
});

/** Per-entry outcome of a publish. */
export const publishResultSchema = z.object({
  runId: z.string().min(1),
  dryRun: z.boolean(),
  status: publishStatusSchema,
  counts: z.object({
    written: z.number().int().nonnegative(),
    alreadyPresent: z.number().int().nonnegative(),
    wouldWrite: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
  }),
  entries: z.array(publishResultEntrySchema),
  pointerWrite: pointerWriteSchema,
});

/** Detail for a key whose stored content differs from the plan. */
export const mismatchDetailSchema = z.object({
  objectKey: z.string(),
  expectedHash: z.string(),
  actualHash: z.string().nullable(),
  expectedSize: z.number().int().nonnegative(),
  actualSize: z.number().int().nonnegative().nullable(),
});

export const verifyReportSchema = z.object({
  runId: z.string(),
  ok: z.boolean(),
  missing: z.array(z.string()),
  mismatched: z.array(z.string()),
  matched: z.array(z.string()),
  mismatches: z.array(mismatchDetailSchema),
});

export type DestinationConfig = z.infer<typeof destinationConfigSchema>;
export type PlanEntry = z.infer<typeof planEntrySchema>;
export type PublishPlan = z.infer<typeof publishPlanSchema>;
export type LastSuccessState = z.infer<typeof lastSuccessStateSchema>;
export type StatePointers = z.infer<typeof statePointersSchema>;
export type PointerWrite = z.infer<typeof pointerWriteSchema>;
export type PointerWriteOutcome = z.infer<typeof pointerWriteOutcomeSchema>;
export type PublishOutcome = z.infer<typeof publishOutcomeSchema>;
export type PublishResultEntry = z.infer<typeof publishResultEntrySchema>;
export type PublishStatus = z.infer<typeof publishStatusSchema>;
export type PublishResult = z.infer<typeof publishResultSchema>;
export type MismatchDetail = z.infer<typeof mismatchDetailSchema>;
export type VerifyReport = z.infer<typeof verifyReportSchema>;
