/**
 * Public API exports for jobintel.
 *
 * @module
 */

// Schemas
export type {
  JobIntelConfig,
  PolicySettings,
  StoreConfig,
} from './schemas/config.js';
export { jobIntelConfigSchema } from './schemas/config.js';
export type {
  Artifact,
  AttemptDecision,
  AttemptMetrics,
  DecisionRecord,
  ProviderMetrics,
  RunMode,
  RunReport,
} from './schemas/run-report.js';
export { attemptMetricsSchema, runReportSchema } from './schemas/run-report.js';
export type {
  DestinationConfig,
  LastSuccessState,
  MismatchDetail,
  PlanEntry,
  PointerWrite,
  PointerWriteOutcome,
  PublishOutcome,
  PublishPlan,
  PublishResult,
  PublishResultEntry,
  PublishStatus,
  StatePointers,
  VerifyReport,
} from './schemas/publish.js';
export {
  lastSuccessStateSchema,
  publishPlanSchema,
  publishResultSchema,
  verifyReportSchema,
} from './schemas/publish.js';

// Configuration and errors
export { configFromEnv, loadConfig, parseConfig } from './config/load.js';
export {
  ConfigurationError,
  InvalidInputError,
  JobIntelError,
  type JobIntelErrorCode,
  StorageWriteError,
  VerificationMismatch,
} from './lib/errors.js';
export { canonicalJson } from './lib/canonical-json.js';
export { createRunIdFactory, formatRunId, isRunId } from './lib/run-id.js';

// Run report
export type { RunReportInput } from './report/run-report.js';
export {
  finalizeRunReport,
  parseRunReport,
  serializeRunReport,
} from './report/run-report.js';

// Policy engine
export type { PolicyConfig } from './policy/policy.js';
export {
  backoffDelay,
  computeErrorRate,
  evaluateAttempt,
  resolvePolicyConfig,
} from './policy/policy.js';
export type {
  AttemptContext,
  EvaluateOptions,
  PolicyState,
  RunAttemptFn,
} from './policy/engine.js';
export { evaluateAndRetry } from './policy/engine.js';

// Publish / verify
export {
  latestPrefix,
  parsePlan,
  plan,
  resolveDestination,
  runPrefix,
  serializePlan,
  statePointersFor,
  statePrefix,
} from './publish/planner.js';
export type { ArtifactReader, PublishOptions } from './publish/publisher.js';
export {
  parsePublishResult,
  publish,
  serializePublishResult,
} from './publish/publisher.js';
export type { ActualSource, VerifyOptions } from './publish/verifier.js';
export {
  assertVerified,
  offlineSource,
  serializeVerifyReport,
  verify,
  verifyLatest,
} from './publish/verifier.js';

// Storage
export type {
  ObjectStoreClient,
  StoreCallOptions,
  StoredObject,
} from './storage/object-store.js';
export { createObjectStore } from './storage/create-store.js';
export { createFsObjectStore } from './storage/fs-store.js';
export { createS3ObjectStore } from './storage/s3-store.js';

// Runs and pipeline
export { collectArtifacts } from './runs/artifacts.js';
export type { RunRepository } from './runs/run-repository.js';
export { createRunRepository, RUN_FILES } from './runs/run-repository.js';
export type {
  Pipeline,
  PipelineDeps,
  PipelineResult,
  PipelineStatus,
} from './pipeline/pipeline.js';
export { createPipeline } from './pipeline/pipeline.js';
export {
  createScriptAttempt,
  executeAttempt,
  metricsFromLine,
} from './pipeline/attempt-executor.js';
export type { Notifier, RunOutcome } from './notify/slack.js';
export { createNotifier } from './notify/slack.js';
