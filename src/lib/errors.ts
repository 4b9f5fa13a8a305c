/**
 * Error taxonomy for the policy gate and the publish/verify protocol.
 *
 * @module
 */

import type { ZodError } from 'zod';

import type { VerifyReport } from '../schemas/publish.js';

/** Stable machine-readable error codes. */
export type JobIntelErrorCode =
  | 'CONFIG_INVALID'
  | 'INVALID_INPUT'
  | 'STORAGE_WRITE'
  | 'VERIFY_MISMATCH';

/** Base class for every error this package raises on purpose. */
export class JobIntelError extends Error {
  constructor(
    readonly code: JobIntelErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or malformed configuration. Raised before any side effect; LIVE mode
 * never falls back to defaults for its thresholds.
 */
export class ConfigurationError extends JobIntelError {
  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super('CONFIG_INVALID', message, options);
  }
}

/** Input that cannot be planned or parsed (rejected run, empty artifacts, bad JSON shape). */
export class InvalidInputError extends JobIntelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
  }
}

/** A single object write failed. */
export class StorageWriteError extends JobIntelError {
  constructor(
    readonly objectKey: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('STORAGE_WRITE', `${objectKey}: ${message}`, options);
  }
}

/** Stored objects do not match the plan. Carries the full report. */
export class VerificationMismatch extends JobIntelError {
  constructor(readonly report: VerifyReport) {
    super(
      'VERIFY_MISMATCH',
      `Verification failed for run ${report.runId}: ${String(report.missing.length)} missing, ${String(report.mismatched.length)} mismatched`,
    );
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Flatten zod issues into `path: message` strings. */
export function formatIssues(err: ZodError): string[] {
  return err.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
  );
}
