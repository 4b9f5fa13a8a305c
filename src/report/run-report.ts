/**
 * Run report construction, parsing and deterministic serialization.
 *
 * @module
 */

import type { z } from 'zod';

import { canonicalJson } from '../lib/canonical-json.js';
import { formatIssues, InvalidInputError } from '../lib/errors.js';
import { type RunReport, runReportSchema } from '../schemas/run-report.js';

/** Fields accepted when building a report (`cancelled` may be omitted). */
export type RunReportInput = z.input<typeof runReportSchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function validate(raw: unknown, what: string): RunReport {
  const result = runReportSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid ${what}: ${formatIssues(result.error).join('; ')}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/** Validate and freeze a report. The returned object cannot be mutated. */
export function finalizeRunReport(input: RunReportInput): RunReport {
  return deepFreeze(validate(input, 'run report'));
}

/** Parse a report read back from `run_report.json`. */
export function parseRunReport(raw: unknown): RunReport {
  return deepFreeze(validate(raw, 'run_report.json'));
}

/** Canonical JSON (sorted keys) so reports diff cleanly across runs. */
export function serializeRunReport(report: RunReport): string {
  return canonicalJson(report);
}
