/**
 * Publish planner. Maps an accepted run report to the exact object keys and
 * hashes a publish must produce, without touching the network.
 *
 * @module
 */

import { canonicalJson } from '../lib/canonical-json.js';
import {
  ConfigurationError,
  formatIssues,
  InvalidInputError,
} from '../lib/errors.js';
import {
  type DestinationConfig,
  type PlanEntry,
  type PublishPlan,
  publishPlanSchema,
  type StatePointers,
} from '../schemas/publish.js';
import type { RunReport } from '../schemas/run-report.js';

const SEGMENT_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Validate a destination and normalize its prefix (surrounding slashes
 * trimmed). Throws ConfigurationError on malformed input.
 */
export function resolveDestination(
  destination: Partial<DestinationConfig>,
): DestinationConfig {
  const issues: string[] = [];
  const prefix = (destination.prefix ?? '').replace(/^\/+|\/+$/g, '');
  if (!prefix) {
    issues.push('destination.prefix: required');
  } else if (prefix.split('/').some((seg) => !SEGMENT_PATTERN.test(seg))) {
    issues.push(`destination.prefix: invalid key segments in '${prefix}'`);
  }
  for (const field of ['provider', 'profile'] as const) {
    const value = destination[field];
    if (!value) {
      issues.push(`destination.${field}: required`);
    } else if (!SEGMENT_PATTERN.test(value)) {
      issues.push(`destination.${field}: must be a single key segment, got '${value}'`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid destination: ${issues.join('; ')}`,
      issues,
    );
  }
  return {
    prefix,
    provider: destination.provider ?? '',
    profile: destination.profile ?? '',
  };
}

/** `<prefix>/runs/<runId>/<provider>/<profile>` */
export function runPrefix(runId: string, dest: DestinationConfig): string {
  return `${dest.prefix}/runs/${runId}/${dest.provider}/${dest.profile}`;
}

/** `<prefix>/latest/<provider>/<profile>` */
export function latestPrefix(dest: DestinationConfig): string {
  return `${dest.prefix}/latest/${dest.provider}/${dest.profile}`;
}

/** `<prefix>/state` */
export function statePrefix(dest: DestinationConfig): string {
  return `${dest.prefix}/state`;
}

/** Keys and payload of the state pointers for an accepted run. */
export function statePointersFor(
  runId: string,
  dest: DestinationConfig,
): StatePointers {
  const state = statePrefix(dest);
  return {
    globalKey: `${state}/last_success.json`,
    providerProfileKey: `${state}/${dest.provider}/${dest.profile}/last_success.json`,
    state: {
      schemaVersion: 1,
      runId,
      runPath: `${dest.prefix}/runs/${runId}`,
      providers: [dest.provider],
      profiles: [dest.profile],
      providerProfiles: { [`${dest.provider}:${dest.profile}`]: runId },
    },
  };
}

/**
 * Plan a publish. Entries follow artifact order, each run entry immediately
 * followed by its latest-pointer mirror. Identical inputs yield identical plans.
 */
export function plan(
  report: RunReport,
  destination: Partial<DestinationConfig>,
): PublishPlan {
  if (!report.accepted) {
    throw new InvalidInputError(
      `Run ${report.runId} was not accepted and cannot be published`,
    );
  }
  if (report.artifacts.length === 0) {
    throw new InvalidInputError(
      `Run ${report.runId} has no artifacts to publish`,
    );
  }

  if (!SEGMENT_PATTERN.test(report.runId)) {
    throw new InvalidInputError(
      `Run id '${report.runId}' is not a valid key segment`,
    );
  }

  const dest = resolveDestination(destination);
  const runs = runPrefix(report.runId, dest);
  const latest = latestPrefix(dest);

  const entries: PlanEntry[] = report.artifacts.flatMap((artifact) => {
    const shared = {
      relativePath: artifact.relativePath,
      contentHash: artifact.contentHash,
      sizeBytes: artifact.sizeBytes,
    };
    return [
      { objectKey: `${runs}/${artifact.relativePath}`, ...shared, isLatestPointer: false },
      { objectKey: `${latest}/${artifact.relativePath}`, ...shared, isLatestPointer: true },
    ];
  });

  return {
    runId: report.runId,
    bucketPrefix: runs,
    latestPrefix: latest,
    entries,
    statePointers: statePointersFor(report.runId, dest),
  };
}

/** Only the latest-pointer entries of a plan. */
export function latestEntries(publishPlan: PublishPlan): PlanEntry[] {
  return publishPlan.entries.filter((entry) => entry.isLatestPointer);
}

/** Only the run-scoped entries of a plan. */
export function runEntries(publishPlan: PublishPlan): PlanEntry[] {
  return publishPlan.entries.filter((entry) => !entry.isLatestPointer);
}

/** Canonical JSON for offline consumers. */
export function serializePlan(publishPlan: PublishPlan): string {
  return canonicalJson(publishPlan);
}

/** Parse a serialized plan. */
export function parsePlan(raw: unknown): PublishPlan {
  const result = publishPlanSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid publish plan: ${formatIssues(result.error).join('; ')}`,
      { cause: result.error },
    );
  }
  return result.data;
}
