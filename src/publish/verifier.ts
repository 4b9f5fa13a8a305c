/**
 * Verifier. Confirms that a destination, a captured publish result or a local
 * run directory holds exactly what a plan expects: every key present with the
 * planned content hash.
 *
 * @module
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';

import type { Logger } from 'pino';

import { canonicalJson } from '../lib/canonical-json.js';
import { InvalidInputError, VerificationMismatch } from '../lib/errors.js';
import { sha256File } from '../lib/hash.js';
import { silentLogger } from '../lib/logger.js';
import { mapWithConcurrency } from '../lib/pool.js';
import {
  type DestinationConfig,
  type MismatchDetail,
  type PlanEntry,
  type PublishPlan,
  type PublishResult,
  publishPlanSchema,
  publishResultSchema,
  type VerifyReport,
} from '../schemas/publish.js';
import type { RunReport } from '../schemas/run-report.js';
import type {
  ObjectStoreClient,
  StoredObject,
} from '../storage/object-store.js';
import { latestEntries, plan } from './planner.js';

/** What the verifier compares the plan against. */
export type ActualSource =
  /** Online: a live object store. */
  | { kind: 'store'; client: ObjectStoreClient }
  /** Offline: a serialized publish result. */
  | { kind: 'publish-result'; result: PublishResult }
  /** Offline: a serialized plan captured earlier. */
  | { kind: 'plan'; plan: PublishPlan }
  /** Offline: the local run directory the artifacts were produced in. */
  | { kind: 'local'; runDir: string };

/** Options for a verification. */
export interface VerifyOptions {
  /** Parallel lookups against a store (default 8). */
  concurrency?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
  logger?: Logger;
}

type Lookup = (
  entry: PlanEntry,
  signal: AbortSignal | undefined,
) => Promise<StoredObject | null>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function lookupFor(source: ActualSource): Lookup {
  switch (source.kind) {
    case 'store':
      return (entry, signal) =>
        source.client.headObject(entry.objectKey, { signal });
    case 'publish-result': {
      const byKey = new Map(
        source.result.entries.map((entry) => [entry.objectKey, entry]),
      );
      return (entry) => {
        const found = byKey.get(entry.objectKey);
        // A failed write never produced the object.
        if (!found || found.outcome === 'failed') return Promise.resolve(null);
        return Promise.resolve({
          contentHash: found.contentHash,
          sizeBytes: found.sizeBytes,
        });
      };
    }
    case 'plan': {
      const byKey = new Map(
        source.plan.entries.map((entry) => [entry.objectKey, entry]),
      );
      return (entry) => {
        const found = byKey.get(entry.objectKey);
        return Promise.resolve(
          found
            ? { contentHash: found.contentHash, sizeBytes: found.sizeBytes }
            : null,
        );
      };
    }
    case 'local':
      return async (entry) => {
        const path = join(source.runDir, ...entry.relativePath.split('/'));
        try {
          const info = await stat(path);
          return { contentHash: await sha256File(path), sizeBytes: info.size };
        } catch (err: unknown) {
          if (isMissingFile(err)) return null;
          throw err;
        }
      };
  }
}

/**
 * Verify `expected` against `source`. The report is `ok` only when nothing is
 * missing and nothing mismatched. Lookup errors (including an expired
 * deadline) reject rather than being counted as missing.
 */
export async function verify(
  expected: PublishPlan,
  source: ActualSource,
  options: VerifyOptions = {},
): Promise<VerifyReport> {
  const logger = (options.logger ?? silentLogger()).child({
    runId: expected.runId,
    source: source.kind,
  });
  const signal =
    options.timeoutMs === undefined
      ? options.signal
      : options.signal
        ? AbortSignal.any([options.signal, AbortSignal.timeout(options.timeoutMs)])
        : AbortSignal.timeout(options.timeoutMs);
  const lookup = lookupFor(source);

  const found = await mapWithConcurrency(
    expected.entries,
    options.concurrency ?? 8,
    async (entry) => {
      signal?.throwIfAborted();
      return lookup(entry, signal);
    },
  );

  const missing: string[] = [];
  const mismatched: string[] = [];
  const matched: string[] = [];
  const mismatches: MismatchDetail[] = [];

  expected.entries.forEach((entry, index) => {
    const actual = found[index];
    if (!actual) {
      missing.push(entry.objectKey);
      return;
    }
    if (
      actual.contentHash !== entry.contentHash ||
      actual.sizeBytes !== entry.sizeBytes
    ) {
      mismatched.push(entry.objectKey);
      mismatches.push({
        objectKey: entry.objectKey,
        expectedHash: entry.contentHash,
        actualHash: actual.contentHash || null,
        expectedSize: entry.sizeBytes,
        actualSize: actual.sizeBytes,
      });
      return;
    }
    matched.push(entry.objectKey);
  });

  const report: VerifyReport = {
    runId: expected.runId,
    ok: missing.length === 0 && mismatched.length === 0,
    missing,
    mismatched,
    matched,
    mismatches,
  };

  if (report.ok) {
    logger.info({ matched: matched.length }, 'Verification passed');
  } else {
    logger.error({ missing, mismatched }, 'Verification failed');
  }
  return report;
}

/**
 * Re-derive the plan for `report` and check only its latest-pointer keys:
 * confirms the run is the published head without re-checking run-scoped
 * history.
 */
export async function verifyLatest(
  report: RunReport,
  destination: Partial<DestinationConfig>,
  client: ObjectStoreClient,
  options: VerifyOptions = {},
): Promise<VerifyReport> {
  const full = plan(report, destination);
  return verify(
    { ...full, entries: latestEntries(full) },
    { kind: 'store', client },
    options,
  );
}

/** Throw VerificationMismatch unless the report is clean. */
export function assertVerified(report: VerifyReport): void {
  if (!report.ok) throw new VerificationMismatch(report);
}

/**
 * Interpret a serialized offline source: a publish result (has `status` and
 * `counts`) or a plan.
 */
export function offlineSource(raw: unknown): ActualSource {
  const asResult = publishResultSchema.safeParse(raw);
  if (asResult.success) return { kind: 'publish-result', result: asResult.data };
  const asPlan = publishPlanSchema.safeParse(raw);
  if (asPlan.success) return { kind: 'plan', plan: asPlan.data };
  throw new InvalidInputError(
    'Offline source is neither a publish result nor a publish plan',
  );
}

/** Canonical JSON for the verify report. */
export function serializeVerifyReport(report: VerifyReport): string {
  return canonicalJson(report);
}
