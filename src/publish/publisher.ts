/**
 * Publisher. Realizes a publish plan against an object store, or simulates it.
 *
 * Run-scoped entries are written first (content-addressed, so a key already
 * holding the planned hash is skipped). Latest-pointer entries are written
 * only after every run-scoped entry is confirmed, as one final batch, so
 * `latest/` never points at a partially published run. The state pointers
 * (`state/last_success.json`) follow once every latest entry is in place.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { Logger } from 'pino';

import { canonicalJson } from '../lib/canonical-json.js';
import {
  errorMessage,
  formatIssues,
  InvalidInputError,
  StorageWriteError,
} from '../lib/errors.js';
import { sha256 } from '../lib/hash.js';
import { silentLogger } from '../lib/logger.js';
import { mapWithConcurrency } from '../lib/pool.js';
import {
  type PlanEntry,
  type PointerWrite,
  type PointerWriteOutcome,
  type PublishPlan,
  type PublishResult,
  type PublishResultEntry,
  publishResultSchema,
  type StatePointers,
} from '../schemas/publish.js';
import {
  contentTypeFor,
  type ObjectStoreClient,
} from '../storage/object-store.js';
import { latestEntries, runEntries } from './planner.js';

/** Reads an artifact's bytes by its run-relative path. */
export type ArtifactReader = (relativePath: string) => Promise<Buffer>;

/** Options for a publish. */
export interface PublishOptions {
  dryRun?: boolean;
  /** Run directory the artifacts are read from. */
  runDir?: string;
  /** Custom reader; takes precedence over `runDir`. */
  readArtifact?: ArtifactReader;
  /** Parallel run-scoped writes (default 4). */
  concurrency?: number;
  /** Caller cancellation / deadline. */
  signal?: AbortSignal;
  /** Deadline in milliseconds, combined with `signal`. */
  timeoutMs?: number;
  /**
   * Deadline for the latest batch and the state pointers, started when the
   * barrier opens (defaults to `timeoutMs`).
   */
  pointerTimeoutMs?: number;
  logger?: Logger;
}

function combineSignals(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined,
): AbortSignal | undefined {
  const signals = [
    signal,
    timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs),
  ].filter((s): s is AbortSignal => s !== undefined);
  if (signals.length === 0) return undefined;
  return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

function resolveReader(options: PublishOptions): ArtifactReader {
  if (options.readArtifact) return options.readArtifact;
  const { runDir } = options;
  if (!runDir) {
    throw new InvalidInputError(
      'A run directory or artifact reader is required to publish',
    );
  }
  return (relativePath) => readFile(join(runDir, ...relativePath.split('/')));
}

function entrySummary(entry: PlanEntry): Omit<PublishResultEntry, 'outcome'> {
  return {
    objectKey: entry.objectKey,
    contentHash: entry.contentHash,
    sizeBytes: entry.sizeBytes,
    isLatestPointer: entry.isLatestPointer,
  };
}

function failed(entry: PlanEntry, error: string): PublishResultEntry {
  return { ...entrySummary(entry), outcome: 'failed', error };
}

const POINTERS_SKIPPED: PointerWrite = {
  global: 'skipped',
  providerProfile: 'skipped',
};

function buildResult(
  publishPlan: PublishPlan,
  dryRun: boolean,
  entries: PublishResultEntry[],
  pointerWrite: PointerWrite,
): PublishResult {
  const count = (outcome: PublishResultEntry['outcome']) =>
    entries.filter((entry) => entry.outcome === outcome).length;
  const counts = {
    written: count('written'),
    alreadyPresent: count('already_present'),
    wouldWrite: count('would_write'),
    failed: count('failed'),
  };
  return {
    runId: publishPlan.runId,
    dryRun,
    status: dryRun
      ? 'dry_run'
      : counts.failed > 0 ||
          pointerWrite.global === 'failed' ||
          pointerWrite.providerProfile === 'failed'
        ? 'failed'
        : 'ok',
    counts,
    entries,
    pointerWrite,
  };
}

/** Restore plan order after writing run and latest entries in separate phases. */
function inPlanOrder(
  publishPlan: PublishPlan,
  results: PublishResultEntry[],
): PublishResultEntry[] {
  const byKey = new Map(results.map((result) => [result.objectKey, result]));
  return publishPlan.entries.map(
    (entry) => byKey.get(entry.objectKey) ?? failed(entry, 'not attempted'),
  );
}

/**
 * Publish a plan. With `dryRun` or no client, performs no I/O and marks every
 * entry `would_write`. Never throws for storage failures: they are reported
 * per entry and turn the overall status to `failed`.
 */
export async function publish(
  publishPlan: PublishPlan,
  client: ObjectStoreClient | null,
  options: PublishOptions = {},
): Promise<PublishResult> {
  const logger = (options.logger ?? silentLogger()).child({
    runId: publishPlan.runId,
  });

  if (options.dryRun || !client) {
    for (const entry of publishPlan.entries) {
      logger.info({ objectKey: entry.objectKey }, 'dry-run: would write');
    }
    return buildResult(
      publishPlan,
      true,
      publishPlan.entries.map((entry): PublishResultEntry => ({
        ...entrySummary(entry),
        outcome: 'would_write',
      })),
      POINTERS_SKIPPED,
    );
  }

  const read = resolveReader(options);
  const deadline = combineSignals(options.signal, options.timeoutMs);
  const concurrency = options.concurrency ?? 4;

  async function writeEntry(
    store: ObjectStoreClient,
    entry: PlanEntry,
    signal: AbortSignal | undefined,
  ): Promise<PublishResultEntry> {
    if (signal?.aborted) {
      return failed(entry, 'deadline exceeded before write');
    }
    try {
      const existing = await store.headObject(entry.objectKey, { signal });
      if (existing?.contentHash === entry.contentHash) {
        logger.debug({ objectKey: entry.objectKey }, 'Already present');
        return { ...entrySummary(entry), outcome: 'already_present' };
      }
      const body = await read(entry.relativePath);
      const actualHash = sha256(body);
      if (actualHash !== entry.contentHash || body.length !== entry.sizeBytes) {
        throw new StorageWriteError(
          entry.objectKey,
          `local content drifted from plan (expected ${entry.contentHash}/${String(entry.sizeBytes)}B, found ${actualHash}/${String(body.length)}B)`,
        );
      }
      await store.putObject(
        entry.objectKey,
        body,
        {
          contentHash: entry.contentHash,
          contentType: contentTypeFor(entry.objectKey),
        },
        { signal },
      );
      logger.info({ objectKey: entry.objectKey, outcome: 'written' }, 'Uploaded');
      return { ...entrySummary(entry), outcome: 'written' };
    } catch (err: unknown) {
      const error =
        err instanceof StorageWriteError
          ? err
          : new StorageWriteError(entry.objectKey, errorMessage(err), {
              cause: err,
            });
      logger.error({ objectKey: entry.objectKey, err: error }, 'Write failed');
      return failed(entry, error.message);
    }
  }

  async function writeState(
    store: ObjectStoreClient,
    key: string,
    body: Buffer,
    signal: AbortSignal | undefined,
  ): Promise<PointerWriteOutcome> {
    const contentHash = sha256(body);
    const existing = await store.headObject(key, { signal });
    if (existing?.contentHash === contentHash) return 'already_present';
    await store.putObject(
      key,
      body,
      { contentHash, contentType: 'application/json' },
      { signal },
    );
    logger.info({ objectKey: key, outcome: 'written' }, 'State pointer written');
    return 'written';
  }

  async function writeStatePointers(
    store: ObjectStoreClient,
    pointers: StatePointers,
    signal: AbortSignal | undefined,
  ): Promise<PointerWrite> {
    const body = Buffer.from(canonicalJson(pointers.state));
    let global: PointerWriteOutcome;
    try {
      global = await writeState(store, pointers.globalKey, body, signal);
    } catch (err: unknown) {
      logger.error({ objectKey: pointers.globalKey, err }, 'State pointer write failed');
      return { global: 'failed', providerProfile: 'skipped', error: errorMessage(err) };
    }
    try {
      return {
        global,
        providerProfile: await writeState(
          store,
          pointers.providerProfileKey,
          body,
          signal,
        ),
      };
    } catch (err: unknown) {
      logger.error(
        { objectKey: pointers.providerProfileKey, err },
        'State pointer write failed',
      );
      return { global, providerProfile: 'failed', error: errorMessage(err) };
    }
  }

  logger.info(
    { store: client.description, entries: publishPlan.entries.length },
    'Publishing run',
  );

  const runResults = await mapWithConcurrency(
    runEntries(publishPlan),
    concurrency,
    (entry) => writeEntry(client, entry, deadline),
  );

  const pointers = latestEntries(publishPlan);
  const runFailures = runResults.filter((r) => r.outcome === 'failed').length;

  let latestResults: PublishResultEntry[];
  let pointerWrite = POINTERS_SKIPPED;
  if (runFailures > 0 || deadline?.aborted) {
    const reason =
      runFailures > 0
        ? `barrier closed: ${String(runFailures)} run-scoped write(s) failed`
        : 'barrier closed: deadline exceeded';
    logger.error({ runFailures }, 'Latest pointers left untouched');
    latestResults = pointers.map((entry) => failed(entry, reason));
  } else {
    const pointerDeadline = combineSignals(
      options.signal,
      options.pointerTimeoutMs ?? options.timeoutMs,
    );
    latestResults = await mapWithConcurrency(pointers, concurrency, (entry) =>
      writeEntry(client, entry, pointerDeadline),
    );
    if (latestResults.every((r) => r.outcome !== 'failed')) {
      pointerWrite = await writeStatePointers(
        client,
        publishPlan.statePointers,
        pointerDeadline,
      );
    } else {
      logger.error('Latest batch incomplete; state pointers left untouched');
    }
  }

  const result = buildResult(
    publishPlan,
    false,
    inPlanOrder(publishPlan, [...runResults, ...latestResults]),
    pointerWrite,
  );
  logger.info(
    { status: result.status, ...result.counts, pointerWrite },
    'Publish finished',
  );
  return result;
}

/** Canonical JSON for offline verification. */
export function serializePublishResult(result: PublishResult): string {
  return canonicalJson(result);
}

/** Parse a serialized publish result. */
export function parsePublishResult(raw: unknown): PublishResult {
  const parsed = publishResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(
      `Invalid publish result: ${formatIssues(parsed.error).join('; ')}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
