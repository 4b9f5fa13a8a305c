/**
 * Run repository: the durable local record of each run.
 *
 * Layout under `runsDir`:
 * - `<runId>/artifacts/` files produced by the pipeline
 * - `<runId>/run_report.json`, `plan.json`, `publish_result.json`, `verify_report.json`
 * - `last_run.json` naming the most recent run
 */

import { randomBytes } from 'node:crypto';
import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { canonicalJson } from '../lib/canonical-json.js';
import { errorMessage, InvalidInputError } from '../lib/errors.js';
import { isRunId } from '../lib/run-id.js';
import { parsePlan } from '../publish/planner.js';
import { parsePublishResult } from '../publish/publisher.js';
import { parseRunReport } from '../report/run-report.js';
import type {
  PublishPlan,
  PublishResult,
  VerifyReport,
} from '../schemas/publish.js';
import type { RunReport } from '../schemas/run-report.js';

/** Envelope files kept beside a run's artifacts. */
export const RUN_FILES = {
  report: 'run_report.json',
  plan: 'plan.json',
  publishResult: 'publish_result.json',
  verifyReport: 'verify_report.json',
} as const;

const LAST_RUN_FILE = 'last_run.json';

/** Run record repository operations. */
export interface RunRepository {
  /** Absolute directory of a run. */
  runDir(runId: string): string;
  /** Directory the pipeline writes artifacts into. */
  outputDir(runId: string): string;
  /** Create the run and output directories. */
  createRun(runId: string): Promise<void>;
  saveRunReport(report: RunReport): Promise<string>;
  loadRunReport(runId: string): Promise<RunReport>;
  savePlan(publishPlan: PublishPlan): Promise<string>;
  loadPlan(runId: string): Promise<PublishPlan>;
  savePublishResult(result: PublishResult): Promise<string>;
  loadPublishResult(runId: string): Promise<PublishResult>;
  saveVerifyReport(report: VerifyReport): Promise<string>;
  /** Point `last_run.json` at `runId`. */
  setLastRun(runId: string): Promise<void>;
  /** Most recent run id, or null if none recorded. */
  lastRunId(): Promise<string | null>;
  /** Run ids on disk, oldest first. */
  listRuns(): Promise<string[]>;
}

/** Write through a temp file and rename so readers never see a torn file. */
async function writeAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${randomBytes(6).toString('hex')}.tmp`;
  await writeFile(tmp, content, 'utf-8');
  await rename(tmp, path);
}

async function readJson(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new InvalidInputError(`Cannot read ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new InvalidInputError(`Invalid JSON in ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/** Create a file-system run repository rooted at `runsDir`. */
export function createRunRepository(runsDir: string): RunRepository {
  const root = resolve(runsDir);

  function runDir(runId: string): string {
    if (!isRunId(runId)) {
      throw new InvalidInputError(`Not a run id: '${runId}'`);
    }
    return join(root, runId);
  }

  function fileFor(runId: string, name: string): string {
    return join(runDir(runId), name);
  }

  async function save(runId: string, name: string, payload: unknown): Promise<string> {
    const path = fileFor(runId, name);
    await writeAtomic(path, canonicalJson(payload));
    return path;
  }

  return {
    runDir,

    outputDir(runId: string): string {
      return join(runDir(runId), 'artifacts');
    },

    async createRun(runId: string): Promise<void> {
      await mkdir(join(runDir(runId), 'artifacts'), { recursive: true });
    },

    saveRunReport(report) {
      return save(report.runId, RUN_FILES.report, report);
    },

    async loadRunReport(runId) {
      return parseRunReport(await readJson(fileFor(runId, RUN_FILES.report)));
    },

    savePlan(publishPlan) {
      return save(publishPlan.runId, RUN_FILES.plan, publishPlan);
    },

    async loadPlan(runId) {
      return parsePlan(await readJson(fileFor(runId, RUN_FILES.plan)));
    },

    savePublishResult(result) {
      return save(result.runId, RUN_FILES.publishResult, result);
    },

    async loadPublishResult(runId) {
      return parsePublishResult(
        await readJson(fileFor(runId, RUN_FILES.publishResult)),
      );
    },

    saveVerifyReport(report) {
      return save(report.runId, RUN_FILES.verifyReport, report);
    },

    async setLastRun(runId) {
      runDir(runId);
      await writeAtomic(join(root, LAST_RUN_FILE), canonicalJson({ runId }));
    },

    async lastRunId() {
      let raw: string;
      try {
        raw = await readFile(join(root, LAST_RUN_FILE), 'utf-8');
      } catch (err: unknown) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
          return null;
        }
        throw err;
      }
      const parsed: unknown = JSON.parse(raw);
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'runId' in parsed &&
        typeof parsed.runId === 'string' &&
        isRunId(parsed.runId)
      ) {
        return parsed.runId;
      }
      throw new InvalidInputError(`${LAST_RUN_FILE} does not name a run`);
    },

    async listRuns() {
      const entries = await readdir(root, { withFileTypes: true }).catch(
        (err: unknown) => {
          if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            return null;
          }
          throw err;
        },
      );
      if (!entries) return [];
      return entries
        .filter((entry) => entry.isDirectory() && isRunId(entry.name))
        .map((entry) => entry.name)
        .sort();
    },
  };
}
