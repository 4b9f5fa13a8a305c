/**
 * Tests for the run repository.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { InvalidInputError } from '../lib/errors.js';
import { finalizeRunReport } from '../report/run-report.js';
import { createTempDir, type TempDir } from '../test-utils/temp-dir.js';
import { createRunRepository, RUN_FILES } from './run-repository.js';

const runId = '20260101T000000000Z';

describe('createRunRepository', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('should lay out runs under the runs directory', () => {
    const repo = createRunRepository(dir.path);
    expect(repo.runDir(runId)).toBe(join(dir.path, runId));
    expect(repo.outputDir(runId)).toBe(join(dir.path, runId, 'artifacts'));
  });

  it('should refuse anything that is not a run id', () => {
    const repo = createRunRepository(dir.path);
    expect(() => repo.runDir('../etc')).toThrow(InvalidInputError);
  });

  it('should persist reports as canonical JSON and read them back', async () => {
    const repo = createRunRepository(dir.path);
    const report = finalizeRunReport({
      runId,
      mode: 'SNAPSHOT',
      accepted: true,
      decisionTrace: [],
      artifacts: [],
    });

    await repo.createRun(runId);
    const path = await repo.saveRunReport(report);

    expect(path).toBe(join(dir.path, runId, RUN_FILES.report));
    expect(readFileSync(path, 'utf-8')).toBe(
      [
        '{',
        '  "accepted": true,',
        '  "artifacts": [],',
        '  "cancelled": false,',
        '  "decisionTrace": [],',
        '  "mode": "SNAPSHOT",',
        `  "runId": "${runId}"`,
        '}',
        '',
      ].join('\n'),
    );
    expect(await repo.loadRunReport(runId)).toEqual(report);
  });

  it('should raise InvalidInputError for a missing report', async () => {
    const repo = createRunRepository(dir.path);
    await expect(repo.loadRunReport(runId)).rejects.toBeInstanceOf(
      InvalidInputError,
    );
  });

  it('should track the last run', async () => {
    const repo = createRunRepository(dir.path);
    expect(await repo.lastRunId()).toBeNull();

    await repo.setLastRun(runId);

    expect(await repo.lastRunId()).toBe(runId);
  });

  it('should list run directories oldest first', async () => {
    const repo = createRunRepository(dir.path);
    expect(await repo.listRuns()).toEqual([]);

    await repo.createRun('20260102T000000000Z');
    await repo.createRun(runId);
    dir.write('notes/readme.txt', 'not a run');

    expect(await repo.listRuns()).toEqual([runId, '20260102T000000000Z']);
  });
});
