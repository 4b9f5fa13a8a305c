/**
 * Tests for CLI commands, run in-process.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ConfigurationError,
  InvalidInputError,
  VerificationMismatch,
} from '../../lib/errors.js';
import { finalizeRunReport } from '../../report/run-report.js';
import { collectArtifacts } from '../../runs/artifacts.js';
import { createRunRepository } from '../../runs/run-repository.js';
import { createTempDir, type TempDir } from '../../test-utils/temp-dir.js';
import { INIT_CONFIG_TEMPLATE } from './commands/config.js';
import { createProgram } from './program.js';
import { exitCodeFor } from './run-action.js';

const runId = '20260101T000000000Z';

async function cli(...args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

describe('CLI', () => {
  let dir: TempDir;
  let errors: string[];
  let stdout: string[];

  beforeEach(() => {
    dir = createTempDir('jobintel-cli-');
    errors = [];
    stdout = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(String(message));
    });
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: unknown) => {
      stdout.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    dir.cleanup();
  });

  it('should write a starter config once', async () => {
    const output = join(dir.path, 'jobintel.config.json');

    await cli('init', '-o', output);
    expect(JSON.parse(readFileSync(output, 'utf-8'))).toEqual(INIT_CONFIG_TEMPLATE);
    expect(process.exitCode).toBeUndefined();

    await cli('init', '-o', output);
    expect(process.exitCode).toBe(1);
    expect(errors[0]).toBe(`❌ File already exists: ${output}`);
  });

  it('should exit 1 when LIVE thresholds are missing', async () => {
    const config = dir.write(
      'live.json',
      JSON.stringify({ mode: 'LIVE', policy: { errorRateMax: 0.1, minJobs: 5 } }),
    );

    await cli('validate', '-c', config);

    expect(process.exitCode).toBe(1);
    expect(errors[0]).toBe(
      '❌ LIVE mode requires policy thresholds: missing minSnapshotRatio, maxAttempts, backoffBase, backoffMax',
    );
  });

  it('should publish a recorded run and exit 2 when the store is tampered with', async () => {
    const runsDir = join(dir.path, 'runs');
    const storeRoot = join(dir.path, 'store');
    const repo = createRunRepository(runsDir);
    await repo.createRun(runId);
    writeFileSync(join(repo.outputDir(runId), 'jobs.json'), '{"jobs":[]}\n');
    await repo.saveRunReport(
      finalizeRunReport({
        runId,
        mode: 'SNAPSHOT',
        accepted: true,
        decisionTrace: [],
        artifacts: await collectArtifacts(repo.outputDir(runId)),
      }),
    );
    await repo.setLastRun(runId);
    const config = dir.write(
      'jobintel.config.json',
      JSON.stringify({
        runsDir,
        destination: { prefix: 'jobintel', provider: 'openai', profile: 'cs' },
        store: { kind: 'fs', root: storeRoot },
        log: { level: 'silent' },
      }),
    );

    await cli('publish', '-c', config);
    expect(process.exitCode).toBeUndefined();
    const latestFile = join(storeRoot, 'jobintel', 'latest', 'openai', 'cs', 'jobs.json');
    expect(existsSync(latestFile)).toBe(true);

    await cli('verify', '-c', config);
    expect(process.exitCode).toBeUndefined();

    writeFileSync(latestFile, 'tampered\n');
    await cli('verify', runId, '-c', config, '--latest');
    expect(process.exitCode).toBe(2);
    expect(JSON.parse(stdout[stdout.length - 1])).toMatchObject({
      ok: false,
      mismatched: ['jobintel/latest/openai/cs/jobs.json'],
    });
  });
});

describe('exitCodeFor', () => {
  it('should map error kinds to exit codes', () => {
    expect(exitCodeFor(new ConfigurationError('bad'))).toBe(1);
    expect(
      exitCodeFor(
        new VerificationMismatch({
          runId,
          ok: false,
          missing: ['k'],
          mismatched: [],
          matched: [],
          mismatches: [],
        }),
      ),
    ).toBe(2);
    expect(exitCodeFor(new InvalidInputError('nope'))).toBe(3);
    expect(exitCodeFor(new Error('boom'))).toBe(3);
  });
});
