/**
 * Tests for the attempt executor.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { silentLogger } from '../lib/logger.js';
import { createTempDir, type TempDir } from '../test-utils/temp-dir.js';
import {
  createScriptAttempt,
  executeAttempt,
  parseMetricsLine,
} from './attempt-executor.js';

const runId = '20260101T000000000Z';

describe('parseMetricsLine', () => {
  it('should take the last valid metrics line', () => {
    const stdout = [
      'starting',
      'JOBINTEL_METRICS:{"jobsCollected":1,"errors":0,"snapshotFallbackRatio":0}',
      'JOBINTEL_METRICS:{"jobsCollected":60,"errors":2,"snapshotFallbackRatio":0.1}',
      'JOBINTEL_METRICS:{not json',
      'JOBINTEL_METRICS:{"jobsCollected":-1,"errors":0,"snapshotFallbackRatio":0}',
    ].join('\n');

    expect(parseMetricsLine(stdout)).toEqual({
      jobsCollected: 60,
      errors: 2,
      snapshotFallbackRatio: 0.1,
    });
  });

  it('should return null without a metrics line', () => {
    expect(parseMetricsLine('hello\nworld')).toBeNull();
  });
});

describe('executeAttempt', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir('jobintel-exec-');
  });

  afterEach(() => {
    dir.cleanup();
  });

  function attemptOptions(script: string) {
    return {
      script,
      runId,
      mode: 'LIVE' as const,
      attempt: 1,
      outputDir: join(dir.path, 'out'),
    };
  }

  it('should execute a successful script and parse its metrics', async () => {
    const script = dir.write(
      'ok.js',
      'console.log("hello"); console.log("JOBINTEL_METRICS:" + JSON.stringify({ jobsCollected: 5, errors: 1, snapshotFallbackRatio: 0 }));',
    );

    const result = await executeAttempt(attemptOptions(script));

    expect(result.status).toBe('ok');
    expect(result.exitCode).toBe(0);
    expect(result.stdoutTail).toContain('hello');
    expect(result.metrics).toEqual({
      jobsCollected: 5,
      errors: 1,
      snapshotFallbackRatio: 0,
    });
    expect(result.error).toBeNull();
  });

  it('should keep metrics printed before more output than the tail holds', async () => {
    const script = dir.write(
      'chatty.js',
      [
        'console.log("JOBINTEL_METRICS:" + JSON.stringify({ jobsCollected: 60, errors: 0, snapshotFallbackRatio: 0.1 }));',
        'for (let i = 0; i < 150; i++) console.log("log line " + i);',
      ].join('\n'),
    );

    const result = await executeAttempt(attemptOptions(script));

    expect(result.status).toBe('ok');
    expect(result.stdoutTail).not.toContain('JOBINTEL_METRICS:');
    expect(result.metrics).toEqual({
      jobsCollected: 60,
      errors: 0,
      snapshotFallbackRatio: 0.1,
    });
  });

  it('should reassemble a metrics line written in several pieces', async () => {
    const script = dir.write(
      'split.js',
      [
        'process.stdout.write(\'JOBINTEL_METRICS:{"jobsCollected":60,\');',
        'setTimeout(() => {',
        '  process.stdout.write(\'"errors":0,"snapshotFallbackRatio":0}\\n\');',
        '}, 100);',
      ].join('\n'),
    );

    const result = await executeAttempt(attemptOptions(script));

    expect(result.metrics).toEqual({
      jobsCollected: 60,
      errors: 0,
      snapshotFallbackRatio: 0,
    });
    expect(result.stdoutTail).toBe(
      'JOBINTEL_METRICS:{"jobsCollected":60,"errors":0,"snapshotFallbackRatio":0}',
    );
  });

  it('should read a final metrics line without a trailing newline', async () => {
    const script = dir.write(
      'no-newline.js',
      'process.stdout.write(\'JOBINTEL_METRICS:{"jobsCollected":7,"errors":1,"snapshotFallbackRatio":0}\');',
    );

    const result = await executeAttempt(attemptOptions(script));

    expect(result.metrics).toEqual({
      jobsCollected: 7,
      errors: 1,
      snapshotFallbackRatio: 0,
    });
  });

  it('should capture exit code on failure', async () => {
    const script = dir.write(
      'fail.js',
      'console.error("provider down"); process.exit(2);',
    );

    const result = await executeAttempt(attemptOptions(script));

    expect(result.status).toBe('error');
    expect(result.exitCode).toBe(2);
    expect(result.error).toBe('provider down');
  });

  it('should kill a script that outlives its timeout', async () => {
    const script = dir.write('slow.js', 'setTimeout(() => {}, 30000);');

    const result = await executeAttempt({
      ...attemptOptions(script),
      timeoutMs: 100,
    });

    expect(result.status).toBe('timeout');
    expect(result.exitCode).toBeNull();
    expect(result.error).toBe('Attempt timed out after 100ms');
  });

  it('should kill a script when the run is cancelled', async () => {
    const script = dir.write('slow.js', 'setTimeout(() => {}, 30000);');
    const controller = new AbortController();
    setTimeout(() => {
      controller.abort();
    }, 100);

    const result = await executeAttempt({
      ...attemptOptions(script),
      signal: controller.signal,
    });

    expect(result.status).toBe('cancelled');
    expect(result.error).toBe('Attempt cancelled');
  });
});

describe('createScriptAttempt', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir('jobintel-attempt-');
  });

  afterEach(() => {
    dir.cleanup();
  });

  const signal = new AbortController().signal;

  it('should pass run context to the script through the environment', async () => {
    const script = dir.write(
      'env.js',
      [
        'const { writeFileSync } = require("node:fs");',
        'const { join } = require("node:path");',
        'const env = process.env;',
        'writeFileSync(join(env.JOBINTEL_OUTPUT_DIR, "context.txt"), [env.JOBINTEL_RUN_ID, env.JOBINTEL_MODE, env.JOBINTEL_ATTEMPT].join(" "));',
        'console.log("JOBINTEL_METRICS:" + JSON.stringify({ jobsCollected: 60, errors: 0, snapshotFallbackRatio: 0 }));',
      ].join('\n'),
    );
    const outputDir = join(dir.path, 'out');
    const runAttempt = createScriptAttempt({
      script,
      logger: silentLogger(),
      outputDir: () => outputDir,
    });

    const metrics = await runAttempt({ runId, mode: 'LIVE', attempt: 2, signal });

    expect(metrics.jobsCollected).toBe(60);
    expect(readFileSync(join(outputDir, 'context.txt'), 'utf-8')).toBe(
      `${runId} LIVE 2`,
    );
  });

  it('should empty the output directory before each attempt', async () => {
    const script = dir.write('noop.js', '');
    const outputDir = join(dir.path, 'out');
    dir.write('out/stale.json', '{}');
    const runAttempt = createScriptAttempt({
      script,
      logger: silentLogger(),
      outputDir: () => outputDir,
    });

    await runAttempt({ runId, mode: 'SNAPSHOT', attempt: 1, signal });

    expect(existsSync(join(outputDir, 'stale.json'))).toBe(false);
    expect(existsSync(outputDir)).toBe(true);
  });

  it('should default SNAPSHOT metrics to zero', async () => {
    const script = dir.write('noop.js', '');
    const runAttempt = createScriptAttempt({
      script,
      logger: silentLogger(),
      outputDir: () => join(dir.path, 'out'),
    });

    await expect(
      runAttempt({ runId, mode: 'SNAPSHOT', attempt: 1, signal }),
    ).resolves.toEqual({ jobsCollected: 0, errors: 0, snapshotFallbackRatio: 0 });
  });

  it('should fail a LIVE attempt that prints no metrics', async () => {
    const script = dir.write('noop.js', '');
    const runAttempt = createScriptAttempt({
      script,
      logger: silentLogger(),
      outputDir: () => join(dir.path, 'out'),
    });

    await expect(
      runAttempt({ runId, mode: 'LIVE', attempt: 1, signal }),
    ).rejects.toThrow('Pipeline printed no JOBINTEL_METRICS: line');
  });

  it('should fail an attempt whose script exits nonzero', async () => {
    const script = dir.write('fail.js', 'process.exit(3);');
    const runAttempt = createScriptAttempt({
      script,
      logger: silentLogger(),
      outputDir: () => join(dir.path, 'out'),
    });

    await expect(
      runAttempt({ runId, mode: 'LIVE', attempt: 1, signal }),
    ).rejects.toThrow('Exit code 3');
  });
});
