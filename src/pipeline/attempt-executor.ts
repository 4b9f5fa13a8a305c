/**
 * Attempt executor. Spawns the pipeline script as a child process, captures
 * output, parses the metrics line, enforces timeouts and cancellation.
 */

import { spawn } from 'node:child_process';
import { mkdir, rm } from 'node:fs/promises';
import { extname } from 'node:path';

import type { Logger } from 'pino';

import type { AttemptContext, RunAttemptFn } from '../policy/engine.js';
import {
  type AttemptMetrics,
  attemptMetricsSchema,
  type RunMode,
} from '../schemas/run-report.js';

/** Prefix of the stdout line carrying an attempt's metrics as JSON. */
export const METRICS_LINE_PREFIX = 'JOBINTEL_METRICS:';

/** Result of one script execution. */
export interface AttemptExecutionResult {
  status: 'ok' | 'error' | 'timeout' | 'cancelled';
  /** Process exit code (null on timeout, cancellation or spawn error). */
  exitCode: number | null;
  durationMs: number;
  /** Last metrics line printed by the script, if any parsed. */
  metrics: AttemptMetrics | null;
  /** Last N lines of stdout. */
  stdoutTail: string;
  /** Last N lines of stderr. */
  stderrTail: string;
  error: string | null;
}

/** Command resolution result. */
export interface ResolvedCommand {
  command: string;
  args: string[];
}

/** Options for executing one attempt. */
export interface AttemptExecutionOptions {
  script: string;
  runId: string;
  mode: RunMode;
  attempt: number;
  /** Directory the script writes its artifacts into. */
  outputDir: string;
  timeoutMs?: number;
  /** Kills the child when aborted. */
  signal?: AbortSignal;
  /** Optional custom command resolver (for extensibility). */
  commandResolver?: (script: string) => ResolvedCommand;
}

/** Ring buffer for capturing last N lines of output. */
class RingBuffer {
  private lines: string[] = [];
  constructor(private maxLines: number) {}

  append(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.maxLines) {
      this.lines.shift();
    }
  }

  getAll(): string {
    return this.lines.join('\n');
  }
}

/**
 * Splits a text stream into lines, carrying a partial line across chunks.
 * `flush` emits whatever remains once the stream has ended.
 */
class LineSplitter {
  private partial = '';
  constructor(private onLine: (line: string) => void) {}

  push(chunk: string): void {
    const parts = (this.partial + chunk).split('\n');
    this.partial = parts.pop() ?? '';
    for (const line of parts) this.onLine(line);
  }

  flush(): void {
    if (this.partial) this.onLine(this.partial);
    this.partial = '';
  }
}

/** Metrics carried by a single `JOBINTEL_METRICS:{json}` line, if valid. */
export function metricsFromLine(line: string): AttemptMetrics | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(METRICS_LINE_PREFIX)) return null;
  let payload: unknown;
  try {
    payload = JSON.parse(trimmed.slice(METRICS_LINE_PREFIX.length));
  } catch {
    // Malformed JSON on a metrics line counts as no metrics.
    return null;
  }
  const parsed = attemptMetricsSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

/** Parse the last valid `JOBINTEL_METRICS:{json}` line. */
export function parseMetricsLine(stdout: string): AttemptMetrics | null {
  let metrics: AttemptMetrics | null = null;
  for (const line of stdout.split('\n')) {
    metrics = metricsFromLine(line) ?? metrics;
  }
  return metrics;
}

/** Resolve the command and arguments for a script based on its file extension. */
function resolveCommand(script: string): ResolvedCommand {
  switch (extname(script).toLowerCase()) {
    case '.sh':
      return { command: 'sh', args: [script] };
    case '.py':
      return { command: 'python3', args: [script] };
    default:
      // .js, .mjs, .cjs, or anything else: run with node
      return { command: 'node', args: [script] };
  }
}

/**
 * Execute the pipeline script once. Always resolves; the child process has
 * exited by the time the promise settles.
 */
export function executeAttempt(
  options: AttemptExecutionOptions,
): Promise<AttemptExecutionResult> {
  const { script, runId, mode, attempt, outputDir, timeoutMs, signal } = options;
  const startTime = Date.now();

  return new Promise((resolve) => {
    const stdoutBuffer = new RingBuffer(100);
    const stderrBuffer = new RingBuffer(100);

    const { command, args } = options.commandResolver
      ? options.commandResolver(script)
      : resolveCommand(script);
    const child = spawn(command, args, {
      env: {
        ...process.env,
        JOBINTEL_RUN_ID: runId,
        JOBINTEL_MODE: mode,
        JOBINTEL_ATTEMPT: String(attempt),
        JOBINTEL_OUTPUT_DIR: outputDir,
      },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stopReason: 'timeout' | 'cancelled' | null = null;
    let timeoutHandle: NodeJS.Timeout | null = null;
    let killHandle: NodeJS.Timeout | null = null;

    const stop = (reason: 'timeout' | 'cancelled') => {
      if (stopReason) return;
      stopReason = reason;
      child.kill('SIGTERM');
      killHandle = setTimeout(() => child.kill('SIGKILL'), 5000);
      killHandle.unref();
    };
    const onAbort = () => {
      stop('cancelled');
    };

    if (timeoutMs) {
      timeoutHandle = setTimeout(() => {
        stop('timeout');
      }, timeoutMs);
    }
    if (signal?.aborted) onAbort();
    else signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => {
      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (killHandle) clearTimeout(killHandle);
      signal?.removeEventListener('abort', onAbort);
    };

    let metrics: AttemptMetrics | null = null;
    const stdoutLines = new LineSplitter((line) => {
      metrics = metricsFromLine(line) ?? metrics;
      if (line.trim()) stdoutBuffer.append(line);
    });
    const stderrLines = new LineSplitter((line) => {
      if (line.trim()) stderrBuffer.append(line);
    });

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdoutLines.push(chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderrLines.push(chunk);
    });

    child.on('close', (exitCode) => {
      cleanup();
      stdoutLines.flush();
      stderrLines.flush();
      const durationMs = Date.now() - startTime;
      const stdoutTail = stdoutBuffer.getAll();
      const stderrTail = stderrBuffer.getAll();

      if (stopReason) {
        resolve({
          status: stopReason,
          exitCode: null,
          durationMs,
          metrics: null,
          stdoutTail,
          stderrTail,
          error:
            stopReason === 'timeout'
              ? `Attempt timed out after ${String(timeoutMs)}ms`
              : 'Attempt cancelled',
        });
      } else if (exitCode === 0) {
        resolve({
          status: 'ok',
          exitCode,
          durationMs,
          metrics,
          stdoutTail,
          stderrTail,
          error: null,
        });
      } else {
        resolve({
          status: 'error',
          exitCode,
          durationMs,
          metrics,
          stdoutTail,
          stderrTail,
          error: stderrTail || `Exit code ${String(exitCode)}`,
        });
      }
    });

    child.on('error', (err) => {
      cleanup();
      resolve({
        status: 'error',
        exitCode: null,
        durationMs: Date.now() - startTime,
        metrics: null,
        stdoutTail: stdoutBuffer.getAll(),
        stderrTail: stderrBuffer.getAll(),
        error: err.message,
      });
    });
  });
}

/** Options for a script-backed attempt function. */
export interface ScriptAttemptOptions {
  script: string;
  /** Output directory for a run. */
  outputDir: (runId: string) => string;
  timeoutMs?: number;
  logger: Logger;
  commandResolver?: (script: string) => ResolvedCommand;
}

/**
 * Build a RunAttemptFn that runs the pipeline script. The output directory is
 * emptied before every attempt so a failed attempt leaves nothing behind.
 * LIVE attempts must print a metrics line; SNAPSHOT attempts may omit it.
 */
export function createScriptAttempt(options: ScriptAttemptOptions): RunAttemptFn {
  const { script, timeoutMs, logger, commandResolver } = options;

  return async (ctx: AttemptContext): Promise<AttemptMetrics> => {
    const outputDir = options.outputDir(ctx.runId);
    await rm(outputDir, { recursive: true, force: true });
    await mkdir(outputDir, { recursive: true });

    const result = await executeAttempt({
      script,
      runId: ctx.runId,
      mode: ctx.mode,
      attempt: ctx.attempt,
      outputDir,
      timeoutMs,
      signal: ctx.signal,
      commandResolver,
    });
    logger.info(
      {
        runId: ctx.runId,
        attempt: ctx.attempt,
        status: result.status,
        durationMs: result.durationMs,
      },
      'Pipeline attempt finished',
    );

    if (result.status !== 'ok') {
      throw new Error(result.error ?? `Attempt ended with status ${result.status}`);
    }
    if (result.metrics) return result.metrics;
    if (ctx.mode === 'SNAPSHOT') {
      return { jobsCollected: 0, errors: 0, snapshotFallbackRatio: 0 };
    }
    throw new Error(`Pipeline printed no ${METRICS_LINE_PREFIX} line`);
  };
}
