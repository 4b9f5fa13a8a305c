/**
 * Command tree for the jobintel CLI.
 *
 * @module
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { Command } from 'commander';

import { loadConfig } from '../../config/load.js';
import { canonicalJson } from '../../lib/canonical-json.js';
import { errorMessage, InvalidInputError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import { createNotifier } from '../../notify/slack.js';
import { createPipeline, type Pipeline } from '../../pipeline/pipeline.js';
import { parsePlan } from '../../publish/planner.js';
import { assertVerified } from '../../publish/verifier.js';
import { createRunRepository } from '../../runs/run-repository.js';
import type { JobIntelConfig } from '../../schemas/config.js';
import type { PublishPlan } from '../../schemas/publish.js';
import { registerConfigCommands } from './commands/config.js';
import { EXIT_CODES, runAction } from './run-action.js';

/** Options shared by commands that accept --config. */
interface ConfigOptions {
  config?: string;
}

/** Options for the publish command. */
interface PublishOptions extends ConfigOptions {
  dryRun?: boolean;
}

/** Options for the verify command. */
interface VerifyOptions extends ConfigOptions {
  offline?: boolean;
  publishResult?: boolean;
  planJson?: string;
  latest?: boolean;
}

/** Context shared by the run-scoped commands. */
interface CommandContext {
  config: JobIntelConfig;
  pipeline: Pipeline;
}

function buildContext(
  options: ConfigOptions,
  signal?: AbortSignal,
): CommandContext {
  const config = loadConfig(options.config);
  const logger = createLogger(config.log);
  const slackToken = config.notifications.slackTokenPath
    ? readFileSync(config.notifications.slackTokenPath, 'utf-8').trim()
    : null;
  const pipeline = createPipeline(config, {
    logger,
    notifier: createNotifier({ slackToken, logger }),
    signal,
  });
  return { config, pipeline };
}

/** The explicit run id, or the one named by `last_run.json`. */
async function resolveRunId(
  config: JobIntelConfig,
  runId: string | undefined,
): Promise<string> {
  if (runId) return runId;
  const last = await createRunRepository(config.runsDir).lastRunId();
  if (!last) throw new InvalidInputError(`No runs recorded in ${config.runsDir}`);
  return last;
}

function readPlanFile(path: string): PublishPlan {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolve(path), 'utf-8'));
  } catch (err: unknown) {
    throw new InvalidInputError(`Cannot read plan ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return parsePlan(raw);
}

/** Build the CLI program. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('jobintel')
    .description(
      'Policy-gated pipeline runs with content-addressed publish and verify',
    )
    .version('0.1.0');

  program
    .command('run')
    .description('Execute a pipeline run, then plan, publish and verify it')
    .option('-c, --config <path>', 'Path to config file')
    .action((options: ConfigOptions) =>
      runAction(async () => {
        const controller = new AbortController();
        const onSignal = () => {
          controller.abort();
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);
        try {
          const { pipeline } = buildContext(options, controller.signal);
          const result = await pipeline.run();
          process.stdout.write(
            canonicalJson({
              runId: result.runId,
              status: result.status,
              accepted: result.report.accepted,
              cancelled: result.report.cancelled,
              artifacts: result.report.artifacts.length,
              durationMs: result.durationMs,
            }),
          );
          if (result.verifyReport) assertVerified(result.verifyReport);
          if (
            result.status === 'rejected' ||
            result.status === 'publish_failed'
          ) {
            process.exitCode = EXIT_CODES.runFailed;
          }
        } finally {
          process.off('SIGINT', onSignal);
          process.off('SIGTERM', onSignal);
        }
      }),
    );

  program
    .command('plan')
    .description('Print the publish plan for a recorded run')
    .argument('[runId]', 'Run id (defaults to the last run)')
    .option('-c, --config <path>', 'Path to config file')
    .action((runId: string | undefined, options: ConfigOptions) =>
      runAction(async () => {
        const { config, pipeline } = buildContext(options);
        const publishPlan = await pipeline.planRun(
          await resolveRunId(config, runId),
        );
        process.stdout.write(canonicalJson(publishPlan));
      }),
    );

  program
    .command('publish')
    .description('Publish a recorded run to the object store')
    .argument('[runId]', 'Run id (defaults to the last run)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--dry-run', 'Report the writes without performing them')
    .action((runId: string | undefined, options: PublishOptions) =>
      runAction(async () => {
        const { config, pipeline } = buildContext(options);
        const { result } = await pipeline.publishRun(
          await resolveRunId(config, runId),
          { dryRun: options.dryRun },
        );
        process.stdout.write(canonicalJson(result));
        if (result.status === 'failed') process.exitCode = EXIT_CODES.runFailed;
      }),
    );

  program
    .command('verify')
    .description('Verify a published run against its plan')
    .argument('[runId]', 'Run id (defaults to the last run)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--offline', 'Compare against the local run directory')
    .option('--publish-result', 'Compare against the saved publish result')
    .option('--plan-json <path>', 'Expected plan file (defaults to the saved plan)')
    .option('--latest', 'Check only the latest pointers')
    .action((runId: string | undefined, options: VerifyOptions) =>
      runAction(async () => {
        const { config, pipeline } = buildContext(options);
        const report = await pipeline.verifyRun(
          await resolveRunId(config, runId),
          {
            source: options.offline
              ? 'local'
              : options.publishResult
                ? 'publish-result'
                : 'store',
            latestOnly: options.latest,
            expected: options.planJson
              ? readPlanFile(options.planJson)
              : undefined,
          },
        );
        process.stdout.write(canonicalJson(report));
        assertVerified(report);
      }),
    );

  registerConfigCommands(program);

  return program;
}
