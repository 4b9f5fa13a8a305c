/**
 * @module commands/config
 *
 * CLI commands: validate, init, config-show.
 */

import { existsSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Command } from 'commander';

import { loadConfig } from '../../../config/load.js';
import { resolvePolicyConfig } from '../../../policy/policy.js';
import { resolveDestination } from '../../../publish/planner.js';
import { runAction } from '../run-action.js';

/** Minimal starter config template. */
export const INIT_CONFIG_TEMPLATE = {
  mode: 'SNAPSHOT',
  runsDir: './data/runs',
  policy: {
    errorRateMax: 0.2,
    minJobs: 50,
    minSnapshotRatio: 0.5,
    maxAttempts: 3,
    backoffBase: 1,
    backoffMax: 30,
  },
  destination: {
    prefix: 'jobintel',
    provider: 'openai',
    profile: 'cs',
  },
  store: {
    kind: 'fs',
    root: './data/published',
  },
  publish: {
    enabled: false,
    dryRun: true,
  },
  attempt: {
    script: './pipeline.js',
  },
  log: {
    level: 'info',
  },
  notifications: {
    slackTokenPath: '',
    defaultOnFailure: null,
    defaultOnSuccess: null,
  },
};

/** Register config-related commands on the CLI. */
export function registerConfigCommands(cli: Command): void {
  cli
    .command('validate')
    .description(
      'Validate a configuration file (with environment overrides) against the schema',
    )
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) =>
      runAction(() => {
        const config = loadConfig(options.config);
        const lines = [
          '✅ Config valid',
          `  Mode: ${config.mode}`,
          `  Runs directory: ${config.runsDir}`,
          `  Log level: ${config.log.level}`,
        ];
        if (config.mode === 'LIVE') {
          const policy = resolvePolicyConfig(config.policy);
          lines.push(
            `  Policy: error_rate_max ${String(policy.errorRateMax)}, min_jobs ${String(policy.minJobs)}, max_attempts ${String(policy.maxAttempts)}`,
          );
        }
        if (config.publish.enabled) {
          const dest = resolveDestination(config.destination);
          lines.push(
            `  Publish: ${dest.prefix}/{runs,latest}/${dest.provider}/${dest.profile}${config.publish.dryRun ? ' (dry run)' : ''}`,
          );
        }
        if (config.store) {
          lines.push(
            `  Store: ${config.store.kind === 's3' ? `s3://${config.store.bucket}` : config.store.root}`,
          );
        }
        console.log(lines.join('\n'));
      }),
    );

  cli
    .command('init')
    .description('Generate a starter configuration file')
    .option(
      '-o, --output <path>',
      'Output config file path',
      'jobintel.config.json',
    )
    .action((options: { output: string }) =>
      runAction(() => {
        const outputPath = resolve(options.output);

        if (existsSync(outputPath)) {
          console.error(`❌ File already exists: ${outputPath}`);
          console.error('   Remove it first or choose a different path with -o');
          process.exitCode = 1;
          return;
        }

        writeFileSync(
          outputPath,
          JSON.stringify(INIT_CONFIG_TEMPLATE, null, 2) + '\n',
        );
        console.log(`✅ Wrote ${outputPath}`);
        console.log();
        console.log('Next steps:');
        console.log(
          '  1. Edit the config file to set your thresholds and destination',
        );
        console.log('  2. Validate: jobintel validate -c ' + options.output);
        console.log('  3. Run: jobintel run -c ' + options.output);
      }),
    );

  cli
    .command('config-show')
    .description(
      'Show the resolved configuration (defaults applied, secrets redacted)',
    )
    .option('-c, --config <path>', 'Path to configuration file')
    .action((options: { config?: string }) =>
      runAction(() => {
        const config = loadConfig(options.config);
        const redacted = {
          ...config,
          notifications: {
            ...config.notifications,
            slackTokenPath: config.notifications.slackTokenPath
              ? '***'
              : undefined,
          },
        };
        console.log(JSON.stringify(redacted, null, 2));
      }),
    );
}
