/**
 * Configuration loading: JSON file, overlaid by environment variables, validated by zod.
 *
 * @module
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { ZodError } from 'zod';

import {
  ConfigurationError,
  errorMessage,
  formatIssues,
} from '../lib/errors.js';
import {
  type JobIntelConfig,
  jobIntelConfigSchema,
} from '../schemas/config.js';

type Env = Record<string, string | undefined>;
type Plain = Record<string, unknown>;

function isPlain(value: unknown): value is Plain {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively merge `overlay` onto `base`; overlay wins on conflicts. */
function merge(base: Plain, overlay: Plain): Plain {
  const out: Plain = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = out[key];
    out[key] = isPlain(current) && isPlain(value) ? merge(current, value) : value;
  }
  return out;
}

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

function booleanFromEnv(env: Env, name: string): boolean | undefined {
  const raw = readEnv(env, name)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got '${raw}'`);
}

/** Drop undefined leaves so they never shadow file values. */
function compact(value: Plain): Plain {
  const out: Plain = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    if (isPlain(child)) {
      const nested = compact(child);
      if (Object.keys(nested).length > 0) out[key] = nested;
    } else {
      out[key] = child;
    }
  }
  return out;
}

/** Build the environment overlay. Unset variables contribute nothing. */
export function configFromEnv(env: Env): Plain {
  const bucket = readEnv(env, 'JOBINTEL_S3_BUCKET');
  return compact({
    mode: readEnv(env, 'JOBINTEL_MODE')?.toUpperCase(),
    runsDir: readEnv(env, 'JOBINTEL_RUNS_DIR'),
    policy: {
      errorRateMax: numberFromEnv(env, 'JOBINTEL_ERROR_RATE_MAX'),
      minJobs: numberFromEnv(env, 'JOBINTEL_MIN_JOBS'),
      minSnapshotRatio: numberFromEnv(env, 'JOBINTEL_MIN_SNAPSHOT_RATIO'),
      maxAttempts: numberFromEnv(env, 'JOBINTEL_PROVIDER_MAX_ATTEMPTS'),
      backoffBase: numberFromEnv(env, 'JOBINTEL_PROVIDER_BACKOFF_BASE'),
      backoffMax: numberFromEnv(env, 'JOBINTEL_PROVIDER_BACKOFF_MAX'),
    },
    destination: {
      prefix: readEnv(env, 'JOBINTEL_S3_PREFIX'),
      provider: readEnv(env, 'JOBINTEL_PROVIDER'),
      profile: readEnv(env, 'JOBINTEL_PROFILE'),
    },
    store: bucket
      ? { kind: 's3', bucket, region: readEnv(env, 'AWS_REGION') }
      : undefined,
    publish: {
      enabled: booleanFromEnv(env, 'PUBLISH_S3'),
      dryRun: booleanFromEnv(env, 'PUBLISH_DRY_RUN'),
    },
    log: { level: readEnv(env, 'LOG_LEVEL') },
  });
}

/** Validate a raw configuration object, converting zod failures to ConfigurationError. */
export function parseConfig(raw: unknown): JobIntelConfig {
  try {
    return jobIntelConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = formatIssues(err);
      throw new ConfigurationError(
        `Invalid configuration: ${issues.join('; ')}`,
        issues,
        { cause: err },
      );
    }
    throw err;
  }
}

/** Load config from an optional JSON file path and the environment. */
export function loadConfig(
  configPath?: string,
  env: Env = process.env,
): JobIntelConfig {
  let fileConfig: Plain = {};
  if (configPath) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(resolve(configPath), 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Cannot read config file ${configPath}: ${errorMessage(err)}`,
        [],
        { cause: err },
      );
    }
    if (!isPlain(parsed)) {
      throw new ConfigurationError(`Config file ${configPath} must hold a JSON object`);
    }
    fileConfig = parsed;
  }
  return parseConfig(merge(fileConfig, configFromEnv(env)));
}
