/**
 * Environment configuration for the visit batch functions
 */

import { DEFAULT_REGION, err, ok } from "@carelog/core";
import type { Result } from "@carelog/core";
import { DEFAULT_MODEL_ID } from "./invoke-model.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface PipelineConfig {
  /** Bedrock model id (default: Titan Text Express) */
  modelId: string;
  /** Region for Bedrock and DynamoDB */
  region: string;
  /** Task group size; unset = derived from available parallelism */
  concurrency?: number;
  /** Abort model calls after this many milliseconds; unset = no timeout */
  modelTimeoutMs?: number;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string): Result<number | undefined, ConfigError> {
  const raw = env[name]?.trim();
  if (!raw) return ok(undefined);

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return err(new ConfigError(`${name} must be a positive integer, got "${raw}"`));
  }
  return ok(value);
}

/**
 * Read model, region and tuning settings
 */
export function loadPipelineConfig(env: Env = process.env): Result<PipelineConfig, ConfigError> {
  const concurrency = readPositiveInt(env, "WORKER_CONCURRENCY");
  if (!concurrency.ok) return concurrency;

  const modelTimeoutMs = readPositiveInt(env, "MODEL_TIMEOUT_MS");
  if (!modelTimeoutMs.ok) return modelTimeoutMs;

  return ok({
    modelId: env.MODEL_ID?.trim() || DEFAULT_MODEL_ID,
    region: env.AWS_REGION?.trim() || DEFAULT_REGION,
    ...(concurrency.value !== undefined && { concurrency: concurrency.value }),
    ...(modelTimeoutMs.value !== undefined && { modelTimeoutMs: modelTimeoutMs.value }),
  });
}

/**
 * Read a required table name
 */
export function requireTableName(name: string, env: Env = process.env): Result<string, ConfigError> {
  const value = env[name]?.trim();
  if (!value) {
    return err(new ConfigError(`${name} environment variable must be set`));
  }
  return ok(value);
}
