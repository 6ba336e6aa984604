/**
 * Per-container collaborators for the visit batch functions
 *
 * Clients are built on first use and reused across warm invocations, then
 * handed to the driver explicitly.
 */

import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import { S3Client } from "@aws-sdk/client-s3";
import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { createDocClient, ok } from "@carelog/core";
import type { Result } from "@carelog/core";
import { loadPipelineConfig, type ConfigError, type PipelineConfig } from "./config.js";
import { createBedrockTextGenerator, type TextGenerator } from "./invoke-model.js";
import { S3ObjectReader, type ObjectStoreReader } from "./object-store.js";

export interface Runtime {
  config: PipelineConfig;
  reader: ObjectStoreReader;
  generator: TextGenerator;
  docClient: DynamoDBDocumentClient;
}

let runtime: Runtime | undefined;

/**
 * Build the AWS clients from a validated config
 */
export function createRuntime(config: PipelineConfig): Runtime {
  return {
    config,
    reader: new S3ObjectReader(new S3Client({ region: config.region })),
    generator: createBedrockTextGenerator(
      new BedrockRuntimeClient({ region: config.region }),
      config.modelId,
      { timeoutMs: config.modelTimeoutMs }
    ),
    docClient: createDocClient(config.region),
  };
}

/**
 * Runtime for this container, created on first call
 */
export function getRuntime(): Result<Runtime, ConfigError> {
  if (runtime) return ok(runtime);

  const config = loadPipelineConfig();
  if (!config.ok) return config;

  runtime = createRuntime(config.value);
  return ok(runtime);
}
