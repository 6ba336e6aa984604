/**
 * Local batch runs
 *
 * Runs the Lambda pipelines against files on disk. Model calls still go to
 * Bedrock; store writes go to DynamoDB unless the run is a dry run.
 */

import { resolve, dirname, basename } from "path";
import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import { DynamoItemWriter, createDocClient, ok } from "@carelog/core";
import type { ItemWriter, Result } from "@carelog/core";
import {
  ConfigError,
  createBedrockTextGenerator,
  createClassificationPipeline,
  createClassifier,
  createInspectionPipeline,
  createSummarizer,
  createSummaryPipeline,
  requireTableName,
  runBatchDriver,
  type BatchPipeline,
  type DriverRun,
  type Notification,
  type PipelineConfig,
  type TextGenerator,
} from "@carelog/functions/visits";
import { ConsoleItemWriter } from "./console-writer.js";
import { FileObjectReader } from "./file-reader.js";

export type LocalCommand = "classify" | "summarise" | "inspect";

export interface LocalRunOptions {
  /** Print items instead of writing them */
  dryRun?: boolean;
  /** Task group size */
  concurrency?: number;
  /** Table to write to (default: from the environment) */
  table?: string;
}

export interface LocalRunDeps {
  generator: TextGenerator;
  writerFor(tableName: string): ItemWriter;
  /** Task group size from the environment; --concurrency overrides it */
  concurrency?: number;
}

const TABLE_VARIABLES: Record<Exclude<LocalCommand, "inspect">, string> = {
  classify: "CLASSIFICATIONS_TABLE",
  summarise: "SUMMARIES_TABLE",
};

/**
 * Bedrock and DynamoDB collaborators for a local run
 */
export function createLocalDeps(config: PipelineConfig): LocalRunDeps {
  const docClient = createDocClient(config.region);
  return {
    generator: createBedrockTextGenerator(
      new BedrockRuntimeClient({ region: config.region }),
      config.modelId,
      { timeoutMs: config.modelTimeoutMs }
    ),
    writerFor: (tableName) => new DynamoItemWriter(docClient, tableName),
    concurrency: config.concurrency,
  };
}

/**
 * One notification per file: bucket = its directory, key = its name
 */
export function fileNotifications(files: readonly string[]): Notification[] {
  return files.map((file) => {
    const path = resolve(file);
    return ok([{ bucket: dirname(path), key: basename(path) }]);
  });
}

function resolveWriter(
  command: Exclude<LocalCommand, "inspect">,
  options: LocalRunOptions,
  deps: LocalRunDeps
): Result<ItemWriter, ConfigError> {
  if (options.dryRun) return ok(new ConsoleItemWriter());
  if (options.table) return ok(deps.writerFor(options.table));

  const tableName = requireTableName(TABLE_VARIABLES[command]);
  return tableName.ok ? ok(deps.writerFor(tableName.value)) : tableName;
}

export function buildPipeline(
  command: LocalCommand,
  options: LocalRunOptions,
  deps: LocalRunDeps
): Result<BatchPipeline, ConfigError> {
  if (command === "inspect") return ok(createInspectionPipeline());

  const writer = resolveWriter(command, options, deps);
  if (!writer.ok) return writer;
  const concurrency = options.concurrency ?? deps.concurrency;

  if (command === "classify") {
    return ok(
      createClassificationPipeline({
        classify: createClassifier(deps.generator),
        writer: writer.value,
        concurrency,
      })
    );
  }
  return ok(
    createSummaryPipeline({
      summarize: createSummarizer(deps.generator),
      writer: writer.value,
      concurrency,
    })
  );
}

/**
 * Run one command over local batch files
 */
export async function runLocal(
  command: LocalCommand,
  files: readonly string[],
  options: LocalRunOptions,
  deps: LocalRunDeps
): Promise<Result<DriverRun, ConfigError>> {
  const pipeline = buildPipeline(command, options, deps);
  if (!pipeline.ok) return pipeline;

  const run = await runBatchDriver(fileNotifications(files), {
    reader: new FileObjectReader(),
    pipeline: pipeline.value,
    completionMessage: `Local ${command} run complete.`,
  });
  return ok(run);
}
