/**
 * Visit Summarisation Lambda
 *
 * Triggered directly by S3 uploads. Groups a batch's visits by client,
 * summarises each client's notes in date order and writes one item per
 * client to the summaries table.
 */

import { DynamoItemWriter, ok } from "@carelog/core";
import type { Result } from "@carelog/core";
import type { Handler, S3Event } from "aws-lambda";
import { requireTableName, type ConfigError } from "./config.js";
import { acknowledge, runBatchDriver, type BatchAcknowledgment, type DriverDeps } from "./driver.js";
import { readS3Notifications } from "./notifications.js";
import { createSummaryPipeline } from "./pipelines.js";
import { getRuntime } from "./runtime.js";
import { createSummarizer } from "./summarizer.js";

export const COMPLETION_MESSAGE = "Summarisation complete.";

function summaryDeps(): Result<DriverDeps, ConfigError> {
  const runtime = getRuntime();
  if (!runtime.ok) return runtime;

  const tableName = requireTableName("SUMMARIES_TABLE");
  if (!tableName.ok) return tableName;

  const { config, reader, generator, docClient } = runtime.value;
  return ok({
    reader,
    completionMessage: COMPLETION_MESSAGE,
    pipeline: createSummaryPipeline({
      summarize: createSummarizer(generator),
      writer: new DynamoItemWriter(docClient, tableName.value),
      concurrency: config.concurrency,
    }),
  });
}

/**
 * Summarisation handler
 */
export const handler: Handler<S3Event, BatchAcknowledgment> = async (event) => {
  const notifications = readS3Notifications(event);

  const deps = summaryDeps();
  if (!deps.ok) {
    console.error("Summarisation function is misconfigured:", deps.error);
    return acknowledge(COMPLETION_MESSAGE, notifications.length);
  }

  const run = await runBatchDriver(notifications, deps.value);
  return run.acknowledgment;
};
