/**
 * Visit Classification Lambda
 *
 * Subscribed to the upload topic: each SNS message wraps an S3 event for a
 * newly uploaded batch file. Every visit note is classified red/amber/green
 * and written to the classifications table keyed by (record index, batch id).
 */

import { DynamoItemWriter, ok } from "@carelog/core";
import type { Result } from "@carelog/core";
import type { Handler, SNSEvent } from "aws-lambda";
import { createClassifier } from "./classifier.js";
import { requireTableName, type ConfigError } from "./config.js";
import { acknowledge, runBatchDriver, type BatchAcknowledgment, type DriverDeps } from "./driver.js";
import { readSnsNotifications } from "./notifications.js";
import { createClassificationPipeline } from "./pipelines.js";
import { getRuntime } from "./runtime.js";

export const COMPLETION_MESSAGE = "Processing complete.";

function classificationDeps(): Result<DriverDeps, ConfigError> {
  const runtime = getRuntime();
  if (!runtime.ok) return runtime;

  const tableName = requireTableName("CLASSIFICATIONS_TABLE");
  if (!tableName.ok) return tableName;

  const { config, reader, generator, docClient } = runtime.value;
  return ok({
    reader,
    completionMessage: COMPLETION_MESSAGE,
    pipeline: createClassificationPipeline({
      classify: createClassifier(generator),
      writer: new DynamoItemWriter(docClient, tableName.value),
      concurrency: config.concurrency,
    }),
  });
}

/**
 * Classification handler
 */
export const handler: Handler<SNSEvent, BatchAcknowledgment> = async (event) => {
  console.log("Received event:", JSON.stringify(event));
  const notifications = readSnsNotifications(event);

  const deps = classificationDeps();
  if (!deps.ok) {
    console.error("Classification function is misconfigured:", deps.error);
    return acknowledge(COMPLETION_MESSAGE, notifications.length);
  }

  const run = await runBatchDriver(notifications, deps.value);
  return run.acknowledgment;
};
