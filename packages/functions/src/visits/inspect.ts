/**
 * Batch Inspection Lambda
 *
 * Triggered by S3 uploads. Logs what arrived (batch id, record count, sample
 * records and field structure) without calling the model or the store.
 */

import type { Handler, S3Event } from "aws-lambda";
import { acknowledge, runBatchDriver, type BatchAcknowledgment } from "./driver.js";
import { readS3Notifications } from "./notifications.js";
import { createInspectionPipeline } from "./pipelines.js";
import { getRuntime } from "./runtime.js";

export const COMPLETION_MESSAGE = "Successfully processed S3 trigger";

/**
 * Inspection handler
 */
export const handler: Handler<S3Event, BatchAcknowledgment> = async (event) => {
  const notifications = readS3Notifications(event);

  const runtime = getRuntime();
  if (!runtime.ok) {
    console.error("Inspection function is misconfigured:", runtime.error);
    return acknowledge(COMPLETION_MESSAGE, notifications.length);
  }

  const run = await runBatchDriver(notifications, {
    reader: runtime.value.reader,
    pipeline: createInspectionPipeline(),
    completionMessage: COMPLETION_MESSAGE,
  });
  return run.acknowledgment;
};
