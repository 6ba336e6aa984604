/**
 * Batch driver
 *
 * Processes every object named by a trigger event, one at a time:
 * fetch → parse → aggregate → persist → report. A failure at any stage is
 * logged with the object's location and the driver moves on to the next
 * object; the acknowledgment never reflects per-object outcomes.
 */

import {
  deriveBatchId,
  isPlausibleBatchId,
  parseVisitBatch,
  settle,
} from "@carelog/core";
import type { Batch, RejectedRecord } from "@carelog/core";
import type { ObjectStoreReader } from "./object-store.js";
import type { Notification, ObjectRef } from "./notifications.js";

export interface BatchContext {
  ref: ObjectRef;
  /** Entries the parser could not read */
  rejected: readonly RejectedRecord[];
  /** Decoded source entries, before normalisation */
  entries: readonly unknown[];
}

export interface PipelineReport {
  /** Entries in the source file */
  records: number;
  /** Output items produced */
  processed: number;
  /** Units with no usable text */
  skipped: number;
  /** Units of work that threw (records, or clients when summarising) */
  failed: number;
  /** Source entries the parser could not read */
  rejected: number;
  /** Items the store accepted */
  written: number;
}

export interface BatchPipeline {
  readonly name: string;
  process(batch: Batch, context: BatchContext): Promise<PipelineReport>;
}

/** "unexpected" = the object's processing threw outside any stage */
export type FailedStage = "fetch" | "parse" | "aggregate" | "unexpected";

export type ObjectOutcome =
  | { state: "reported"; ref: ObjectRef; batchId: string; report: PipelineReport }
  | { state: "empty"; ref: ObjectRef; batchId: string }
  | { state: "failed"; ref: ObjectRef; stage: FailedStage; error: unknown };

export interface BatchAcknowledgment {
  statusCode: 200;
  body: string;
}

export interface DriverDeps {
  reader: ObjectStoreReader;
  pipeline: BatchPipeline;
  /** Message placed in the acknowledgment body */
  completionMessage: string;
}

export interface DriverRun {
  acknowledgment: BatchAcknowledgment;
  outcomes: ObjectOutcome[];
}

/**
 * Fixed-shape success response for the trigger
 */
export function acknowledge(message: string, processedObjects: number): BatchAcknowledgment {
  return {
    statusCode: 200,
    body: JSON.stringify({
      message,
      processed_objects: processedObjects,
    }),
  };
}

function location(ref: ObjectRef): string {
  return `s3://${ref.bucket}/${ref.key}`;
}

/**
 * Run one object through the pipeline
 */
export async function processObject(ref: ObjectRef, deps: DriverDeps): Promise<ObjectOutcome> {
  console.log(`Processing S3 object: ${location(ref)}`);

  const batchId = deriveBatchId(ref.key);
  console.log(`Extracted batch ID: ${batchId}`);
  if (!isPlausibleBatchId(batchId)) {
    console.warn(`Extracted batch ID '${batchId}' doesn't look valid`);
  }

  const content = await deps.reader.getObjectText(ref.bucket, ref.key);
  if (!content.ok) {
    console.error(`Failed to fetch ${location(ref)} (${content.error.reason}):`, content.error);
    return { state: "failed", ref, stage: "fetch", error: content.error };
  }

  const parsed = parseVisitBatch(content.value, batchId);
  if (!parsed.ok) {
    console.error(`Failed to parse JSON from ${location(ref)}: ${parsed.error.message}`);
    return { state: "failed", ref, stage: "parse", error: parsed.error };
  }

  const { batch, rejected, entries } = parsed.value;
  console.log(`Found ${entries.length} records to process in batch '${batchId}'`);
  for (const entry of rejected) {
    console.warn(`Record ${entry.index} could not be read: ${entry.reason}`);
  }

  if (entries.length === 0) {
    console.warn(`No records found in ${location(ref)}`);
    return { state: "empty", ref, batchId };
  }

  const report = await settle(() => deps.pipeline.process(batch, { ref, rejected, entries }));
  if (!report.ok) {
    console.error(`${deps.pipeline.name} failed for ${location(ref)}:`, report.error);
    return { state: "failed", ref, stage: "aggregate", error: report.error };
  }

  return { state: "reported", ref, batchId, report: report.value };
}

/**
 * Process every decodable notification of one trigger event
 */
export async function runBatchDriver(
  notifications: readonly Notification[],
  deps: DriverDeps
): Promise<DriverRun> {
  const outcomes: ObjectOutcome[] = [];

  for (const notification of notifications) {
    if (!notification.ok) {
      console.warn(`Skipping event record: ${notification.error.message}`);
      continue;
    }
    // Sequential: each object already fans out over the task group
    for (const ref of notification.value) {
      const outcome = await settle(() => processObject(ref, deps));
      if (outcome.ok) {
        outcomes.push(outcome.value);
      } else {
        console.error(`Processing failed for ${location(ref)}:`, outcome.error);
        outcomes.push({ state: "failed", ref, stage: "unexpected", error: outcome.error });
      }
    }
  }

  return {
    acknowledgment: acknowledge(deps.completionMessage, notifications.length),
    outcomes,
  };
}
