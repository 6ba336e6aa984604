/**
 * Batch pipelines run by the driver
 *
 * classification: one urgency category per visit record
 * summary: one generated summary per client
 * inspection: logs the batch shape, no model or store calls
 */

import {
  aggregateClassifications,
  aggregateSummaries,
  persistItems,
} from "@carelog/core";
import type {
  AggregateOptions,
  ClassifyNote,
  ItemWriter,
  SummarizeNotes,
} from "@carelog/core";
import type { BatchPipeline, PipelineReport } from "./driver.js";

export interface ClassificationPipelineDeps extends AggregateOptions {
  classify: ClassifyNote;
  writer: ItemWriter;
}

export interface SummaryPipelineDeps extends AggregateOptions {
  summarize: SummarizeNotes;
  writer: ItemWriter;
}

/** Fields reported by the inspection pipeline */
const INSPECTED_FIELDS = ["client", "carer", "date", "note", "classification"] as const;
const SAMPLE_SIZE = 3;
const PREVIEW_LENGTH = 100;

export function createClassificationPipeline(deps: ClassificationPipelineDeps): BatchPipeline {
  return {
    name: "classification",
    async process(batch, { rejected }) {
      const outcome = await aggregateClassifications(batch, deps.classify, deps);
      const written = await persistItems(deps.writer, outcome.items);

      const report: PipelineReport = {
        records: batch.records.length + rejected.length,
        processed: outcome.items.length,
        skipped: outcome.skipped,
        failed: outcome.failed,
        rejected: rejected.length,
        written,
      };

      console.log("=== PROCESSING SUMMARY ===");
      console.log(`Successfully processed and saved: ${written}/${report.records} records`);
      if (report.skipped > 0) {
        console.warn(`${report.skipped} records skipped with an empty note`);
      }
      if (report.failed + report.rejected > 0) {
        console.warn(`${report.failed + report.rejected} records failed during classification step`);
      }
      if (written < report.processed) {
        console.error(`${report.processed - written} classified records failed to write to DynamoDB`);
      }
      console.log(`Red classifications: ${outcome.tally.red}`);
      console.log(`Amber classifications: ${outcome.tally.amber}`);
      console.log(`Green classifications: ${outcome.tally.green}`);

      return report;
    },
  };
}

export function createSummaryPipeline(deps: SummaryPipelineDeps): BatchPipeline {
  return {
    name: "summary",
    async process(batch, { rejected }) {
      const outcome = await aggregateSummaries(batch, deps.summarize, deps);
      const written = await persistItems(deps.writer, outcome.items);

      if (rejected.length > 0) {
        console.warn(`${rejected.length} unreadable records left out of the client summaries`);
      }
      console.log("=== SUMMARY PROCESSING COMPLETE ===");
      console.log(`Summarised ${outcome.items.length} clients and wrote ${written} items to DynamoDB`);
      if (outcome.failed > 0) {
        console.warn(`${outcome.failed} clients failed during summarisation`);
      }

      return {
        records: batch.records.length + rejected.length,
        processed: outcome.items.length,
        skipped: outcome.skipped,
        failed: outcome.failed,
        rejected: rejected.length,
        written,
      };
    },
  };
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * One line describing a field of a source entry
 */
export function describeField(entry: unknown, field: string): string {
  if (typeof entry !== "object" || entry === null || !(field in entry)) {
    return `${field}: NOT PRESENT`;
  }
  const value: unknown = Object.getOwnPropertyDescriptor(entry, field)?.value;
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  const preview = text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
  return `${field}: ${describeType(value)} = '${preview}'`;
}

export function createInspectionPipeline(): BatchPipeline {
  return {
    name: "inspection",
    async process(batch, { ref, rejected, entries }) {
      console.log("=== EXTRACTED INFORMATION ===");
      console.log(`S3 Bucket: ${ref.bucket}`);
      console.log(`S3 Key: ${ref.key}`);
      console.log(`Batch ID: ${batch.batchId}`);
      console.log(`Total Records: ${entries.length}`);

      console.log("=== SAMPLE RECORDS ===");
      entries.slice(0, SAMPLE_SIZE).forEach((entry, i) => {
        console.log(`Record ${i + 1}: ${JSON.stringify(entry, null, 2)}`);
      });
      if (entries.length > SAMPLE_SIZE) {
        console.log(`... and ${entries.length - SAMPLE_SIZE} more records`);
      }

      const first = entries[0];
      if (typeof first === "object" && first !== null) {
        console.log("=== RECORD STRUCTURE ANALYSIS ===");
        console.log(`Record keys: ${Object.keys(first).join(", ")}`);
        for (const field of INSPECTED_FIELDS) {
          console.log(describeField(first, field));
        }
      }

      console.log("=== INSPECTION COMPLETE ===");
      return {
        records: entries.length,
        processed: 0,
        skipped: 0,
        failed: 0,
        rejected: rejected.length,
        written: 0,
      };
    },
  };
}
