/**
 * Visit batch parser
 *
 * Parses an uploaded JSON array of visit records into typed VisitRecords.
 * Entries that are not objects, or whose fields are not scalars, are rejected
 * individually so one bad entry does not cost the rest of the batch.
 */

import type { Batch, RejectedRecord, Result, VisitRecord } from "../models/index.js";
import { err, ok } from "../models/index.js";
import { BatchParseError } from "../errors.js";

/**
 * Parse result
 */
export interface ParsedBatch {
  batch: Batch;
  rejected: RejectedRecord[];
  /** Decoded source entries, before normalisation */
  entries: readonly unknown[];
}

type SourceEntry = Record<string, unknown>;
type Scalar = string | number | boolean;

/** Source field names, including the `carer` / `date` aliases */
const SCALAR_FIELDS = [
  "client",
  "care_pro",
  "carer",
  "visit_date",
  "date",
  "classification",
] as const;

function isSourceEntry(value: unknown): value is SourceEntry {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Find the first field that cannot be read, if any
 */
function findInvalidField(entry: SourceEntry): string | null {
  if (isPresent(entry.note) && typeof entry.note !== "string") {
    return 'field "note" is not a string';
  }
  for (const name of SCALAR_FIELDS) {
    if (isPresent(entry[name]) && !isScalar(entry[name])) {
      return `field "${name}" is not a scalar`;
    }
  }
  return null;
}

/**
 * Read a scalar field, trying each name in turn
 */
function readField(entry: SourceEntry, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = entry[name];
    if (isScalar(value)) return String(value);
  }
  return undefined;
}

function toVisitRecord(entry: SourceEntry, index: number): VisitRecord {
  const client = readField(entry, "client");
  const classification = readField(entry, "classification");

  return Object.freeze({
    index,
    note: readField(entry, "note") ?? "",
    client: client ?? "",
    hasClient: client !== undefined,
    carePro: readField(entry, "care_pro", "carer") ?? "",
    visitDate: readField(entry, "visit_date", "date") ?? "",
    ...(classification !== undefined && { classification }),
  });
}

/**
 * Parse the content of one uploaded batch object
 */
export function parseVisitBatch(
  content: string,
  batchId: string
): Result<ParsedBatch, BatchParseError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new BatchParseError(`Invalid JSON: ${reason}`));
  }

  if (!Array.isArray(parsed)) {
    return err(new BatchParseError("Expected a JSON array of visit records"));
  }

  const records: VisitRecord[] = [];
  const rejected: RejectedRecord[] = [];

  const entries: readonly unknown[] = parsed;

  entries.forEach((entry, index) => {
    if (!isSourceEntry(entry)) {
      rejected.push({ index, reason: "entry is not an object" });
      return;
    }
    const invalid = findInvalidField(entry);
    if (invalid) {
      rejected.push({ index, reason: invalid });
      return;
    }
    records.push(toVisitRecord(entry, index));
  });

  return ok({ batch: { batchId, records: Object.freeze(records) }, rejected, entries });
}
