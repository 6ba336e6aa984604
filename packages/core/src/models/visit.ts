/**
 * Visit record types shared by every batch pipeline
 */

/**
 * One home-care visit as read from an uploaded batch file.
 * Absent string fields are normalised to "" by the parser.
 */
export interface VisitRecord {
  /** Position of the record in the source file */
  readonly index: number;
  /** Free-text visit note written by the care professional */
  readonly note: string;
  /** Client identifier ("" when the source record had none) */
  readonly client: string;
  /** False when the source record carried no client field */
  readonly hasClient: boolean;
  /** Care-provider identifier */
  readonly carePro: string;
  /** Visit date, expected ISO-like so lexical order is chronological */
  readonly visitDate: string;
  /** Classification tag already present in the source, if any */
  readonly classification?: string;
}

/**
 * The records parsed from one uploaded object
 */
export interface Batch {
  /** Object key with its extension removed */
  readonly batchId: string;
  readonly records: readonly VisitRecord[];
}

/**
 * A source entry the parser could not turn into a VisitRecord
 */
export interface RejectedRecord {
  index: number;
  reason: string;
}

/**
 * Client name used when a record has no client field
 */
export const UNKNOWN_CLIENT = "Unknown";
