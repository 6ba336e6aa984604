/**
 * @carelog/core - Models
 *
 * Type definitions for visit batches and pipeline outputs
 */

export type { VisitRecord, Batch, RejectedRecord } from "./visit.js";
export { UNKNOWN_CLIENT } from "./visit.js";

export type {
  Category,
  CategoryTally,
  ClientSummary,
  Result,
} from "./results.js";
export { CATEGORIES, emptyTally, ok, err, settle } from "./results.js";

export type {
  ClassificationItem,
  SummaryItem,
  StoreItem,
} from "./items.js";
