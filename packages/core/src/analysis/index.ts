/**
 * @carelog/core - Analysis
 *
 * Concurrent per-batch aggregation
 */

export {
  runTaskGroup,
  defaultConcurrency,
  type TaskGroupOptions,
} from "./task-group.js";

export {
  aggregateClassifications,
  toClassificationItem,
  type ClassifyNote,
  type AggregateOptions,
  type ClassificationOutcome,
} from "./classify-batch.js";

export {
  aggregateSummaries,
  groupByClient,
  chronologicalNotes,
  latestVisitDate,
  toSummaryItem,
  type SummarizeNotes,
  type ClientGroup,
  type SummaryOutcome,
} from "./summarise-batch.js";
