/**
 * @carelog/core
 *
 * Visit batch model, parsing, concurrent aggregation and storage
 *
 * @example
 * ```typescript
 * import {
 *   parseVisitBatch,
 *   aggregateClassifications,
 *   persistItems,
 * } from "@carelog/core";
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Errors
export { BatchParseError, StoreWriteError } from "./errors.js";

// Parsers - Batch content and object keys
export * from "./parsers/index.js";

// Analysis - Concurrent aggregation
export * from "./analysis/index.js";

// Storage - DynamoDB operations
export * from "./storage/index.js";
