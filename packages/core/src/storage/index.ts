/**
 * @carelog/core - Storage
 *
 * DynamoDB storage layer for pipeline output
 */

// Client
export { createDocClient, DEFAULT_REGION } from "./client.js";

// Writers
export {
  DynamoItemWriter,
  MAX_BATCH_SIZE,
  toStoreWriteError,
  type ItemWriter,
  type DynamoItemWriterOptions,
} from "./item-writer.js";

// Bulk persistence
export { persistItems } from "./persist.js";

// Retry timing
export { calculateBackoff, type BackoffOptions, type BackoffState } from "./backoff.js";
