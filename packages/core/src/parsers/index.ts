/**
 * @carelog/core - Parsers
 */

export { parseVisitBatch, type ParsedBatch } from "./batch.js";
export { deriveBatchId, decodeObjectKey } from "./batch-id.js";
export { VALIDATION, isPlausibleBatchId, isBlankNote } from "./validation.js";
