/**
 * DynamoDB item shapes written by the batch pipelines
 *
 * Attribute names are snake_case to match the existing tables.
 */

import type { Category } from "./results.js";

/**
 * Classification table item
 * pk: id (record index), sk: batch_id
 */
export type ClassificationItem = {
  id: string;
  batch_id: string;
  ai_classification: Category;
  /** ISO-8601 time the item was built, not the visit time */
  timestamp: string;
  client: string;
  care_pro: string;
  visit_date: string;
  note: string;
};

/**
 * Summary table item
 * pk: client, sk: batch_id
 */
export type SummaryItem = {
  client: string;
  batch_id: string;
  latest_visit_date: string;
  visit_count: number;
  summary: string;
  timestamp: string;
};

/**
 * Flat attribute map accepted by an ItemWriter
 */
export type StoreItem = Record<string, string | number | boolean>;
