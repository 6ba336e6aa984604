/**
 * Classification aggregator
 *
 * One unit of work per visit record. Blank notes are skipped, every other
 * record is classified on the task group and becomes a ClassificationItem
 * keyed by (record index, batch id).
 */

import type {
  Batch,
  Category,
  CategoryTally,
  ClassificationItem,
  VisitRecord,
} from "../models/index.js";
import { emptyTally } from "../models/index.js";
import { isBlankNote } from "../parsers/validation.js";
import { runTaskGroup } from "./task-group.js";

/**
 * Classifier contract: never rejects in normal operation
 */
export type ClassifyNote = (note: string) => Promise<Category>;

export interface AggregateOptions {
  /** Task group size */
  concurrency?: number;
  /** Clock for item timestamps */
  now?: () => Date;
}

export interface ClassificationOutcome {
  /** Items in record order */
  items: ClassificationItem[];
  tally: CategoryTally;
  /** Records with a blank note */
  skipped: number;
  /** Records whose unit of work threw */
  failed: number;
}

type UnitResult =
  | { status: "classified"; item: ClassificationItem; category: Category }
  | { status: "skipped" };

/**
 * Build the table item for one classified record
 */
export function toClassificationItem(
  record: VisitRecord,
  batchId: string,
  category: Category,
  timestamp: Date
): ClassificationItem {
  return {
    id: String(record.index),
    batch_id: batchId,
    ai_classification: category,
    timestamp: timestamp.toISOString(),
    client: record.client,
    care_pro: record.carePro,
    visit_date: record.visitDate,
    note: record.note,
  };
}

/**
 * Classify every record of a batch concurrently and tally the categories
 */
export async function aggregateClassifications(
  batch: Batch,
  classify: ClassifyNote,
  options: AggregateOptions = {}
): Promise<ClassificationOutcome> {
  const now = options.now ?? (() => new Date());

  const results = await runTaskGroup(
    batch.records,
    async (record): Promise<UnitResult> => {
      if (isBlankNote(record.note)) {
        console.warn(`Record ${record.index} has an empty note, skipping classification`);
        return { status: "skipped" };
      }

      const category = await classify(record.note);
      return {
        status: "classified",
        category,
        item: toClassificationItem(record, batch.batchId, category, now()),
      };
    },
    { concurrency: options.concurrency }
  );

  // Tally only once every unit has returned
  const items: ClassificationItem[] = [];
  const tally = emptyTally();
  let skipped = 0;
  let failed = 0;

  results.forEach((result, position) => {
    if (!result.ok) {
      failed++;
      console.error(`Failed to process record ${batch.records[position].index}:`, result.error);
      return;
    }
    if (result.value.status === "skipped") {
      skipped++;
      return;
    }
    items.push(result.value.item);
    tally[result.value.category]++;
  });

  return { items, tally, skipped, failed };
}
