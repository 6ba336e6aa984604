/**
 * Bulk persister
 *
 * Writes pipeline output in chunks of the writer's batch size. The count is
 * all-or-nothing: if any chunk fails the call reports 0, even though earlier
 * chunks may already be in the table.
 */

import type { StoreItem } from "../models/index.js";
import type { ItemWriter } from "./item-writer.js";

/**
 * Write every item; returns the number written (0 on any failure)
 */
export async function persistItems(
  writer: ItemWriter,
  items: readonly StoreItem[]
): Promise<number> {
  if (items.length === 0) {
    console.log("No items to write");
    return 0;
  }

  const batchSize = Math.max(1, writer.maxBatchSize);

  for (let i = 0; i < items.length; i += batchSize) {
    const chunk = items.slice(i, i + batchSize);
    const outcome = await writer.batchPut(chunk);

    if (!outcome.ok) {
      console.error(
        `Batch write failed on chunk ${i / batchSize} (${outcome.error.code}): ${outcome.error.message}`
      );
      return 0;
    }
  }

  console.log(`Successfully wrote ${items.length} items`);
  return items.length;
}
