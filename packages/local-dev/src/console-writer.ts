/**
 * ItemWriter for dry runs: prints items instead of writing them
 */

import { MAX_BATCH_SIZE, ok } from "@carelog/core";
import type { ItemWriter, Result, StoreItem, StoreWriteError } from "@carelog/core";

export class ConsoleItemWriter implements ItemWriter {
  readonly maxBatchSize = MAX_BATCH_SIZE;
  readonly written: StoreItem[] = [];

  async batchPut(items: readonly StoreItem[]): Promise<Result<number, StoreWriteError>> {
    for (const item of items) {
      console.log(JSON.stringify(item));
      this.written.push(item);
    }
    return ok(items.length);
  }
}
