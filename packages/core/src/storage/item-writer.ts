/**
 * Key-value store writer
 *
 * The ItemWriter interface is the only way the pipelines reach the store.
 * DynamoItemWriter implements it with BatchWriteItem, which accepts at most
 * 25 put requests per call.
 */

import {
  BatchWriteCommand,
  type BatchWriteCommandInput,
  type DynamoDBDocumentClient,
} from "@aws-sdk/lib-dynamodb";
import { setTimeout as sleep } from "timers/promises";
import type { Result, StoreItem } from "../models/index.js";
import { err, ok } from "../models/index.js";
import { StoreWriteError } from "../errors.js";
import { calculateBackoff, type BackoffOptions } from "./backoff.js";

/** DynamoDB BatchWrite limit */
export const MAX_BATCH_SIZE = 25;

type WriteRequests = NonNullable<BatchWriteCommandInput["RequestItems"]>[string];

export interface ItemWriter {
  /** Most items a single batchPut call accepts */
  readonly maxBatchSize: number;
  /** Write up to maxBatchSize items; resolves with the count written */
  batchPut(items: readonly StoreItem[]): Promise<Result<number, StoreWriteError>>;
}

export interface DynamoItemWriterOptions {
  /** Backoff between resubmissions of unprocessed items */
  retry?: BackoffOptions;
}

/**
 * Map an SDK failure onto a StoreWriteError, keeping the service error name
 */
export function toStoreWriteError(error: unknown): StoreWriteError {
  if (error instanceof StoreWriteError) return error;
  if (error instanceof Error) {
    return new StoreWriteError(error.message, error.name);
  }
  return new StoreWriteError(String(error), "Unknown");
}

export class DynamoItemWriter implements ItemWriter {
  readonly maxBatchSize = MAX_BATCH_SIZE;
  private docClient: DynamoDBDocumentClient;
  private tableName: string;
  private retry: BackoffOptions;

  constructor(
    docClient: DynamoDBDocumentClient,
    tableName: string,
    options: DynamoItemWriterOptions = {}
  ) {
    this.docClient = docClient;
    this.tableName = tableName;
    this.retry = options.retry ?? {};
  }

  /**
   * Write one chunk, resubmitting UnprocessedItems until none remain or
   * the backoff is exhausted
   */
  async batchPut(items: readonly StoreItem[]): Promise<Result<number, StoreWriteError>> {
    if (items.length > this.maxBatchSize) {
      return err(
        new StoreWriteError(
          `Batch of ${items.length} exceeds the ${this.maxBatchSize}-item limit`,
          "ValidationException"
        )
      );
    }

    let pending: WriteRequests = items.map((item) => ({ PutRequest: { Item: item } }));

    for (let attempt = 0; ; attempt++) {
      let unprocessed: WriteRequests;
      try {
        const response = await this.docClient.send(
          new BatchWriteCommand({
            RequestItems: { [this.tableName]: pending },
          })
        );
        unprocessed = response.UnprocessedItems?.[this.tableName] ?? [];
      } catch (error) {
        return err(toStoreWriteError(error));
      }

      if (unprocessed.length === 0) {
        return ok(items.length);
      }

      const backoff = calculateBackoff(attempt, this.retry);
      if (backoff.exhausted) {
        return err(
          new StoreWriteError(
            `${unprocessed.length} items still unprocessed after ${attempt + 1} attempts`,
            "UnprocessedItems",
            unprocessed.length
          )
        );
      }

      console.warn(
        `${unprocessed.length} items unprocessed by ${this.tableName}, retrying in ${backoff.nextDelay}ms`
      );
      await sleep(backoff.nextDelay);
      pending = unprocessed;
    }
  }
}
