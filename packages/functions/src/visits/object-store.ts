/**
 * Object store reader for uploaded batch files
 */

import { GetObjectCommand, type S3Client } from "@aws-sdk/client-s3";
import { err, ok } from "@carelog/core";
import type { Result } from "@carelog/core";

export type FetchFailureReason = "not-found" | "access-denied" | "unknown";

export class ObjectFetchError extends Error {
  readonly reason: FetchFailureReason;
  readonly bucket: string;
  readonly key: string;

  constructor(
    reason: FetchFailureReason,
    bucket: string,
    key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ObjectFetchError";
    this.reason = reason;
    this.bucket = bucket;
    this.key = key;
  }
}

export interface ObjectStoreReader {
  /** Read a whole object as UTF-8 text */
  getObjectText(bucket: string, key: string): Promise<Result<string, ObjectFetchError>>;
}

const NOT_FOUND_ERRORS = new Set(["NoSuchKey", "NoSuchBucket", "NotFound"]);
const ACCESS_DENIED_ERRORS = new Set(["AccessDenied", "Forbidden"]);

/**
 * Map an S3 service error name onto a failure reason
 */
export function classifyS3Error(error: unknown): FetchFailureReason {
  const name = error instanceof Error ? error.name : "";
  if (NOT_FOUND_ERRORS.has(name)) return "not-found";
  if (ACCESS_DENIED_ERRORS.has(name)) return "access-denied";
  return "unknown";
}

export class S3ObjectReader implements ObjectStoreReader {
  private client: S3Client;

  constructor(client: S3Client) {
    this.client = client;
  }

  async getObjectText(bucket: string, key: string): Promise<Result<string, ObjectFetchError>> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        return err(new ObjectFetchError("unknown", bucket, key, `s3://${bucket}/${key} has no body`));
      }
      return ok(await response.Body.transformToString("utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(
        new ObjectFetchError(classifyS3Error(error), bucket, key, message, { cause: error })
      );
    }
  }
}
