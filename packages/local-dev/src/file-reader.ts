/**
 * Filesystem stand-in for the object store
 *
 * "bucket" is a directory and "key" a path inside it, so local files run
 * through the same driver as uploads.
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { err, ok } from "@carelog/core";
import type { Result } from "@carelog/core";
import { ObjectFetchError, type FetchFailureReason, type ObjectStoreReader } from "@carelog/functions/visits";

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function failureReason(code: string | undefined): FetchFailureReason {
  if (code === "ENOENT") return "not-found";
  if (code === "EACCES" || code === "EPERM") return "access-denied";
  return "unknown";
}

export class FileObjectReader implements ObjectStoreReader {
  async getObjectText(bucket: string, key: string): Promise<Result<string, ObjectFetchError>> {
    try {
      return ok(await readFile(join(bucket, key), "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(
        new ObjectFetchError(failureReason(errorCode(error)), bucket, key, message, { cause: error })
      );
    }
  }
}
