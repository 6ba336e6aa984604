/**
 * Trigger event decoding
 *
 * The classify function is subscribed to an SNS topic that carries S3 event
 * notifications as its message; summarise and inspect receive S3 events
 * directly. Each top-level event record decodes independently.
 */

import type { S3Event, SNSEvent } from "aws-lambda";
import { decodeObjectKey, err, ok } from "@carelog/core";
import type { Result } from "@carelog/core";

/**
 * One uploaded object to process
 */
export interface ObjectRef {
  bucket: string;
  key: string;
}

/** Decoded objects for one top-level event record */
export type Notification = Result<ObjectRef[], Error>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read bucket and (decoded) key from one S3 event record
 */
export function readS3Record(record: unknown): Result<ObjectRef, Error> {
  const s3 = isObject(record) ? record.s3 : undefined;
  const bucket = isObject(s3) && isObject(s3.bucket) ? s3.bucket.name : undefined;
  const key = isObject(s3) && isObject(s3.object) ? s3.object.key : undefined;

  if (typeof bucket !== "string" || typeof key !== "string") {
    return err(new Error("S3 record is missing s3.bucket.name or s3.object.key"));
  }
  return ok({ bucket, key: decodeObjectKey(key) });
}

/**
 * Read every S3 record of an S3 event payload
 */
export function readS3Payload(payload: unknown): Notification {
  if (!isObject(payload) || !Array.isArray(payload.Records)) {
    return err(new Error("Payload has no Records array"));
  }

  const refs: ObjectRef[] = [];
  for (const record of payload.Records) {
    const ref = readS3Record(record);
    if (!ref.ok) return ref;
    refs.push(ref.value);
  }
  return ok(refs);
}

/**
 * One notification per SNS record, each wrapping an S3 event
 */
export function readSnsNotifications(event: SNSEvent): Notification[] {
  return (event.Records ?? []).map((record): Notification => {
    const message = record.Sns?.Message;
    if (typeof message !== "string") {
      return err(new Error("Record doesn't contain SNS message"));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(message);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new Error(`SNS message is not JSON: ${reason}`));
    }
    return readS3Payload(payload);
  });
}

/**
 * One notification per S3 record
 */
export function readS3Notifications(event: S3Event): Notification[] {
  return (event.Records ?? []).map((record): Notification => {
    const ref = readS3Record(record);
    return ref.ok ? ok([ref.value]) : ref;
  });
}
