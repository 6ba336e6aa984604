/**
 * Object key helpers for uploaded batch files
 *
 * Keys are flat: `{batchId}.json`, optionally under a prefix.
 */

/**
 * Undo S3 event key encoding: `+` is a space, the rest is percent-encoded.
 */
export function decodeObjectKey(rawKey: string): string {
  const spaced = rawKey.replace(/\+/g, " ");
  try {
    return decodeURIComponent(spaced);
  } catch {
    // Malformed escape sequence: leave the key as delivered
    return spaced;
  }
}

/**
 * Batch id = object key with its final extension removed.
 * Leading dots of the file name do not start an extension.
 *
 * @example deriveBatchId("uploads/2024-03-01-north.json") // "uploads/2024-03-01-north"
 */
export function deriveBatchId(objectKey: string): string {
  const slash = objectKey.lastIndexOf("/");
  const dot = objectKey.lastIndexOf(".");
  if (dot <= slash) return objectKey;

  const stem = objectKey.slice(slash + 1, dot);
  if (/^\.*$/.test(stem)) return objectKey;

  return objectKey.slice(0, dot);
}
