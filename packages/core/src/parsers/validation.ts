/**
 * Sanity checks for batch input
 */

export const VALIDATION = {
  /** Batch ids this short are almost certainly not real upload names */
  BATCH_ID_MIN_LENGTH: 6,
} as const;

/**
 * Check a batch id looks like a real upload name
 */
export function isPlausibleBatchId(batchId: string): boolean {
  return batchId.length >= VALIDATION.BATCH_ID_MIN_LENGTH;
}

/**
 * A note with nothing but whitespace carries no usable text
 */
export function isBlankNote(note: string): boolean {
  return note.trim().length === 0;
}
