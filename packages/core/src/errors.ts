/**
 * Typed errors raised by the batch pipelines
 */

/**
 * Uploaded batch content could not be parsed into visit records
 */
export class BatchParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BatchParseError";
  }
}

/**
 * A store batch write was rejected or left items unprocessed
 */
export class StoreWriteError extends Error {
  readonly code: string;
  readonly unprocessed: number;

  constructor(message: string, code: string, unprocessed = 0) {
    super(message);
    this.name = "StoreWriteError";
    this.code = code;
    this.unprocessed = unprocessed;
  }
}
