/**
 * Classification categories and per-batch outcome types
 */

/**
 * Urgency category: red = urgent, amber = moderate, green = routine
 */
export type Category = "red" | "amber" | "green";

/**
 * Categories in reply-matching priority order
 */
export const CATEGORIES: readonly Category[] = ["red", "amber", "green"];

/**
 * Per-category count of classified records in one batch
 */
export type CategoryTally = Record<Category, number>;

export function emptyTally(): CategoryTally {
  return { red: 0, amber: 0, green: 0 };
}

/**
 * Generated summary for one client's visits in a batch
 */
export interface ClientSummary {
  client: string;
  visitCount: number;
  latestVisitDate: string;
  summary: string;
}

/**
 * Success/failure result used wherever a layer has a fallback or skip policy
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Run an async step and capture a rejection as an error result
 */
export async function settle<T>(run: () => Promise<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await run());
  } catch (error) {
    return err(error);
  }
}
