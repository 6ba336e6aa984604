/**
 * Bounded task group
 *
 * Runs one async worker per unit with at most `concurrency` in flight.
 * The group is created, drained and discarded inside a single call, and
 * each result lands at its unit's position whatever order units finish in.
 */

import { availableParallelism } from "os";
import { settle } from "../models/index.js";
import type { Result } from "../models/index.js";

/** Upper bound on the default pool size */
const MAX_DEFAULT_CONCURRENCY = 32;

export interface TaskGroupOptions {
  /** Maximum units in flight (default: available parallelism + 4, capped at 32) */
  concurrency?: number;
}

/**
 * Default pool size for I/O-bound model calls
 */
export function defaultConcurrency(): number {
  return Math.min(MAX_DEFAULT_CONCURRENCY, availableParallelism() + 4);
}

/**
 * Run `worker` over every unit and wait for all of them.
 * A worker that throws yields an error result for its unit only.
 */
export async function runTaskGroup<U, R>(
  units: readonly U[],
  worker: (unit: U, position: number) => Promise<R>,
  options: TaskGroupOptions = {}
): Promise<Result<R, unknown>[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? defaultConcurrency()));
  const results = new Array<Result<R, unknown>>(units.length);
  let next = 0;

  async function runner(): Promise<void> {
    while (next < units.length) {
      const position = next++;
      results[position] = await settle(() => worker(units[position], position));
    }
  }

  const runners: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, units.length); i++) {
    runners.push(runner());
  }
  await Promise.all(runners);

  return results;
}
