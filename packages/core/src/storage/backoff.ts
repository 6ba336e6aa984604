/**
 * Exponential backoff for resubmitting unprocessed batch writes
 */

export interface BackoffOptions {
  /** Initial delay in milliseconds (default: 50) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelay?: number;
  /** Multiplier for each attempt (default: 2) */
  multiplier?: number;
  /** Resubmissions allowed before giving up (default: 8) */
  maxAttempts?: number;
  /** Spread delays by ±25% (default: true) */
  jitter?: boolean;
}

export interface BackoffState {
  attempt: number;
  nextDelay: number;
  exhausted: boolean;
}

const DEFAULT_OPTIONS: Required<BackoffOptions> = {
  initialDelay: 50,
  maxDelay: 5000,
  multiplier: 2,
  maxAttempts: 8,
  jitter: true,
};

/**
 * Delay before resubmission number `attempt` (0-based)
 */
export function calculateBackoff(
  attempt: number,
  options: BackoffOptions = {}
): BackoffState {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (attempt >= opts.maxAttempts) {
    return { attempt, nextDelay: 0, exhausted: true };
  }

  let delay = Math.min(opts.initialDelay * Math.pow(opts.multiplier, attempt), opts.maxDelay);

  if (opts.jitter) {
    const jitterRange = delay * 0.25;
    delay = delay - jitterRange + Math.random() * jitterRange * 2;
  }

  return { attempt, nextDelay: Math.round(delay), exhausted: false };
}
