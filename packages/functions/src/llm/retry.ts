/**
 * Exponential backoff for completion calls
 */

import { LlmError } from "./errors.js";

export interface BackoffOptions {
  /** Initial delay in milliseconds (default: 500) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelay?: number;
  /** Multiplier for each attempt (default: 2) */
  multiplier?: number;
  /** Total attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Add random jitter so concurrent callers spread out (default: true) */
  jitter?: boolean;
}

export interface BackoffState {
  attempt: number;
  nextDelay: number;
  exhausted: boolean;
}

export interface RetryOptions extends BackoffOptions {
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: Required<BackoffOptions> = {
  initialDelay: 500,
  maxDelay: 8000,
  multiplier: 2,
  maxAttempts: 3,
  jitter: true,
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the attempt after `attempt` (zero-based) failed
 */
export function calculateBackoff(
  attempt: number,
  options: BackoffOptions = {}
): BackoffState {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (attempt + 1 >= opts.maxAttempts) {
    return {
      attempt,
      nextDelay: 0,
      exhausted: true,
    };
  }

  let delay = opts.initialDelay * Math.pow(opts.multiplier, attempt);
  delay = Math.min(delay, opts.maxDelay);

  // ±25%
  if (opts.jitter) {
    const jitterRange = delay * 0.25;
    delay = delay - jitterRange + Math.random() * jitterRange * 2;
  }

  return {
    attempt,
    nextDelay: Math.round(delay),
    exhausted: false,
  };
}

/**
 * Run `fn`, retrying retryable LlmErrors with backoff. Other errors and the
 * last failure are rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { sleep = defaultSleep, ...backoff } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof LlmError) || !error.retryable) throw error;

      const state = calculateBackoff(attempt, backoff);
      if (state.exhausted) throw error;

      console.warn(
        `Completion attempt ${attempt + 1} failed (${error.message}), retrying in ${state.nextDelay}ms`
      );
      await sleep(state.nextDelay);
    }
  }
}
