/**
 * Backoff policy and retry executor shared by every retryable operation
 */

export interface BackoffPolicy {
  /** Maximum number of attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  baseDelay: number;
  /** Upper bound for a single delay */
  maxDelay?: number;
  /** Add random jitter to delays (0-1, 0 = no jitter) */
  jitter?: number;
}

export interface RetryConfig extends BackoffPolicy {
  /** Function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback for retry attempts */
  onRetry?: (attempt: number, error: unknown, nextDelay: number) => void;
  /** Injected sleep, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay to wait after the given (1-based) failed attempt: base * 2^(attempt-1)
 */
export function delayFor(attempt: number, policy: BackoffPolicy): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`attempt must be an integer >= 1, got ${attempt}`);
  }

  const exponential = policy.baseDelay * 2 ** (attempt - 1);
  const delay = policy.maxDelay !== undefined ? Math.min(exponential, policy.maxDelay) : exponential;

  // Jitter only ever adds, so the sequence stays non-decreasing
  const jitter = policy.jitter ?? 0;
  if (jitter > 0) {
    return Math.round(delay + delay * jitter * Math.random());
  }

  return delay;
}

/**
 * Full delay table for a policy, one entry per attempt
 */
export function delaySchedule(policy: BackoffPolicy): number[] {
  return Array.from({ length: policy.maxAttempts }, (_, index) => delayFor(index + 1, policy));
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff. Delays are slept between attempts only.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, config: RetryConfig): Promise<T> {
  const isRetryable = config.isRetryable ?? (() => true);
  const wait = config.sleep ?? sleep;
  const maxAttempts = Math.max(1, config.maxAttempts);

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || !isRetryable(error)) {
        throw error;
      }

      const delay = delayFor(attempt, config);
      config.onRetry?.(attempt, error, delay);
      await wait(delay);
    }
  }

  throw lastError ?? new Error('Retry failed without capturing error');
}

/**
 * Pre-configured policies
 */
export const BackoffPolicies = {
  /** Login: 3 attempts, 2s / 4s / 8s */
  login: {
    maxAttempts: 3,
    baseDelay: 2000
  },

  /** Sub-record fetch: 3 attempts, 1s / 2s / 4s */
  fetch: {
    maxAttempts: 3,
    baseDelay: 1000
  },

  /** Proxy authentication failures are configuration errors */
  none: {
    maxAttempts: 1,
    baseDelay: 0
  }
} satisfies Record<string, BackoffPolicy>;
