import { RemoteCallError } from "./errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(exponential, policy.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `call` until it succeeds, throws a non-retryable error, or the policy's
 * attempt budget is spent. The delay before attempt k+1 is
 * `min(base * 2^(k-1), max)`.
 */
export async function withRetry<T>(
  call: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (error: RemoteCallError, attempt: number, delayMs: number) => void
): Promise<T> {
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await call(attempt);
    } catch (error) {
      if (!(error instanceof RemoteCallError)) {
        throw error;
      }
      if (!error.retryable || attempt >= policy.maxAttempts) {
        throw error.withAttempts(attempt);
      }
      const delayMs = backoffDelay(attempt, policy);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
