import { TransientStoreError } from '../errors';

// Exponential backoff: base-4 gives 1s → 4s → 16s → 64s (capped at maxInterval).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits 4x that, etc.
export function calculateBackOff(
  attempt: number,
  initialIntervalMs: number = 1000,
  backoffMultiplier: number = 4.0,
  maxInterval: number = 60000
): number {
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
  delay = Math.min(delay, maxInterval);
  // ±10% jitter
  const jitter = delay * 0.1;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries: number;
  label: string;
  initialIntervalMs?: number;
  sleep?: Sleep;
}

/**
 * Runs fn, retrying only TransientStoreError up to maxRetries times with
 * calculateBackOff delays. Any other error propagates on the first throw.
 */
export async function retryTransient<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientStoreError) || attempt > options.maxRetries) throw err;

      const delay = calculateBackOff(attempt, options.initialIntervalMs);
      console.warn(`[retry] ${options.label} attempt ${attempt}/${options.maxRetries} hit ${err.message}, retrying in ${delay}ms`);
      await wait(delay);
    }
  }
}
