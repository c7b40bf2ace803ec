export interface RetryOptions {
  maxAttempts?: number; // total attempts including the first
  baseDelayMs?: number; // delay before the first retry, doubled each time
  maxDelayMs?: number; // upper bound on delay
  jitterMs?: number; // random extra delay, 0 for an exact schedule
  shouldRetry?: (err: unknown) => boolean;
}

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Executes an asynchronous function with an exponential backoff strategy.
 * The delay before retry n is baseDelayMs * 2^(n-1), capped at maxDelayMs,
 * plus up to jitterMs of random jitter.
 * @param fn - The asynchronous function or API call to execute
 * @param options - Attempt cap, delay timing and the retry predicate
 * @returns The resolved value of the provided function `fn`
 * @throws The final error encountered if the maximum number of attempts is exhausted,
 * or the first error `shouldRetry` rejects
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 5,
    baseDelayMs = 500,
    maxDelayMs = 10_000,
    jitterMs = 100,
    shouldRetry = () => true
  } = options;

  let attempt = 1;
  // small jitter to avoid thundering herd
  const jitter = () => Math.random() * jitterMs;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const delay =
        Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + jitter();

      console.warn(
        `Retryable error on attempt ${attempt}/${maxAttempts}, retrying in ${Math.round(
          delay
        )}ms: ${err instanceof Error ? err.message : String(err)}`
      );

      await sleep(delay);
      attempt += 1;
    }
  }
}
