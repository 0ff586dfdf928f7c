import { type Result, err, ok } from "neverthrow";

export type RetryPolicy = Readonly<{
  maxAttempts: number;
  delayMs: number;
  sleep: (ms: number) => Promise<void>;
}>;

export type RetryExhausted<E> = Readonly<{
  error: E;
  attempts: number;
}>;

/**
 * Run a fallible task until it succeeds or `maxAttempts` is reached,
 * pausing `delayMs` between attempts. Every error is retried.
 */
export async function retryWithDelay<T, E>(
  task: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy,
  onRetry?: (error: E, attempt: number) => void,
): Promise<Result<T, RetryExhausted<E>>> {
  let attempt = 1;

  while (true) {
    const result = await task(attempt);
    if (result.isOk()) {
      return ok(result.value);
    }

    if (attempt >= policy.maxAttempts) {
      return err({ error: result.error, attempts: attempt });
    }

    onRetry?.(result.error, attempt);
    await policy.sleep(policy.delayMs);
    attempt += 1;
  }
}

/**
 * Promise-based setTimeout.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
