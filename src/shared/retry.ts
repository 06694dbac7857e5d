export interface RetryOptions {
  /** Max attempts after the initial try (4 means up to 5 calls). */
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn`, retrying with capped exponential backoff while `shouldRetry`
 * accepts the error. The last error is rethrown once attempts run out.
 */
export async function retry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
  } = opts;

  const maxAttempts = retries + 1;
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt >= retries || !shouldRetry(err)) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const backoff = Math.min(maxDelayMs, minDelayMs * 2 ** attempt);
      const ratio = Math.min(1, Math.max(0, jitterRatio));
      const random = Math.min(1, Math.max(0, randomFn()));
      const delayMs = backoff + Math.floor(backoff * ratio * random);

      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
