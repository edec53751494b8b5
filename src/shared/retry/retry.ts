export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffOptions = {
  minDelayMs: number;       // delay before the second attempt
  maxDelayMs: number;       // cap, applied before jitter
  jitterRatio?: number;     // 0..1, fraction of the delay added at random
  randomFn?: () => number;
};

export type RetryOptions = BackoffOptions & {
  retries: number;          // extra attempts after the first (3 means up to 4 calls)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown; retryable: boolean }) => void;
  signal?: AbortSignal;
};

/**
 * Exponential delay for the given zero-based attempt, capped, plus jitter.
 * A caller-provided delay (e.g. from Retry-After) replaces the exponential part.
 */
export const computeBackoffDelay = (attempt: number, opts: BackoffOptions, customDelayMs?: number): number => {
  const { minDelayMs, maxDelayMs, jitterRatio = 0.2, randomFn = Math.random } = opts;
  const base =
    customDelayMs != null && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? customDelayMs
      : minDelayMs * Math.pow(2, attempt);
  const capped = Math.min(maxDelayMs, base);
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  return capped + Math.floor(capped * normalizedJitterRatio * normalizedRandom);
};

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, signal } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn(attempt + 1);
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, retryable: normalized.retry });
        throw err;
      }

      const delayMs = computeBackoffDelay(attempt, opts, normalized.delayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs, signal);
    }
  }
};
