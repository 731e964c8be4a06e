import { isTransient } from "./errors.js";
import { log } from "./logger.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  /** Label used in log lines, e.g. "embedding" or "extraction". */
  operation: string;
  signal?: AbortSignal;
  /** Defaults to the `transient` flag on MemoryEngineError. */
  isRetryable?: (err: unknown) => boolean;
  /** Injectable for tests; defaults to Math.random. */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4_000,
};

/** Full-jitter exponential backoff: uniform in [0, min(max, base * 2^(attempt-1))]. */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(0, attempt - 1));
  return Math.floor(random() * ceiling);
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or `maxAttempts`
 * is spent. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransient;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !isRetryable(err) || options.signal?.aborted) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, policy, options.random);
      const msg = err instanceof Error ? err.message : String(err);
      log.warn(`${options.operation}: attempt ${attempt}/${maxAttempts} failed (${msg}); retrying in ${delayMs}ms`);
      await sleep(delayMs, options.signal);
    }
  }
}
