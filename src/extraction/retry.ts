export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export interface RetryOptions {
  /** Total attempts, including the first one. */
  attempts: number;
  /** Delay before attempt `attempt + 1`, given the 1-based attempt that just failed. */
  backoff?: (attempt: number) => number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void | Promise<void>;
  sleep?: Sleep;
}

/**
 * 5s per failed attempt plus up to 1.5s of jitter: 5-6.5s, then 10-11.5s, ...
 */
export function linearBackoffWithJitter(
  baseMs = 5_000,
  jitterMs = 1_500,
  random: () => number = Math.random,
): (attempt: number) => number {
  return (attempt) => baseMs * attempt + random() * jitterMs;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const backoff = options.backoff ?? linearBackoffWithJitter();
  const wait = options.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt >= attempts) break;
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) break;

      const delay = backoff(attempt);
      await options.onRetry?.(err, attempt, delay);
      await wait(delay);
    }
  }
  throw lastError;
}

/** Uniform random delay in [minMs, maxMs], whole seconds when both bounds are. */
export function randomBetween(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const lo = Math.min(minMs, maxMs);
  const hi = Math.max(minMs, maxMs);
  if (lo % 1000 === 0 && hi % 1000 === 0) {
    const seconds = lo / 1000 + Math.floor(random() * ((hi - lo) / 1000 + 1));
    return seconds * 1000;
  }
  return lo + random() * (hi - lo);
}
