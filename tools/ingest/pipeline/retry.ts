import { PipelineError } from "./errors.js";

export const RETRY_BASE_MS = 500;
export const RETRY_MAX_MS = 8000;

export function calculateBackoffMs(
  attempt: number,
  baseMs = RETRY_BASE_MS,
  maxMs = RETRY_MAX_MS
): number {
  const exponential = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
  const jitter = Math.floor(Math.random() * (exponential / 2));
  return exponential + jitter;
}

export async function wait(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxAttempts: number;
  onRetry?: (info: { attempt: number; backoffMs: number; error: PipelineError }) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs `fn` until it succeeds, throws a non-retryable error, or runs out of
 * attempts. Only {@link PipelineError}s flagged `retryable` are retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? wait;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof PipelineError) || !error.retryable || attempt >= maxAttempts) {
        throw error;
      }
      const backoffMs = calculateBackoffMs(attempt);
      options.onRetry?.({ attempt, backoffMs, error });
      await sleep(backoffMs);
    }
  }
}
