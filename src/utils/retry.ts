import { sleep } from "./sleep.js";

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
  /** Only errors accepted here are retried; anything else is rethrown at once. */
  retryIf?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const TRANSIENT = /\b(429|50[0-4])\b|ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|socket hang up|aborted|timeout/i;

export function isTransient(error: Error): boolean {
  return TRANSIENT.test(error.message);
}

export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  backoffMultiplier: number,
  maxDelayMs: number
): number {
  return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
}

export async function retry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 250,
    maxDelayMs = 5_000,
    backoffMultiplier = 2,
    jitter = true,
    retryIf = isTransient,
    onRetry,
  } = opts;

  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= attempts - 1 || !retryIf(error)) throw error;

      const base = backoffDelay(attempt, initialDelayMs, backoffMultiplier, maxDelayMs);
      const delayMs = jitter ? base + Math.random() * base * 0.3 : base;

      onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs);
    }
  }
}
