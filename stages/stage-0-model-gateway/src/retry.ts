import type { RetryOptions } from "./types.js";
import { ProviderCommunicationError } from "./providers/types.js";

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  backoffMs: 300,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withJitter(value: number, jitter: number): number {
  const delta = value * jitter;
  return value + (Math.random() * 2 - 1) * delta;
}

export function isRetryableError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  if (error instanceof ProviderCommunicationError) {
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }

  const name = "name" in error ? error.name : undefined;
  if (name === "AbortError" || name === "TimeoutError") {
    return true;
  }

  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"].includes(code);
  }

  return false;
}

// Only the retry policy lives here; timeouts are wired by the caller.
// A caller-side abort stops retrying even when the error itself looks retryable.
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
  abortSignal?: AbortSignal
): Promise<T> {
  const retry = { ...DEFAULT_RETRY, ...(options ?? {}) };
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (
        attempt > retry.maxRetries ||
        abortSignal?.aborted ||
        !isRetryableError(error)
      ) {
        throw error;
      }

      const rawBackoff = retry.backoffMs * Math.pow(2, attempt - 1);
      const cappedBackoff = Math.min(
        rawBackoff,
        retry.maxBackoffMs ?? rawBackoff
      );
      const delay = retry.jitter
        ? withJitter(cappedBackoff, retry.jitter)
        : cappedBackoff;
      await sleep(Math.max(0, delay));
    }
  }
}
