import { createChildLogger, errorMessage, sleep } from "@notes-to-blog/core";
import { isPermanentError } from "./errors.js";

const logger = createChildLogger({ module: "services:retry" });

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
};

/**
 * Retry a function with exponential backoff.
 * Distinguishes transient errors (retry) from permanent errors (fail immediately).
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  options?: Partial<RetryOptions>
): Promise<T> {
  const opts = { ...DEFAULT_RETRY, ...options };
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (isPermanentError(error)) {
        logger.error(
          { label, attempt, error: errorMessage(error) },
          "Permanent error, not retrying"
        );
        throw error;
      }

      if (opts.retryableErrors && !opts.retryableErrors(error)) {
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        logger.error(
          { label, attempt, error: errorMessage(error) },
          "Max retries exhausted"
        );
        break;
      }

      // Add jitter: ±25% of delay
      const jitter = delay * (0.75 + Math.random() * 0.5);
      logger.warn(
        { label, attempt, nextRetryMs: Math.round(jitter), error: errorMessage(error) },
        "Retrying after error"
      );

      await sleep(jitter);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}

/**
 * Simple token bucket rate limiter.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms

  constructor(requestsPerMinute: number) {
    this.maxTokens = requestsPerMinute;
    this.tokens = requestsPerMinute;
    this.refillRate = requestsPerMinute / 60_000;
    this.lastRefill = Date.now();
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    const waitMs = (1 - this.tokens) / this.refillRate;
    await sleep(waitMs);
    this.refill();
    this.tokens -= 1;
  }

  private refill() {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}

/**
 * Reject with a timeout error if `promise` has not settled within `ms`.
 * The underlying work is not cancelled; its late result is ignored.
 */
export async function withDeadline<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
