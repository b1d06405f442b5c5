import { ProviderError, RateLimitedError, errorMessage, isAppError } from "../errors";
import { Sleep, sleep as systemSleep } from "./time";

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 20_000,
  backoffFactor: 2,
};

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends RetryPolicy {
  isRateLimited?: (err: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: Sleep;
}

const RATE_LIMIT_MESSAGE_HINTS = ["rate limit", "too many requests"];

function statusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : null;
  return typeof status === "number" ? status : null;
}

/**
 * Our own error classes are classified by type alone, so an exhausted
 * budget (a ProviderError) is never retried again by an outer loop.
 * Foreign errors fall back to a 429 status or a throttling phrase.
 */
export function isRateLimitError(err: unknown): boolean {
  if (isAppError(err)) return err instanceof RateLimitedError;
  if (statusOf(err) === 429) return true;
  const message = errorMessage(err).toLowerCase();
  return RATE_LIMIT_MESSAGE_HINTS.some((hint) => message.includes(hint));
}

function retryAfterMs(err: unknown): number {
  if (err instanceof RateLimitedError && err.retryAfterSeconds != null) {
    return err.retryAfterSeconds * 1000;
  }
  return 0;
}

/**
 * Runs `operation`, retrying only on rate-limit failures with exponential
 * backoff. Anything else propagates after the first attempt.
 */
export async function runWithRetry<T>(operation: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const isRateLimited = opts.isRateLimited ?? isRateLimitError;
  const wait = opts.sleep ?? systemSleep;
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  let delayMs = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!isRateLimited(err)) throw err;
      if (attempt >= maxAttempts) {
        throw new ProviderError(`Rate limit exceeded after ${maxAttempts} attempts: ${errorMessage(err)}`, 429, {
          cause: err,
        });
      }
      const waitMs = Math.max(delayMs, retryAfterMs(err));
      opts.onRetry?.({ attempt, maxAttempts, delayMs: waitMs, error: err });
      await wait(waitMs);
      delayMs *= opts.backoffFactor;
    }
  }
}
