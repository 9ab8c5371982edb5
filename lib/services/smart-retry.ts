// Retry with exponential backoff for calls to external services
import { setTimeout as delay } from "node:timers/promises";

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs?: number;
}

export interface RetryAttempt {
  attempt: number;
  delayMs: number;
  reason: string;
  error: unknown;
}

export interface RetryOptions {
  policy: RetryPolicy;
  /**
   * Returns a reason label when the error is worth retrying, or null when it
   * must be surfaced immediately.
   */
  classifyError: (error: unknown) => string | null;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: RetryAttempt) => void;
  label?: string;
}

export type RetryResult<T> =
  | { success: true; result: T; attempts: number }
  | { success: false; error: unknown; reason: string; attempts: number };

const defaultSleep = (ms: number): Promise<void> => delay(ms);

/**
 * Delay before retry number `retry` (1-based): initialDelay × factor^(retry-1).
 */
export function computeBackoffDelay(policy: RetryPolicy, retry: number): number {
  const raw = policy.initialDelayMs * Math.pow(policy.backoffFactor, Math.max(0, retry - 1));
  return policy.maxDelayMs === undefined ? raw : Math.min(raw, policy.maxDelayMs);
}

/**
 * Upper bound on the time spent waiting between attempts.
 */
export function totalBackoffBudget(policy: RetryPolicy): number {
  let total = 0;
  for (let retry = 1; retry <= policy.maxRetries; retry++) {
    total += computeBackoffDelay(policy, retry);
  }
  return total;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error (thrown),
 * or exhausts the retry budget (returned as `success: false`).
 */
export async function executeWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  const { policy, classifyError, sleep = defaultSleep, onRetry, label = "operation" } = options;
  const maxAttempts = policy.maxRetries + 1;

  let lastError: unknown;
  let lastReason = "unknown";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const result = await operation(attempt);
      return { success: true, result, attempts: attempt };
    } catch (error) {
      const reason = classifyError(error);
      if (reason === null) {
        throw error;
      }

      lastError = error;
      lastReason = reason;

      if (attempt === maxAttempts) {
        break;
      }

      const delayMs = computeBackoffDelay(policy, attempt);
      console.warn(
        `[SmartRetry] ${label} failed (${reason}), attempt ${attempt}/${maxAttempts}. Retrying in ${delayMs}ms`,
      );
      onRetry?.({ attempt, delayMs, reason, error });
      await sleep(delayMs);
    }
  }

  console.error(`[SmartRetry] ${label} failed after ${maxAttempts} attempts (${lastReason})`);
  return { success: false, error: lastError, reason: lastReason, attempts: maxAttempts };
}
