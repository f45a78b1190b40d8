/**
 * Retry Utility with exponential backoff and server-directed delays
 *
 * Features:
 * - Exponential backoff: baseDelay * 2^attempt (optional jitter)
 * - Honors `retryAfter` carried by rate-limit errors
 * - Per-error-class retry policy (server + rate limit by default)
 * - Prometheus metrics for attempts, successes and exhaustion
 *
 * Usage:
 * ```typescript
 * const result = await retryWithBackoff(() => client.request("GET", "/servers"), {
 *   maxRetries: 3,
 *   baseDelayMs: 1000,
 *   operationName: "GET /servers",
 * });
 * ```
 */

import { logger } from "./logger.js";
import { ApiError, RateLimitError, isRetryableApiError, toError } from "./errors.js";
import { Ok, Err, sleep as defaultSleep } from "../types/common.js";
import type { Result, Sleep } from "../types/common.js";
import {
  recordRetryAttempt,
  recordRetryExhausted,
  recordRetrySuccess,
  observeRetryDelay,
} from "./metrics.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Retry policy - returns true if the error should be retried
 */
export type RetryPolicy = (error: Error, attemptNumber: number) => boolean;

export interface RetryOptions {
  /** Total number of attempts, first one included (default: 3) */
  maxRetries: number;

  /** Base delay in milliseconds for exponential backoff */
  baseDelayMs: number;

  /** Cap applied to computed backoff delays (default: 30000ms) */
  maxDelayMs?: number;

  /** Jitter factor (0-1) for randomization (default: 0) */
  jitterFactor?: number;

  /** Retry policy function (default: apiRetryPolicy) */
  retryPolicy?: RetryPolicy;

  /** Operation name for logging and metrics */
  operationName?: string;

  /** Called before each wait */
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;

  /** Replaceable wait primitive */
  sleep?: Sleep;
}

export interface RetryResult<T> {
  value: T;
  /** Number of attempts made (1 = success on first try) */
  attempts: number;
  totalTimeMs: number;
}

export interface RetryError {
  type: "RETRY_EXHAUSTED" | "NON_RETRYABLE";
  originalError: Error;
  attempts: number;
  totalTimeMs: number;
  message: string;
}

// ============================================================================
// Policies
// ============================================================================

/**
 * Retry only server errors (5xx, open circuit) and rate limits.
 * Auth, validation, not-found and client errors are terminal.
 */
export const apiRetryPolicy: RetryPolicy = (error) => isRetryableApiError(error);

/**
 * Additionally retry transport failures (timeouts, refused connections)
 */
export const transientRetryPolicy: RetryPolicy = (error) =>
  isRetryableApiError(error) ||
  (error instanceof ApiError &&
    (error.kind === "timeout" || error.kind === "network"));

// ============================================================================
// Delay Calculation
// ============================================================================

/**
 * Delay before the next attempt.
 * A rate-limit error with retryAfter wins over the backoff formula and is not
 * capped here; retryWithBackoff stops retrying when it exceeds maxDelayMs.
 */
export function calculateRetryDelay(
  error: Error,
  attemptNumber: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number
): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.max(0, error.retryAfter * 1000);
  }

  let delay = baseDelayMs * Math.pow(2, attemptNumber);

  if (jitterFactor > 0) {
    const jitterRange = delay * jitterFactor;
    delay += (Math.random() * 2 - 1) * jitterRange;
  }

  delay = Math.min(delay, maxDelayMs);

  return Math.floor(Math.max(0, delay));
}

// ============================================================================
// Main Retry Function
// ============================================================================

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<Result<RetryResult<T>, RetryError>> {
  const {
    maxRetries,
    baseDelayMs,
    maxDelayMs = 30_000,
    jitterFactor = 0,
    retryPolicy = apiRetryPolicy,
    operationName = "unknown",
    onRetry,
    sleep = defaultSleep,
  } = options;

  const attemptsAllowed = Math.max(1, maxRetries);
  const startTime = Date.now();
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < attemptsAllowed; attempt++) {
    try {
      recordRetryAttempt(operationName, attempt + 1);

      const value = await fn();
      const totalTimeMs = Date.now() - startTime;

      if (attempt > 0) {
        recordRetrySuccess(operationName, attempt + 1);
        logger.info("Retry succeeded", {
          operation: operationName,
          attempts: attempt + 1,
          totalTimeMs,
        });
      }

      return Ok({ value, attempts: attempt + 1, totalTimeMs });
    } catch (error) {
      lastError = toError(error);

      if (!retryPolicy(lastError, attempt)) {
        logger.debug("Non-retryable error, failing immediately", {
          operation: operationName,
          attempt: attempt + 1,
          error: lastError.message,
        });

        return Err({
          type: "NON_RETRYABLE",
          originalError: lastError,
          attempts: attempt + 1,
          totalTimeMs: Date.now() - startTime,
          message: `Non-retryable error in ${operationName}: ${lastError.message}`,
        });
      }

      if (attempt < attemptsAllowed - 1) {
        const delayMs = calculateRetryDelay(
          lastError,
          attempt,
          baseDelayMs,
          maxDelayMs,
          jitterFactor
        );

        if (delayMs > maxDelayMs) {
          // Only an upstream Retry-After can exceed the cap; waiting it out is the caller's call
          logger.warn("Retry-After exceeds the maximum retry delay, not retrying", {
            operation: operationName,
            attempt: attempt + 1,
            delayMs,
            maxDelayMs,
          });

          return Err({
            type: "NON_RETRYABLE",
            originalError: lastError,
            attempts: attempt + 1,
            totalTimeMs: Date.now() - startTime,
            message: `Retry-After of ${delayMs}ms exceeds the ${maxDelayMs}ms limit for ${operationName}: ${lastError.message}`,
          });
        }

        observeRetryDelay(operationName, delayMs);

        logger.debug("Retrying after error", {
          operation: operationName,
          attempt: attempt + 1,
          maxRetries: attemptsAllowed,
          delayMs,
          error: lastError.message,
        });

        onRetry?.(lastError, attempt + 1, delayMs);

        await sleep(delayMs);
      }
    }
  }

  recordRetryExhausted(operationName);

  const totalTimeMs = Date.now() - startTime;
  const originalError = lastError ?? new Error("Unknown error");

  logger.warn("Retry exhausted", {
    operation: operationName,
    attempts: attemptsAllowed,
    totalTimeMs,
    lastError: originalError.message,
  });

  return Err({
    type: "RETRY_EXHAUSTED",
    originalError,
    attempts: attemptsAllowed,
    totalTimeMs,
    message: `Retry exhausted for ${operationName} after ${attemptsAllowed} attempts: ${originalError.message}`,
  });
}

/**
 * Throwing variant: resolves with the value or rethrows the last error unchanged
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const result = await retryWithBackoff(fn, options);

  if (result.success) {
    return result.value.value;
  }

  throw result.error.originalError;
}
