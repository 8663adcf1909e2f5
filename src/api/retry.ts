/**
 * Retry logic with exponential backoff for registry operations
 *
 * Features:
 * - Exponential backoff doubling from a base delay, capped at a maximum
 * - Optional jitter, bounded so successive delays never decrease
 * - Retry-After honoured for rate-limited responses
 * - Only transient failures are retried; the final error is returned unchanged
 * - Cancellation through an AbortSignal, including during backoff
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type RetagLogger } from './logger.js';
import {
  CancelledError,
  RegistryRequestError,
  TokenRequestError,
  isTransientError,
} from '../registry/errors.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterFactor: 0,
};

/**
 * Largest jitter factor that keeps doubling delays monotonic:
 * (1 + j) * d <= (1 - j) * 2d holds for j <= 1/3
 */
export const MAX_JITTER_FACTOR = 1 / 3;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  /** Custom logger instance */
  logger?: RetagLogger;
  /** Called before each backoff wait */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Called when all attempts are used up on retryable errors */
  onExhausted?: (error: unknown, attempts: number) => void;
  /** Cancels the operation between attempts and during backoff */
  signal?: AbortSignal;
  /** Wait implementation (injected by tests) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Random source for jitter, in [0, 1) */
  random?: () => number;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The attempt that just failed (1-indexed)
 * @param retryAfter - Optional Retry-After header value (seconds)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number,
  random: () => number = Math.random
): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitterFactor = Math.min(Math.max(config.jitterFactor, 0), MAX_JITTER_FACTOR);
  const jitter = (random() * 2 - 1) * exponentialDelay * jitterFactor;

  let delay = exponentialDelay + jitter;

  // A rate-limited registry may ask for a longer wait, never a shorter one
  if (retryAfter !== undefined && retryAfter > 0) {
    delay = Math.max(delay, retryAfter * 1000);
  }

  // Clamp to max delay
  return Math.min(Math.max(delay, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration, rejecting with CancelledError if the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds : undefined;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;

  const delayMs = date - now;
  return delayMs > 0 ? Math.ceil(delayMs / 1000) : undefined;
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Execute a function with retry logic
 *
 * Makes at most `maxAttempts` calls. Non-retryable errors end the loop after
 * the attempt that raised them.
 *
 * @returns RetryResult with success/failure and attempt metadata
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  };
  const maxAttempts = Math.max(1, Math.floor(config.maxAttempts));

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  const delaysMs: number[] = [];
  let lastError: unknown;
  let attempt = 0;

  while (attempt < maxAttempts) {
    if (options.signal?.aborted) {
      lastError = new CancelledError(options.signal.reason);
      break;
    }

    attempt++;

    try {
      const result = await fn(attempt);

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      return { success: true, data: result, attempts: attempt, delaysMs };
    } catch (error) {
      lastError = error;

      if (!isTransientError(error)) {
        log.debug('Error is not retryable', {
          error: error instanceof Error ? error.message : String(error),
          attempts: attempt,
        });
        break;
      }

      if (attempt >= maxAttempts) {
        log.warn(`All ${maxAttempts} attempts exhausted`, {
          error: error instanceof Error ? error.message : String(error),
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        });
        options.onExhausted?.(error, attempt);
        break;
      }

      const retryAfter =
        error instanceof RegistryRequestError || error instanceof TokenRequestError
          ? error.retryAfter
          : undefined;
      const previousDelay = delaysMs.length > 0 ? delaysMs[delaysMs.length - 1] : 0;
      const delayMs = Math.max(
        calculateDelay(attempt, config, retryAfter, options.random),
        previousDelay
      );

      log.info(`Retry attempt ${attempt + 1}/${maxAttempts} in ${Math.round(delayMs)}ms`, {
        error: error instanceof Error ? error.message : String(error),
        status: error instanceof RegistryRequestError ? error.status : undefined,
        delayMs: Math.round(delayMs),
      });

      options.onRetry?.(attempt, error, delayMs);
      delaysMs.push(delayMs);

      try {
        await wait(delayMs, options.signal);
      } catch (waitError) {
        lastError = waitError;
        break;
      }
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: attempt,
    delaysMs,
  };
}
