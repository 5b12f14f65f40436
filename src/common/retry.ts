import type { Logger } from "pino"
import { setTimeout as delay } from "node:timers/promises"

import { isTransientError } from "./grpc/status.js"

export interface RetryOptions {
  /**
   * How many times a failed attempt is retried. `0` sends the request once.
   */
  maxRetries: number

  /**
   * Base delay of the exponential backoff, in milliseconds.
   */
  backoffMs?: number

  /**
   * Upper bound of a single backoff delay, in milliseconds.
   */
  maxBackoffMs?: number

  /**
   * Decides whether an error is worth another attempt.
   * Defaults to {@link isTransientError}.
   */
  isRetryable?: (error: unknown) => boolean

  /**
   * Stops waiting between attempts when aborted.
   */
  signal?: AbortSignal

  logger?: Logger
}

export const DEFAULT_RETRY_BACKOFF_MS = 100
export const DEFAULT_MAX_RETRY_BACKOFF_MS = 5_000

/**
 * Delay before retry number `attempt` (zero-based): `base * 2^attempt` plus up
 * to the same amount of jitter, capped at `max`.
 */
export function calculateBackoff(
  attempt: number,
  baseMs: number,
  maxMs: number,
): number {
  const exponential = baseMs * Math.pow(2, attempt)
  const jitter = Math.random() * exponential
  return Math.min(Math.floor(exponential + jitter), maxMs)
}

/**
 * Validate a retry ceiling: a non-negative integer.
 *
 * @throws RangeError otherwise, including for NaN and Infinity
 */
export function checkMaxRetries(maxRetries: number): number {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(
      `maxRetries must be a non-negative integer, got ${maxRetries}`,
    )
  }
  return maxRetries
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or `maxRetries`
 * retries have been spent. The last error is rethrown as is.
 *
 * @param fn - Receives the zero-based attempt number
 */
export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError
  const backoffMs = options.backoffMs ?? DEFAULT_RETRY_BACKOFF_MS
  const maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_RETRY_BACKOFF_MS
  const maxRetries = checkMaxRetries(options.maxRetries)

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await fn(attempt)
      if (attempt > 0) {
        options.logger?.debug({ retries: attempt }, "succeeded after retries")
      }
      return result
    } catch (error) {
      if (attempt >= maxRetries || !isRetryable(error)) {
        throw error
      }

      const wait = calculateBackoff(attempt, backoffMs, maxBackoffMs)
      options.logger?.warn(
        { err: error, attempt: attempt + 1, maxRetries, backoffMs: wait },
        "transient failure, retrying",
      )
      if (wait > 0) {
        await delay(wait, undefined, { signal: options.signal })
      }
    }
  }
}
