/**
 * Composable wrappers around async operations.
 *
 * An operation is a thunk returning a promise; a middleware takes the next
 * operation and returns a new one. Retry, timing and logging are middlewares,
 * so a collaborator call reads as `compose(retry(...), timed(...))(op)()`.
 */

import { setTimeout as delay } from "node:timers/promises";

import { categorizeError, errorMessage, type ErrorCategory } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type Operation<T> = () => Promise<T>;

export type Middleware = <T>(next: Operation<T>) => Operation<T>;

export type RetryObserver = (
  attempt: number,
  delayMs: number,
  error: unknown
) => void;

export interface RetryOptions {
  /** Label used in log lines */
  name?: string;
  /** Total number of invocations, including the first (default 3) */
  maxAttempts?: number;
  /** Delay before the second attempt (default 1000ms) */
  baseDelayMs?: number;
  /** Growth factor applied per attempt (default 2) */
  multiplier?: number;
  /** Upper bound of the uniform jitter added per attempt (default 500ms) */
  jitterMs?: number;
  /** Error categories that trigger a retry (default transient only) */
  retryOn?: readonly ErrorCategory[];
  onRetry?: RetryObserver;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export interface TimedOptions {
  warnAfterMs?: number;
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// Constants
// ============================================================================

export const RETRY_DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  jitterMs: 500,
  retryOn: ["transient"] as readonly ErrorCategory[],
} as const;

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

// ============================================================================
// Composition
// ============================================================================

/**
 * Chain middlewares; the first one listed is the outermost.
 */
export function compose(...middlewares: Middleware[]): Middleware {
  return <T>(operation: Operation<T>): Operation<T> =>
    middlewares.reduceRight<Operation<T>>(
      (next, middleware) => middleware(next),
      operation
    );
}

// ============================================================================
// Retry
// ============================================================================

/**
 * Delay before the attempt following `attempt` (1-based), without jitter.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  multiplier: number
): number {
  return baseDelayMs * multiplier ** (attempt - 1);
}

export function withRetry<T>(
  operation: Operation<T>,
  options: RetryOptions & { raise: false }
): Promise<T | undefined>;
export function withRetry<T>(
  operation: Operation<T>,
  options?: RetryOptions & { raise?: true }
): Promise<T>;
export async function withRetry<T>(
  operation: Operation<T>,
  options: RetryOptions & { raise?: boolean } = {}
): Promise<T | undefined> {
  const {
    name = "operation",
    maxAttempts = RETRY_DEFAULTS.maxAttempts,
    baseDelayMs = RETRY_DEFAULTS.baseDelayMs,
    multiplier = RETRY_DEFAULTS.multiplier,
    jitterMs = RETRY_DEFAULTS.jitterMs,
    retryOn = RETRY_DEFAULTS.retryOn,
    onRetry,
    sleep = defaultSleep,
    random = Math.random,
    logger = rootLogger,
    raise = true,
  } = options;

  const attempts = Math.max(1, Math.floor(maxAttempts));
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      const category = categorizeError(error);

      if (!retryOn.includes(category)) {
        throw error;
      }

      if (attempt >= attempts) {
        if (!raise) {
          logger.error(
            { operation: name, attempts, error: errorMessage(error) },
            "Operation failed after all attempts, returning no result"
          );
          return undefined;
        }
        logger.error(
          { operation: name, attempts, error: errorMessage(error) },
          "Operation failed after all attempts"
        );
        throw error;
      }

      const delayMs =
        backoffDelay(attempt, baseDelayMs, multiplier) + random() * jitterMs;

      logger.warn(
        {
          operation: name,
          attempt,
          maxAttempts: attempts,
          delayMs: Math.round(delayMs),
          error: errorMessage(error),
        },
        "Operation failed, retrying"
      );

      onRetry?.(attempt, delayMs, error);
      await sleep(delayMs);
    }
  }
}

/**
 * Retry as a middleware. Always raises once attempts are exhausted.
 */
export function retry(options: RetryOptions = {}): Middleware {
  return <T>(next: Operation<T>): Operation<T> =>
    () =>
      withRetry(next, { ...options, raise: true });
}

// ============================================================================
// Timing and logging
// ============================================================================

/**
 * Measure an operation; above `warnAfterMs` the duration is logged at warn level.
 */
export function timed(name: string, options: TimedOptions = {}): Middleware {
  const { warnAfterMs, logger = rootLogger, now = () => performance.now() } =
    options;

  return <T>(next: Operation<T>): Operation<T> =>
    async () => {
      const startTime = now();
      const result = await next();
      const durationMs = Math.round(now() - startTime);

      if (warnAfterMs !== undefined && durationMs > warnAfterMs) {
        logger.warn(
          { operation: name, durationMs, thresholdMs: warnAfterMs },
          "Operation exceeded duration threshold"
        );
      } else {
        logger.debug({ operation: name, durationMs }, "Operation completed");
      }

      return result;
    };
}

export function logged(name: string, logger: Logger = rootLogger): Middleware {
  return <T>(next: Operation<T>): Operation<T> =>
    async () => {
      logger.debug({ operation: name }, "Operation started");
      try {
        const result = await next();
        logger.debug({ operation: name }, "Operation finished");
        return result;
      } catch (error) {
        logger.error(
          { operation: name, error: errorMessage(error) },
          "Operation failed"
        );
        throw error;
      }
    };
}
