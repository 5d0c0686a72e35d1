/**
 * Retries with exponential backoff for the graph store, the embedding
 * providers and the chat model. Each caller supplies its own
 * `shouldRetry` predicate.
 */

import type pino from "pino";

/**
 * Backoff settings loaded from configuration
 */
export interface RetryConfig {
  /** Attempts after the first; 0 disables retrying */
  maxRetries: number;
  initialDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
};

export interface RetryOptions {
  maxRetries: number;
  /** Defaults to retrying everything */
  shouldRetry?: (error: Error) => boolean;
  /** Delay before retry number `attempt` (0-based) */
  calculateBackoff?: (attempt: number, error: Error) => number;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * 1s, 2s, 4s, ...
 */
export function defaultExponentialBackoff(attempt: number): number {
  return Math.pow(2, attempt) * 1000;
}

/**
 * `onRetry` callback that logs one warning per retry, numbered from 1
 */
export function createRetryLogger(
  logger: pino.Logger,
  operation: string,
  maxRetries: number
): (attempt: number, error: Error, delayMs: number) => void {
  return (attempt, error, delayMs) => {
    logger.warn(
      { attempt: attempt + 1, maxRetries, delayMs, error: error.message, errorType: error.constructor.name },
      `Retrying ${operation}`
    );
  };
}

/**
 * Options whose delays follow `config`, capped at `maxDelayMs`
 */
export function createRetryOptions(
  config: RetryConfig,
  overrides?: Partial<Omit<RetryOptions, "maxRetries">>
): RetryOptions {
  const { initialDelayMs, maxDelayMs, backoffMultiplier } = config;
  return {
    maxRetries: config.maxRetries,
    calculateBackoff: (attempt) => Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs),
    ...overrides,
  };
}

/**
 * Run `operation`, retrying while `shouldRetry` accepts the failure
 *
 * @throws the last failure once retries run out, or the first one
 *   `shouldRetry` refuses
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, shouldRetry = () => true, calculateBackoff = defaultExponentialBackoff, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const failure = toError(error);
      if (attempt >= maxRetries || !shouldRetry(failure)) {
        throw failure;
      }
      const delayMs = calculateBackoff(attempt, failure);
      onRetry?.(attempt, failure, delayMs);
      await sleep(delayMs);
    }
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
