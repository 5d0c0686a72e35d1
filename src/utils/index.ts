/**
 * Utilities module exports
 */

export {
  withRetry,
  defaultExponentialBackoff,
  createRetryLogger,
  createRetryOptions,
  toError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig, RetryOptions } from "./retry.js";

export { withTimeout, TimeoutError } from "./timeout.js";

export { Ok, Err, unwrapOrElse } from "./result.js";
export type { Result, OkResult, ErrResult } from "./result.js";
