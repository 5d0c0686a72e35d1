/**
 * Embedding provider errors
 *
 * Messages are passed through {@link redactSecrets}, since providers echo
 * rejected keys back in their error text.
 */

import { redactSecrets } from "../logging/redactors.js";

export class EmbeddingError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, code: string = "EMBEDDING_ERROR", retryable: boolean = false, cause?: Error) {
    super(redactSecrets(message));
    this.name = "EmbeddingError";
    this.code = code;
    this.retryable = retryable;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class EmbeddingAuthenticationError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", false, cause);
    this.name = "EmbeddingAuthenticationError";
  }
}

/**
 * `retryAfterMs` comes from the provider's Retry-After header
 */
export class EmbeddingRateLimitError extends EmbeddingError {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, cause?: Error) {
    super(message, "RATE_LIMIT_ERROR", true, cause);
    this.name = "EmbeddingRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class EmbeddingNetworkError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", true, cause);
    this.name = "EmbeddingNetworkError";
  }
}

export class EmbeddingTimeoutError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "TIMEOUT_ERROR", true, cause);
    this.name = "EmbeddingTimeoutError";
  }
}

/**
 * Bad input or provider settings; `parameter` names the offending one
 */
export class EmbeddingValidationError extends EmbeddingError {
  public readonly parameter?: string;

  constructor(message: string, parameter?: string, cause?: Error) {
    super(message, "VALIDATION_ERROR", false, cause);
    this.name = "EmbeddingValidationError";
    this.parameter = parameter;
  }
}
