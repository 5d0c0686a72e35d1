/**
 * Error classes for language model calls
 */

import { redactSecrets } from "../logging/redactors.js";

export class LanguageModelError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, code: string = "LLM_ERROR", retryable: boolean = false, cause?: Error) {
    super(redactSecrets(message));
    this.name = "LanguageModelError";
    this.code = code;
    this.retryable = retryable;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class LanguageModelAuthenticationError extends LanguageModelError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", false, cause);
    this.name = "LanguageModelAuthenticationError";
  }
}

export class LanguageModelRateLimitError extends LanguageModelError {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, cause?: Error) {
    super(message, "RATE_LIMIT_ERROR", true, cause);
    this.name = "LanguageModelRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class LanguageModelTimeoutError extends LanguageModelError {
  constructor(message: string, cause?: Error) {
    super(message, "TIMEOUT_ERROR", true, cause);
    this.name = "LanguageModelTimeoutError";
  }
}

export class LanguageModelNetworkError extends LanguageModelError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", true, cause);
    this.name = "LanguageModelNetworkError";
  }
}

/**
 * The provider answered with something unusable (no choices, bad request)
 */
export class LanguageModelResponseError extends LanguageModelError {
  constructor(message: string, cause?: Error) {
    super(message, "RESPONSE_ERROR", false, cause);
    this.name = "LanguageModelResponseError";
  }
}

export function isRetryableLanguageModelError(error: unknown): boolean {
  return error instanceof LanguageModelError && error.retryable;
}
