/**
 * Document ingestion error classes.
 *
 * Classification and extraction problems are recovered locally and never
 * raised; only invalid input and failed graph writes surface.
 *
 * @module ingestion/errors
 */

export class IngestionError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;
  public readonly retryable: boolean;

  constructor(message: string, code: string = "INGESTION_ERROR", cause?: Error, retryable: boolean = false) {
    super(message);
    this.name = "IngestionError";
    this.code = code;
    this.cause = cause;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Error thrown when the submitted document or its metadata is unusable.
 */
export class IngestionValidationError extends IngestionError {
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "IngestionValidationError";
    this.field = field;
  }
}

/**
 * Error thrown when writing the extracted records to the graph fails.
 *
 * Includes the document id so partially written documents can be found.
 */
export class IngestionWriteError extends IngestionError {
  public readonly documentId: string;

  constructor(message: string, documentId: string, cause?: Error, retryable: boolean = false) {
    super(message, "WRITE_ERROR", cause, retryable);
    this.name = "IngestionWriteError";
    this.documentId = documentId;
  }
}
