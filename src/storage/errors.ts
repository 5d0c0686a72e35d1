/**
 * ChromaDB vector index errors
 */

export class StorageError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;
  public readonly retryable: boolean;

  constructor(message: string, code: string = "STORAGE_ERROR", cause?: Error, retryable: boolean = false) {
    super(message);
    this.name = "StorageError";
    this.code = code;
    this.cause = cause;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Heartbeat failed, or the index was used before `connect()`
 */
export class StorageConnectionError extends StorageError {
  constructor(message: string, cause?: Error, retryable: boolean = true) {
    super(message, "CONNECTION_ERROR", cause, retryable);
    this.name = "StorageConnectionError";
  }
}

export class InvalidParametersError extends StorageError {
  public readonly parameter?: string;

  constructor(message: string, parameter?: string) {
    super(message, "INVALID_PARAMETERS");
    this.name = "InvalidParametersError";
    this.parameter = parameter;
  }
}

/**
 * Dropping, creating or filling a collection failed
 */
export class DocumentOperationError extends StorageError {
  public readonly collection: string;

  constructor(message: string, collection: string, cause?: Error, retryable: boolean = false) {
    super(message, "DOCUMENT_OPERATION_ERROR", cause, retryable);
    this.name = "DocumentOperationError";
    this.collection = collection;
  }
}

export class SearchOperationError extends StorageError {
  public readonly collection: string;

  constructor(message: string, collection: string, cause?: Error, retryable: boolean = false) {
    super(message, "SEARCH_OPERATION_ERROR", cause, retryable);
    this.name = "SearchOperationError";
    this.collection = collection;
  }
}
