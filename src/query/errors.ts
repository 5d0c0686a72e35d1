/**
 * @module query/errors
 *
 * Failures of the question-answering pipeline. Each carries the original
 * question, and the query text once one exists, so a failure can be
 * reproduced from the error alone.
 */

/**
 * Base class for all pipeline failures
 */
export abstract class QueryPipelineError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;
  public readonly retryable: boolean;
  /** The question being answered, when the failure happened on the query path */
  public readonly question?: string;

  constructor(message: string, code: string, options: { question?: string; cause?: Error; retryable?: boolean } = {}) {
    super(message);
    this.name = "QueryPipelineError";
    this.code = code;
    this.cause = options.cause;
    this.question = options.question;
    this.retryable = options.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options.cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * The structured store could not be introspected
 */
export class SchemaUnavailableError extends QueryPipelineError {
  constructor(message: string, cause?: Error, question?: string) {
    super(message, "SCHEMA_UNAVAILABLE", { cause, question, retryable: true });
    this.name = "SchemaUnavailableError";
  }
}

/**
 * A reference to a schema element absent from the snapshot
 */
export interface UnknownSchemaElement {
  kind: "label" | "relationship" | "property";
  name: string;
  /** Variable or owner the element was used with, when known */
  owner?: string;
}

/**
 * Translation produced no usable query, or one naming unknown schema elements
 */
export class QueryGenerationError extends QueryPipelineError {
  public readonly query?: string;
  public readonly unknownElements: readonly UnknownSchemaElement[];

  constructor(
    message: string,
    question: string,
    options: { query?: string; unknownElements?: UnknownSchemaElement[]; cause?: Error; retryable?: boolean } = {}
  ) {
    super(message, "QUERY_GENERATION_ERROR", {
      question,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "QueryGenerationError";
    this.query = options.query;
    this.unknownElements = options.unknownElements ?? [];
  }
}

/**
 * The generated query is not a valid read-only statement. Nothing was executed.
 */
export class QueryValidationError extends QueryPipelineError {
  public readonly query: string;
  public readonly issues: readonly string[];

  constructor(message: string, question: string, query: string, issues: string[], cause?: Error) {
    super(message, "QUERY_VALIDATION_ERROR", { question, cause });
    this.name = "QueryValidationError";
    this.query = query;
    this.issues = issues;
  }
}

/**
 * The store failed while executing a validated query
 */
export class QueryExecutionError extends QueryPipelineError {
  public readonly query?: string;
  /** True when the failure was the execution timeout */
  public readonly timedOut: boolean;

  constructor(
    message: string,
    question: string,
    options: { query?: string; timedOut?: boolean; cause?: Error; retryable?: boolean } = {}
  ) {
    super(message, options.timedOut ? "QUERY_TIMEOUT" : "QUERY_EXECUTION_ERROR", {
      question,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "QueryExecutionError";
    this.query = options.query;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * The semantic index could not be searched or rebuilt
 *
 * Degrades the query path; surfaced only by index maintenance.
 */
export class SemanticRetrievalError extends QueryPipelineError {
  public readonly collection: string;

  constructor(message: string, collection: string, cause?: Error, retryable: boolean = false) {
    super(message, "SEMANTIC_RETRIEVAL_ERROR", { cause, retryable });
    this.name = "SemanticRetrievalError";
    this.collection = collection;
  }
}

/**
 * Answer synthesis failed; recorded as a degradation, never thrown past the synthesizer
 */
export class SynthesisError extends QueryPipelineError {
  constructor(message: string, question: string, cause?: Error) {
    super(message, "SYNTHESIS_ERROR", { question, cause });
    this.name = "SynthesisError";
  }
}

/**
 * Failures that end a request
 */
export type FatalQueryError =
  | SchemaUnavailableError
  | QueryGenerationError
  | QueryValidationError
  | QueryExecutionError;

export function isFatalQueryError(error: unknown): error is FatalQueryError {
  return (
    error instanceof SchemaUnavailableError ||
    error instanceof QueryGenerationError ||
    error instanceof QueryValidationError ||
    error instanceof QueryExecutionError
  );
}
