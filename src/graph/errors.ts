/**
 * @module graph/errors
 *
 * Error classes for graph store operations. Driver failures are mapped onto
 * this hierarchy by {@link mapNeo4jError} so callers never branch on raw
 * Neo4j status codes.
 */

/**
 * Base error class for all graph-related errors
 *
 * @example
 * ```typescript
 * throw new GraphError("Failed to execute query", "QUERY_FAILED", cause, true);
 * ```
 */
export class GraphError extends Error {
  /**
   * Error code for categorization and handling
   */
  public readonly code: string;

  /**
   * Original error that caused this error (if any)
   *
   * NOTE: Uses 'override' to shadow ES2022 Error.cause and restrict it to Error instances.
   */
  public override readonly cause?: Error;

  /**
   * Whether the operation may succeed if retried
   */
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string = "GRAPH_ERROR",
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message);
    this.name = "GraphError";
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
 * Neo4j unreachable or refusing connections. Retryable by default.
 */
export class GraphConnectionError extends GraphError {
  constructor(message: string, cause?: Error, retryable: boolean = true) {
    super(message, "CONNECTION_ERROR", cause, retryable);
    this.name = "GraphConnectionError";
  }
}

/**
 * Invalid credentials or insufficient permissions. Never retryable.
 */
export class GraphAuthenticationError extends GraphError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", cause, false);
    this.name = "GraphAuthenticationError";
  }
}

/**
 * A Cypher statement failed at runtime
 */
export class GraphQueryError extends GraphError {
  /**
   * The Cypher text that failed
   */
  public readonly query?: string;

  constructor(
    message: string,
    query?: string,
    cause?: Error,
    retryable: boolean = false,
    code: string = "QUERY_ERROR"
  ) {
    super(message, code, cause, retryable);
    this.name = "GraphQueryError";
    this.query = query;
  }
}

/**
 * The server rejected a statement at compile time (syntax or semantic error)
 */
export class GraphSyntaxError extends GraphQueryError {
  constructor(message: string, query?: string, cause?: Error) {
    super(message, query, cause, false, "QUERY_SYNTAX_ERROR");
    this.name = "GraphSyntaxError";
  }
}

/**
 * A statement exceeded its transaction timeout
 *
 * Retryable in the general sense, but read paths bounded by a caller timeout
 * never retry it.
 */
export class GraphQueryTimeoutError extends GraphError {
  /**
   * Timeout duration in milliseconds
   */
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, cause?: Error) {
    super(message, "QUERY_TIMEOUT", cause, true);
    this.name = "GraphQueryTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Schema introspection failed
 */
export class GraphSchemaError extends GraphError {
  /**
   * The schema element being read when the failure occurred
   */
  public readonly schemaElement?: string;

  constructor(message: string, schemaElement?: string, cause?: Error) {
    super(message, "SCHEMA_ERROR", cause, false);
    this.name = "GraphSchemaError";
    this.schemaElement = schemaElement;
  }
}

/**
 * A directory lookup matched nothing
 *
 * Not retryable: the node is absent or has nothing linked to it.
 */
export class GraphNodeNotFoundError extends GraphError {
  /**
   * Label of the node looked up
   */
  public readonly nodeType: string;

  /**
   * The key the lookup used
   */
  public readonly nodeKey: string;

  constructor(nodeType: string, nodeKey: string, message?: string) {
    super(message ?? `${nodeType} '${nodeKey}' not found`, "NODE_NOT_FOUND");
    this.name = "GraphNodeNotFoundError";
    this.nodeType = nodeType;
    this.nodeKey = nodeKey;
  }
}

/**
 * Determine if an error is retryable
 *
 * Handles both the classes above and raw errors carrying a transient message.
 */
export function isRetryableGraphError(error: unknown): boolean {
  if (error instanceof GraphError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      "econnrefused",
      "econnreset",
      "etimedout",
      "socket hang up",
      "connection refused",
      "connection reset",
      "deadlock",
      "database unavailable",
      "leader changed",
      "temporarily unavailable",
      "service unavailable",
    ];
    return retryablePatterns.some((pattern) => message.includes(pattern));
  }

  return false;
}

/**
 * Read the `code` property the driver attaches to its errors
 */
function neo4jErrorCode(error: Error): string {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "";
}

/**
 * Map a Neo4j driver error onto the GraphError hierarchy
 *
 * Classification uses the driver's status code first and falls back to the
 * message for errors raised before a status is available.
 *
 * @param error - Raw error from neo4j-driver
 * @param context - Query text and timeout in effect, when known
 */
export function mapNeo4jError(
  error: Error,
  context: { query?: string; timeoutMs?: number } = {}
): GraphError {
  if (error instanceof GraphError) {
    return error;
  }

  const code = neo4jErrorCode(error);
  const message = error.message;
  const lower = message.toLowerCase();

  if (code.startsWith("Neo.ClientError.Security.") || lower.includes("unauthorized")) {
    return new GraphAuthenticationError(`Neo4j authentication failed: ${message}`, error);
  }

  if (code === "ServiceUnavailable" || code === "SessionExpired") {
    return new GraphConnectionError(`Neo4j unavailable: ${message}`, error);
  }

  if (code.includes("TransactionTimedOut") || lower.includes("transaction timed out")) {
    return new GraphQueryTimeoutError(
      `Query exceeded timeout of ${context.timeoutMs ?? "unknown"}ms`,
      context.timeoutMs ?? 0,
      error
    );
  }

  if (code === "Neo.ClientError.Statement.SyntaxError" || code === "Neo.ClientError.Statement.SemanticError") {
    return new GraphSyntaxError(`Invalid Cypher: ${message}`, context.query, error);
  }

  if (code.startsWith("Neo.TransientError.")) {
    return new GraphQueryError(`Transient Neo4j failure: ${message}`, context.query, error, true);
  }

  if (isRetryableGraphError(error)) {
    return new GraphConnectionError(`Neo4j connection failure: ${message}`, error);
  }

  return new GraphQueryError(`Neo4j query failed: ${message}`, context.query, error, false);
}
