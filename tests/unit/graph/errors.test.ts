/**
 * Unit tests for graph error classes and driver error mapping
 */

import { describe, test, expect } from "vitest";
import {
  GraphAuthenticationError,
  GraphConnectionError,
  GraphError,
  GraphNodeNotFoundError,
  GraphQueryError,
  GraphQueryTimeoutError,
  GraphSchemaError,
  GraphSyntaxError,
  isRetryableGraphError,
  mapNeo4jError,
} from "../../../src/graph/errors.js";
import { neo4jError } from "../../helpers/neo4j-mock.js";

describe("GraphError", () => {
  test("carries code, cause and retryable flag", () => {
    const cause = new Error("socket closed");
    const error = new GraphError("Failed", "CUSTOM", cause, true);

    expect(error.code).toBe("CUSTOM");
    expect(error.cause).toBe(cause);
    expect(error.retryable).toBe(true);
    expect(error.stack).toContain("Caused by: Error: socket closed");
  });

  test("subclasses set their codes and defaults", () => {
    expect(new GraphConnectionError("down").retryable).toBe(true);
    expect(new GraphAuthenticationError("denied").retryable).toBe(false);
    expect(new GraphSyntaxError("bad", "MATCH").code).toBe("QUERY_SYNTAX_ERROR");
    expect(new GraphQueryTimeoutError("slow", 500).timeoutMs).toBe(500);
    expect(new GraphSchemaError("odd", "label counts").schemaElement).toBe("label counts");
  });

  test("not-found errors name the missing node", () => {
    const error = new GraphNodeNotFoundError("Project", "P-404");

    expect(error.message).toBe("Project 'P-404' not found");
    expect(error.code).toBe("NODE_NOT_FOUND");
    expect(error.nodeKey).toBe("P-404");
    expect(error.retryable).toBe(false);
  });
});

describe("mapNeo4jError", () => {
  test("maps security codes to authentication errors", () => {
    const mapped = mapNeo4jError(neo4jError("Neo.ClientError.Security.Unauthorized", "The client is unauthorized"));

    expect(mapped).toBeInstanceOf(GraphAuthenticationError);
    expect(mapped.message).toBe("Neo4j authentication failed: The client is unauthorized");
  });

  test("maps availability codes to retryable connection errors", () => {
    const mapped = mapNeo4jError(neo4jError("ServiceUnavailable", "Could not perform discovery"));

    expect(mapped).toBeInstanceOf(GraphConnectionError);
    expect(mapped.retryable).toBe(true);
  });

  test("maps transaction timeouts with the budget in effect", () => {
    const mapped = mapNeo4jError(
      neo4jError("Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration", "terminated"),
      { query: "MATCH (n) RETURN n", timeoutMs: 2000 }
    );

    expect(mapped).toBeInstanceOf(GraphQueryTimeoutError);
    expect(mapped.message).toBe("Query exceeded timeout of 2000ms");
  });

  test("maps compile failures to syntax errors keeping the query", () => {
    const mapped = mapNeo4jError(neo4jError("Neo.ClientError.Statement.SyntaxError", "Invalid input 'RETRUN'"), {
      query: "MATCH (n) RETRUN n",
    });

    expect(mapped).toBeInstanceOf(GraphSyntaxError);
    expect(mapped instanceof GraphQueryError && mapped.query).toBe("MATCH (n) RETRUN n");
  });

  test("maps transient codes to retryable query errors", () => {
    const mapped = mapNeo4jError(neo4jError("Neo.TransientError.Transaction.DeadlockDetected", "lock cycle"));

    expect(mapped).toBeInstanceOf(GraphQueryError);
    expect(mapped.retryable).toBe(true);
  });

  test("classifies code-less network failures by message", () => {
    expect(mapNeo4jError(new Error("connect ECONNREFUSED 127.0.0.1:7687"))).toBeInstanceOf(GraphConnectionError);
  });

  test("falls back to a non-retryable query error", () => {
    const mapped = mapNeo4jError(neo4jError("Neo.ClientError.Statement.ArgumentError", "bad argument"));

    expect(mapped).toBeInstanceOf(GraphQueryError);
    expect(mapped.retryable).toBe(false);
    expect(mapped.message).toBe("Neo4j query failed: bad argument");
  });

  test("returns graph errors unchanged", () => {
    const error = new GraphSchemaError("already mapped");
    expect(mapNeo4jError(error)).toBe(error);
  });
});

describe("isRetryableGraphError", () => {
  test("uses the flag on graph errors and message patterns otherwise", () => {
    expect(isRetryableGraphError(new GraphQueryError("x", undefined, undefined, true))).toBe(true);
    expect(isRetryableGraphError(new GraphAuthenticationError("x"))).toBe(false);
    expect(isRetryableGraphError(new Error("Leader changed during write"))).toBe(true);
    expect(isRetryableGraphError(new Error("Unknown function"))).toBe(false);
    expect(isRetryableGraphError("ECONNRESET")).toBe(false);
  });
});
