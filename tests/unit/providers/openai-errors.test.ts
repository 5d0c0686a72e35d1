import { describe, test, expect } from "vitest";
import { classifyOpenAIFailure } from "../../../src/providers/openai-errors.js";

function withStatus(message: string, status: number, headers?: Record<string, string>): Error {
  return Object.assign(new Error(message), { status, headers });
}

function named(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("classifyOpenAIFailure", () => {
  test("classifies by HTTP status", () => {
    expect(classifyOpenAIFailure(withStatus("nope", 401)).kind).toBe("authentication");
    expect(classifyOpenAIFailure(withStatus("nope", 403)).kind).toBe("authentication");
    expect(classifyOpenAIFailure(withStatus("slow", 408)).kind).toBe("timeout");
    expect(classifyOpenAIFailure(withStatus("slow", 504)).kind).toBe("timeout");
    expect(classifyOpenAIFailure(withStatus("boom", 502))).toMatchObject({
      kind: "server",
      message: "Server error: boom",
      status: 502,
    });
    expect(classifyOpenAIFailure(withStatus("bad", 422))).toMatchObject({
      kind: "client",
      message: "Client error: bad",
    });
  });

  test("reads Retry-After seconds on rate limits", () => {
    expect(classifyOpenAIFailure(withStatus("slow down", 429, { "retry-after": "7" }))).toMatchObject({
      kind: "rate_limit",
      retryAfterMs: 7000,
    });
    expect(classifyOpenAIFailure(withStatus("slow down", 429)).retryAfterMs).toBeUndefined();
    expect(classifyOpenAIFailure(withStatus("slow down", 429, { "retry-after": "soon" })).retryAfterMs).toBeUndefined();
  });

  test("classifies status-less failures by name and message", () => {
    expect(classifyOpenAIFailure(named("APIConnectionTimeoutError", "Request timed out.")).kind).toBe("timeout");
    expect(classifyOpenAIFailure(new Error("connect ETIMEDOUT 10.0.0.1:443")).kind).toBe("timeout");
    expect(classifyOpenAIFailure(named("APIConnectionError", "Connection error.")).kind).toBe("network");
    expect(classifyOpenAIFailure(new Error("getaddrinfo ENOTFOUND api.example.test")).kind).toBe("network");
    expect(classifyOpenAIFailure(new Error("something odd"))).toMatchObject({
      kind: "unknown",
      message: "something odd",
    });
  });

  test("wraps non-Error values", () => {
    const failure = classifyOpenAIFailure("plain failure");

    expect(failure.cause).toBeInstanceOf(Error);
    expect(failure.message).toBe("plain failure");
  });
});
