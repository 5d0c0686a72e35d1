/**
 * Classification of failures raised by the OpenAI SDK (and OpenAI-compatible
 * endpoints such as Groq) into provider-neutral kinds.
 */

export type OpenAIFailureKind =
  | "authentication"
  | "rate_limit"
  | "timeout"
  | "network"
  | "server"
  | "client"
  | "unknown";

export interface OpenAIFailure {
  kind: OpenAIFailureKind;
  message: string;
  status?: number;
  retryAfterMs?: number;
  cause: Error;
}

function readStatus(error: Error): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

/**
 * Retry-After in milliseconds from an SDK error's response headers
 */
function readRetryAfter(error: Error): number | undefined {
  if (!("headers" in error) || typeof error.headers !== "object" || error.headers === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error.headers, "retry-after");
  if (typeof value !== "string") {
    return undefined;
  }
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds * 1000;
}

export function classifyOpenAIFailure(error: unknown): OpenAIFailure {
  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || "Unknown error";
  const status = readStatus(cause);

  if (status !== undefined) {
    if (status === 401 || status === 403) {
      return { kind: "authentication", message: "Invalid API key or insufficient permissions", status, cause };
    }
    if (status === 429) {
      return { kind: "rate_limit", message: "Rate limit exceeded", status, retryAfterMs: readRetryAfter(cause), cause };
    }
    if (status === 408 || status === 504) {
      return { kind: "timeout", message: "Request timeout", status, cause };
    }
    if (status >= 500) {
      return { kind: "server", message: `Server error: ${message}`, status, cause };
    }
    return { kind: "client", message: `Client error: ${message}`, status, cause };
  }

  const lower = message.toLowerCase();
  if (cause.name === "APIConnectionTimeoutError" || lower.includes("timed out") || lower.includes("etimedout")) {
    return { kind: "timeout", message: "Request timeout", cause };
  }
  if (
    cause.name === "APIConnectionError" ||
    lower.includes("econnrefused") ||
    lower.includes("enotfound") ||
    lower.includes("econnreset")
  ) {
    return { kind: "network", message: "Connection failed", cause };
  }

  return { kind: "unknown", message, cause };
}
