/**
 * Unit tests for OllamaEmbeddingProvider with a stubbed global fetch
 */

import { describe, test, expect, afterEach, vi } from "vitest";
import { OllamaEmbeddingProvider, type OllamaProviderConfig } from "../../../src/providers/ollama-embedding.js";
import { EmbeddingNetworkError, EmbeddingValidationError } from "../../../src/providers/errors.js";

const CONFIG: OllamaProviderConfig = {
  provider: "ollama",
  model: "nomic-embed-text",
  dimensions: 3,
  batchSize: 32,
  maxRetries: 1,
  timeoutMs: 30000,
  baseUrl: "http://localhost:11434",
};

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaEmbeddingProvider", () => {
  test("validates the model and base URL", () => {
    expect(() => new OllamaEmbeddingProvider({ ...CONFIG, model: "" })).toThrow("Model name is required");
    expect(() => new OllamaEmbeddingProvider({ ...CONFIG, baseUrl: "ftp://models" })).toThrow(
      "Invalid base URL scheme: ftp:"
    );
    expect(() => new OllamaEmbeddingProvider({ ...CONFIG, baseUrl: "not a url" })).toThrow(EmbeddingValidationError);
  });

  test("sends one request per text with keep_alive", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    vi.stubGlobal("fetch", fetchMock);
    const provider = new OllamaEmbeddingProvider(CONFIG);

    const embeddings = await provider.generateEmbeddings(["first", "second"]);

    expect(embeddings).toEqual([
      [0.1, 0.2, 0.3],
      [0.1, 0.2, 0.3],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:11434/api/embeddings");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "nomic-embed-text", prompt: "first", keep_alive: "5m" });
  });

  test("retries server errors and fails on a malformed body", async () => {
    const fetchMock = vi
      .fn(async () => jsonResponse({ embedding: [] }))
      .mockResolvedValueOnce(jsonResponse({ error: "loading" }, 503, "Service Unavailable"));
    vi.stubGlobal("fetch", fetchMock);
    const provider = new OllamaEmbeddingProvider(CONFIG);

    await expect(provider.generateEmbedding("text")).rejects.toMatchObject({
      code: "INVALID_RESPONSE",
      message: "Invalid response from Ollama: missing embedding array",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test("does not retry client errors", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ error: "bad" }, 400, "Bad Request"));
    vi.stubGlobal("fetch", fetchMock);
    const provider = new OllamaEmbeddingProvider(CONFIG);

    await expect(provider.generateEmbedding("text")).rejects.toThrow("Ollama API error: 400 Bad Request");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("wraps connection failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    const provider = new OllamaEmbeddingProvider({ ...CONFIG, maxRetries: 0 });

    const error = await provider.generateEmbedding("text").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingNetworkError);
    expect(error instanceof Error && error.message).toBe(
      "Failed to connect to Ollama server at http://localhost:11434: fetch failed"
    );
  });

  test("health check looks for the model among pulled tags", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ models: [{ name: "nomic-embed-text:latest" }] }))
    );
    const provider = new OllamaEmbeddingProvider(CONFIG);

    await expect(provider.healthCheck()).resolves.toBe(true);
    await expect(new OllamaEmbeddingProvider({ ...CONFIG, model: "mxbai-embed-large" }).healthCheck()).resolves.toBe(
      false
    );
  });
});
