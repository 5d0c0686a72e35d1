/**
 * Ollama embedding provider
 *
 * Talks to a local Ollama server over HTTP. Each text is one request; the
 * model stays loaded between calls through `keep_alive`.
 */

import { z } from "zod";
import type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";
import {
  EmbeddingError,
  EmbeddingValidationError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
} from "./errors.js";
import { validateEmbeddingInputs, validateProviderConfig } from "./validation.js";
import { withRetry, toError } from "../utils/retry.js";

export interface OllamaProviderConfig extends EmbeddingProviderConfig {
  /** @default "http://localhost:11434" */
  baseUrl?: string;
  /** @default "5m" */
  keepAlive?: string;
}

const embeddingResponse = z.object({ embedding: z.array(z.number()).min(1) });
const tagsResponse = z.object({ models: z.array(z.object({ name: z.string() })) });

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly providerId = "ollama";
  readonly modelId: string;
  readonly dimensions: number;

  private readonly baseUrl: string;
  private readonly keepAlive: string;
  private readonly config: OllamaProviderConfig;

  constructor(config: OllamaProviderConfig) {
    if (!config.model || config.model.trim().length === 0) {
      throw new EmbeddingValidationError("Model name is required", "model");
    }
    validateProviderConfig(config, Number.MAX_SAFE_INTEGER);

    this.baseUrl = config.baseUrl ?? "http://localhost:11434";
    let parsed: URL;
    try {
      parsed = new URL(this.baseUrl);
    } catch (error) {
      throw new EmbeddingValidationError(`Invalid base URL: ${this.baseUrl}`, "baseUrl", toError(error));
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new EmbeddingValidationError(`Invalid base URL scheme: ${parsed.protocol}`, "baseUrl");
    }

    this.config = config;
    this.modelId = config.model;
    this.dimensions = config.dimensions;
    this.keepAlive = config.keepAlive ?? "5m";
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text]);
    if (embedding === undefined) {
      throw new EmbeddingError("Unexpected empty embedding result", "EMPTY_RESULT");
    }
    return embedding;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    validateEmbeddingInputs(texts);

    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(
        await withRetry(() => this.embedOne(text), {
          maxRetries: this.config.maxRetries,
          shouldRetry: (error) => error instanceof EmbeddingError && error.retryable,
          calculateBackoff: (attempt) => Math.pow(2, attempt) * 100,
        })
      );
    }
    return embeddings;
  }

  /**
   * True when the server answers and has the configured model pulled
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchWithTimeout(`${this.baseUrl}/api/tags`, { method: "GET" });
      if (!response.ok) {
        return false;
      }
      const tags = tagsResponse.safeParse(await response.json());
      return (
        tags.success &&
        tags.data.models.some((m) => m.name === this.modelId || m.name.startsWith(`${this.modelId}:`))
      );
    } catch {
      return false;
    }
  }

  private async embedOne(text: string): Promise<number[]> {
    let response: Response;
    try {
      response = await this.fetchWithTimeout(`${this.baseUrl}/api/embeddings`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.modelId, prompt: text, keep_alive: this.keepAlive }),
      });
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      throw new EmbeddingNetworkError(
        `Failed to connect to Ollama server at ${this.baseUrl}: ${toError(error).message}`,
        toError(error)
      );
    }

    if (!response.ok) {
      throw new EmbeddingError(
        `Ollama API error: ${response.status} ${response.statusText}`,
        "API_ERROR",
        response.status === 429 || response.status >= 500
      );
    }

    const parsed = embeddingResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError("Invalid response from Ollama: missing embedding array", "INVALID_RESPONSE");
    }
    return parsed.data.embedding;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new EmbeddingTimeoutError(`Request to Ollama timed out after ${this.config.timeoutMs}ms`, error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
