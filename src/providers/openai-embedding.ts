/**
 * OpenAI embedding provider
 *
 * Batches inputs, retries transient failures with exponential backoff and
 * honours Retry-After on rate limits.
 */

import OpenAI from "openai";
import type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";
import {
  EmbeddingError,
  EmbeddingAuthenticationError,
  EmbeddingRateLimitError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
  EmbeddingValidationError,
} from "./errors.js";
import { classifyOpenAIFailure } from "./openai-errors.js";
import { toBatches, validateEmbeddingInputs, validateProviderConfig } from "./validation.js";
import { withRetry, defaultExponentialBackoff } from "../utils/retry.js";

export interface OpenAIProviderConfig extends EmbeddingProviderConfig {
  apiKey: string;
  /** Proxy or compatible endpoint */
  baseURL?: string;
}

/**
 * The slice of the SDK this provider calls
 */
export interface EmbeddingsApi {
  create(params: { model: string; input: string[]; dimensions?: number }): Promise<{
    data: Array<{ index: number; embedding: number[] }>;
  }>;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly providerId = "openai";
  readonly modelId: string;
  readonly dimensions: number;

  private readonly api: EmbeddingsApi;
  private readonly config: OpenAIProviderConfig;

  /**
   * @throws {EmbeddingValidationError} If configuration is invalid
   */
  constructor(config: OpenAIProviderConfig, api?: EmbeddingsApi) {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new EmbeddingValidationError("API key is required", "apiKey");
    }
    if (!config.apiKey.startsWith("sk-")) {
      throw new EmbeddingValidationError("Invalid OpenAI API key format (must start with 'sk-')", "apiKey");
    }
    validateProviderConfig(config, 2048);

    this.config = config;
    this.modelId = config.model;
    this.dimensions = config.dimensions;

    if (api) {
      this.api = api;
    } else {
      // Retries are handled here, not by the SDK
      const client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
      this.api = { create: (params) => client.embeddings.create(params) };
    }
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

    const all: number[][] = [];
    // Sequential batches keep ordering and stay under rate limits
    for (const batch of toBatches(texts, this.config.batchSize)) {
      const embeddings = await withRetry(() => this.processBatch(batch), {
        maxRetries: this.config.maxRetries,
        shouldRetry: (error) => error instanceof EmbeddingError && error.retryable,
        calculateBackoff: (attempt, error) =>
          error instanceof EmbeddingRateLimitError && error.retryAfterMs
            ? error.retryAfterMs
            : defaultExponentialBackoff(attempt),
      });
      all.push(...embeddings);
    }
    return all;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbedding("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async processBatch(batch: string[]): Promise<number[][]> {
    try {
      const response = await this.api.create({
        model: this.modelId,
        input: batch,
        dimensions: this.dimensions,
      });

      const embeddings = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Expected ${batch.length} embeddings, got ${embeddings.length}`,
          "RESPONSE_MISMATCH"
        );
      }
      return embeddings;
    } catch (error) {
      throw this.toEmbeddingError(error);
    }
  }

  private toEmbeddingError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }
    const failure = classifyOpenAIFailure(error);
    switch (failure.kind) {
      case "authentication":
        return new EmbeddingAuthenticationError(failure.message, failure.cause);
      case "rate_limit":
        return new EmbeddingRateLimitError(failure.message, failure.retryAfterMs, failure.cause);
      case "timeout":
        return new EmbeddingTimeoutError(failure.message, failure.cause);
      case "network":
      case "server":
        return new EmbeddingNetworkError(failure.message, failure.cause);
      case "client":
        return new EmbeddingValidationError(failure.message, undefined, failure.cause);
      case "unknown":
        return new EmbeddingError(failure.message, "UNKNOWN_ERROR", false, failure.cause);
    }
  }
}
