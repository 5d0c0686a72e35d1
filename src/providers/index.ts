/**
 * Embedding provider module exports
 */

export type { EmbeddingProvider, EmbeddingProviderConfig, EmbeddingProviderId } from "./types.js";

export {
  EmbeddingError,
  EmbeddingAuthenticationError,
  EmbeddingRateLimitError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
  EmbeddingValidationError,
} from "./errors.js";

export { classifyOpenAIFailure, type OpenAIFailure, type OpenAIFailureKind } from "./openai-errors.js";
export { OpenAIEmbeddingProvider, type OpenAIProviderConfig, type EmbeddingsApi } from "./openai-embedding.js";
export { OllamaEmbeddingProvider, type OllamaProviderConfig } from "./ollama-embedding.js";
export { createEmbeddingProvider, type EmbeddingCredentials } from "./factory.js";
