/**
 * Embedding provider factory
 */

import type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";
import { OpenAIEmbeddingProvider } from "./openai-embedding.js";
import { OllamaEmbeddingProvider } from "./ollama-embedding.js";
import { EmbeddingValidationError } from "./errors.js";

export interface EmbeddingCredentials {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  ollamaBaseUrl?: string;
}

/**
 * Create the provider named by `config.provider`
 *
 * @throws {EmbeddingValidationError} If the provider's credentials are missing
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(
 *   { provider: "openai", model: "text-embedding-3-small", dimensions: 1536, batchSize: 100, maxRetries: 3, timeoutMs: 30000 },
 *   { openaiApiKey: config.openaiApiKey }
 * );
 * ```
 */
export function createEmbeddingProvider(
  config: EmbeddingProviderConfig,
  credentials: EmbeddingCredentials
): EmbeddingProvider {
  switch (config.provider) {
    case "openai": {
      if (!credentials.openaiApiKey) {
        throw new EmbeddingValidationError(
          "OPENAI_API_KEY environment variable is required for OpenAI provider",
          "apiKey"
        );
      }
      return new OpenAIEmbeddingProvider({
        ...config,
        apiKey: credentials.openaiApiKey,
        baseURL: credentials.openaiBaseUrl,
      });
    }

    case "ollama":
      return new OllamaEmbeddingProvider({ ...config, baseUrl: credentials.ollamaBaseUrl });
  }
}
