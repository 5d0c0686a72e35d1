/**
 * Embedding provider contracts
 */

export type EmbeddingProviderId = "openai" | "ollama";

export interface EmbeddingProviderConfig {
  provider: EmbeddingProviderId;
  model: string;
  dimensions: number;
  /** Texts per request */
  batchSize: number;
  maxRetries: number;
  timeoutMs: number;
}

/**
 * Turns text into vectors
 */
export interface EmbeddingProvider {
  readonly providerId: string;
  readonly modelId: string;
  readonly dimensions: number;

  generateEmbedding(text: string): Promise<number[]>;

  /**
   * Embed many texts; results keep input order
   */
  generateEmbeddings(texts: string[]): Promise<number[][]>;

  /**
   * Never throws; false on any failure
   */
  healthCheck(): Promise<boolean>;
}
