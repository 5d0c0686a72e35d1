/**
 * Language model contracts
 */

export type LanguageModelProviderId = "openai" | "groq";

/**
 * A prompt as a system instruction plus user content
 */
export interface ChatPrompt {
  system?: string;
  user: string;
}

export interface GenerateOptions {
  /** Overrides the model's default request timeout */
  timeoutMs?: number;
  maxTokens?: number;
}

/**
 * Single synchronous completion, no streaming
 */
export interface LanguageModel {
  readonly providerId: string;
  readonly modelId: string;

  /**
   * @throws {LanguageModelError} on provider failure after retries
   */
  generate(prompt: string | ChatPrompt, options?: GenerateOptions): Promise<string>;

  /**
   * Never throws; false on any failure
   */
  healthCheck(): Promise<boolean>;
}

export interface LanguageModelConfig {
  provider: LanguageModelProviderId;
  model: string;
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
  /** @default 0 */
  temperature?: number;
  /** @default 1024 */
  maxTokens?: number;
  baseURL?: string;
}
