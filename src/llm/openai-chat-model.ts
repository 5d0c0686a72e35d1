/**
 * Chat-completions language model over the OpenAI SDK
 *
 * Serves both OpenAI and Groq; Groq exposes an OpenAI-compatible endpoint.
 */

import OpenAI from "openai";
import type pino from "pino";
import type { ChatPrompt, GenerateOptions, LanguageModel, LanguageModelConfig } from "./types.js";
import {
  LanguageModelError,
  LanguageModelAuthenticationError,
  LanguageModelNetworkError,
  LanguageModelRateLimitError,
  LanguageModelResponseError,
  LanguageModelTimeoutError,
  isRetryableLanguageModelError,
} from "./errors.js";
import { classifyOpenAIFailure } from "../providers/openai-errors.js";
import { getComponentLogger } from "../logging/index.js";
import { withRetry, defaultExponentialBackoff, createRetryLogger } from "../utils/retry.js";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

/**
 * The slice of the SDK this model calls; returns the first choice's content
 */
export type ChatCompletionTransport = (
  request: ChatCompletionRequest,
  options: { timeoutMs: number }
) => Promise<string | null>;

function createSdkTransport(config: LanguageModelConfig): ChatCompletionTransport {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? (config.provider === "groq" ? GROQ_BASE_URL : undefined),
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
  return async (request, options) => {
    const response = await client.chat.completions.create(request, { timeout: options.timeoutMs });
    return response.choices[0]?.message?.content ?? null;
  };
}

export class OpenAIChatModel implements LanguageModel {
  readonly providerId: string;
  readonly modelId: string;

  private readonly transport: ChatCompletionTransport;
  private readonly config: LanguageModelConfig;
  private _logger: pino.Logger | null = null;

  constructor(config: LanguageModelConfig, transport?: ChatCompletionTransport) {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new LanguageModelError(`API key is required for provider '${config.provider}'`, "CONFIGURATION_ERROR");
    }
    this.config = config;
    this.providerId = config.provider;
    this.modelId = config.model;
    this.transport = transport ?? createSdkTransport(config);
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("llm:chat");
    }
    return this._logger;
  }

  async generate(prompt: string | ChatPrompt, options: GenerateOptions = {}): Promise<string> {
    const messages: ChatMessage[] =
      typeof prompt === "string"
        ? [{ role: "user", content: prompt }]
        : [
            ...(prompt.system !== undefined ? [{ role: "system" as const, content: prompt.system }] : []),
            { role: "user" as const, content: prompt.user },
          ];

    const request: ChatCompletionRequest = {
      model: this.modelId,
      messages,
      temperature: this.config.temperature ?? 0,
      max_tokens: options.maxTokens ?? this.config.maxTokens ?? 1024,
    };
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const startTime = Date.now();

    const content = await withRetry(() => this.complete(request, timeoutMs), {
      maxRetries: this.config.maxRetries,
      shouldRetry: isRetryableLanguageModelError,
      calculateBackoff: (attempt, error) =>
        error instanceof LanguageModelRateLimitError && error.retryAfterMs
          ? error.retryAfterMs
          : defaultExponentialBackoff(attempt),
      onRetry: createRetryLogger(this.logger, "chat completion", this.config.maxRetries),
    });

    this.logger.debug(
      { metric: "llm.completion_ms", value: Date.now() - startTime, model: this.modelId, chars: content.length },
      "Completion received"
    );
    return content;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generate("Reply with OK.", { maxTokens: 5 });
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "Language model health check failed");
      return false;
    }
  }

  private async complete(request: ChatCompletionRequest, timeoutMs: number): Promise<string> {
    let content: string | null;
    try {
      content = await this.transport(request, { timeoutMs });
    } catch (error) {
      throw this.toLanguageModelError(error);
    }
    if (content === null) {
      throw new LanguageModelResponseError("Completion contained no message content");
    }
    return content;
  }

  private toLanguageModelError(error: unknown): LanguageModelError {
    if (error instanceof LanguageModelError) {
      return error;
    }
    const failure = classifyOpenAIFailure(error);
    switch (failure.kind) {
      case "authentication":
        return new LanguageModelAuthenticationError(failure.message, failure.cause);
      case "rate_limit":
        return new LanguageModelRateLimitError(failure.message, failure.retryAfterMs, failure.cause);
      case "timeout":
        return new LanguageModelTimeoutError(failure.message, failure.cause);
      case "network":
      case "server":
        return new LanguageModelNetworkError(failure.message, failure.cause);
      case "client":
        return new LanguageModelResponseError(failure.message, failure.cause);
      case "unknown":
        return new LanguageModelError(failure.message, "UNKNOWN_ERROR", false, failure.cause);
    }
  }
}
