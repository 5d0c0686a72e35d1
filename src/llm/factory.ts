import type { LanguageModel, LanguageModelConfig } from "./types.js";
import { OpenAIChatModel, type ChatCompletionTransport } from "./openai-chat-model.js";

/**
 * Build the configured language model. Both providers speak the OpenAI
 * chat-completions protocol.
 */
export function createLanguageModel(
  config: LanguageModelConfig,
  transport?: ChatCompletionTransport
): LanguageModel {
  switch (config.provider) {
    case "openai":
    case "groq":
      return new OpenAIChatModel(config, transport);
  }
}
