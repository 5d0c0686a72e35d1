export type {
  ChatPrompt,
  GenerateOptions,
  LanguageModel,
  LanguageModelConfig,
  LanguageModelProviderId,
} from "./types.js";
export {
  LanguageModelError,
  LanguageModelAuthenticationError,
  LanguageModelRateLimitError,
  LanguageModelTimeoutError,
  LanguageModelNetworkError,
  LanguageModelResponseError,
  isRetryableLanguageModelError,
} from "./errors.js";
export {
  OpenAIChatModel,
  GROQ_BASE_URL,
  type ChatCompletionTransport,
  type ChatCompletionRequest,
  type ChatMessage,
} from "./openai-chat-model.js";
export {
  parseStructuredOutput,
  extractJsonCandidate,
  type StructuredOutputFailure,
} from "./structured-output.js";
export { createLanguageModel } from "./factory.js";
