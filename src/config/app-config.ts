/**
 * Application configuration
 *
 * Reads the process environment once, validates it with zod and returns a
 * typed configuration tree. Every failing key is reported together.
 *
 * @module config/app-config
 */

import { z } from "zod";
import type { LogLevel } from "../logging/types.js";
import type { Neo4jConfig } from "../graph/types.js";
import type { LanguageModelConfig } from "../llm/types.js";
import type { EmbeddingProviderConfig } from "../providers/types.js";
import type { EmbeddingCredentials } from "../providers/factory.js";
import type { RetryConfig } from "../utils/retry.js";
import type { ChromaConfig } from "../storage/types.js";

export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION_ERROR";
  public readonly retryable = false;
  /** `KEY: problem` for every invalid variable */
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export interface QueryConfig {
  timeoutMs: number;
  maxRows: number;
  schemaEnumLimit: number;
}

export interface SemanticConfig {
  topK: number;
  timeoutMs: number;
  similarityThreshold: number;
  useHints: boolean;
}

export interface AppConfig {
  neo4j: Neo4jConfig;
  chroma: ChromaConfig;
  llm: LanguageModelConfig;
  embedding: EmbeddingProviderConfig;
  embeddingCredentials: EmbeddingCredentials;
  query: QueryConfig;
  semantic: SemanticConfig;
  logging: { level: LogLevel; format: "json" | "pretty" };
  retry: RetryConfig;
}

/** Empty strings count as unset so `.env` placeholders fall back to defaults */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

function intVar(defaultValue: number, min: number) {
  return optionalString.pipe(z.coerce.number().int().min(min).optional()).transform((v) => v ?? defaultValue);
}

function floatVar(defaultValue: number, min: number, max?: number) {
  const base = z.coerce.number().min(min);
  return optionalString
    .pipe((max === undefined ? base : base.max(max)).optional())
    .transform((v) => v ?? defaultValue);
}

const booleanVar = (defaultValue: boolean) =>
  optionalString
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]).optional())
    .transform((v) => (v === undefined ? defaultValue : v === "true" || v === "1" || v === "yes"));

const EnvSchema = z.object({
  NEO4J_HOST: optionalString.transform((v) => v ?? "localhost"),
  NEO4J_BOLT_PORT: intVar(7687, 1),
  NEO4J_USER: optionalString.transform((v) => v ?? "neo4j"),
  NEO4J_PASSWORD: optionalString,
  NEO4J_DATABASE: optionalString,

  CHROMADB_HOST: optionalString.transform((v) => v ?? "localhost"),
  CHROMADB_PORT: intVar(8000, 1),

  LLM_PROVIDER: optionalString.pipe(z.enum(["openai", "groq"]).optional()).transform((v) => v ?? "openai"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString.transform((v) => v ?? "gpt-4o-mini"),
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: optionalString.transform((v) => v ?? "llama-3.3-70b-versatile"),
  LLM_TIMEOUT_MS: intVar(60000, 1),

  EMBEDDING_PROVIDER: optionalString
    .pipe(z.enum(["openai", "ollama"]).optional())
    .transform((v) => v ?? "openai"),
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_DIMENSIONS: intVar(1536, 1),
  EMBEDDING_BATCH_SIZE: intVar(100, 1),
  OLLAMA_BASE_URL: optionalString.pipe(z.string().url().optional()),

  QUERY_TIMEOUT_MS: intVar(30000, 1),
  QUERY_MAX_ROWS: intVar(100, 1),
  SEMANTIC_TOP_K: intVar(3, 0),
  SEMANTIC_TIMEOUT_MS: intVar(10000, 1),
  SIMILARITY_THRESHOLD: floatVar(0, 0, 1),
  USE_SEMANTIC_HINTS: booleanVar(true),
  SCHEMA_ENUM_LIMIT: intVar(10, 0),

  LOG_LEVEL: optionalString
    .pipe(z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional())
    .transform((v) => v ?? "info"),
  LOG_FORMAT: optionalString.pipe(z.enum(["json", "pretty"]).optional()).transform((v) => v ?? "json"),

  MAX_RETRIES: intVar(3, 0),
  RETRY_INITIAL_DELAY_MS: intVar(1000, 0),
  RETRY_MAX_DELAY_MS: intVar(60000, 0),
  RETRY_BACKOFF_MULTIPLIER: floatVar(2, 1),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

const DEFAULT_EMBEDDING_MODELS = {
  openai: "text-embedding-3-small",
  ollama: "nomic-embed-text",
} as const;

function credentialIssues(env: ParsedEnv): string[] {
  const issues: string[] = [];
  if (env.LLM_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
    issues.push("OPENAI_API_KEY: required when LLM_PROVIDER=openai");
  }
  if (env.LLM_PROVIDER === "groq" && !env.GROQ_API_KEY) {
    issues.push("GROQ_API_KEY: required when LLM_PROVIDER=groq");
  }
  if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY && env.LLM_PROVIDER !== "openai") {
    issues.push("OPENAI_API_KEY: required when EMBEDDING_PROVIDER=openai");
  }
  if (!env.NEO4J_PASSWORD) {
    issues.push("NEO4J_PASSWORD: required");
  }
  return issues;
}

/**
 * Load and validate configuration from environment variables
 *
 * @throws {ConfigurationError} listing every invalid or missing variable
 *
 * @example
 * ```typescript
 * import "dotenv/config";
 * const config = loadAppConfig();
 * const store = new Neo4jGraphStore(config.neo4j);
 * ```
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const values = parsed.data;

  const missing = credentialIssues(values);
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  const retry: RetryConfig = {
    maxRetries: values.MAX_RETRIES,
    initialDelayMs: values.RETRY_INITIAL_DELAY_MS,
    maxDelayMs: values.RETRY_MAX_DELAY_MS,
    backoffMultiplier: values.RETRY_BACKOFF_MULTIPLIER,
  };

  const llmApiKey = values.LLM_PROVIDER === "groq" ? values.GROQ_API_KEY : values.OPENAI_API_KEY;

  return {
    neo4j: {
      host: values.NEO4J_HOST,
      port: values.NEO4J_BOLT_PORT,
      username: values.NEO4J_USER,
      password: values.NEO4J_PASSWORD ?? "",
      database: values.NEO4J_DATABASE,
      retry,
    },
    chroma: { host: values.CHROMADB_HOST, port: values.CHROMADB_PORT },
    llm: {
      provider: values.LLM_PROVIDER,
      model: values.LLM_PROVIDER === "groq" ? values.GROQ_MODEL : values.OPENAI_MODEL,
      apiKey: llmApiKey ?? "",
      timeoutMs: values.LLM_TIMEOUT_MS,
      maxRetries: values.MAX_RETRIES,
      baseURL: values.LLM_PROVIDER === "openai" ? values.OPENAI_BASE_URL : undefined,
    },
    embedding: {
      provider: values.EMBEDDING_PROVIDER,
      model: values.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODELS[values.EMBEDDING_PROVIDER],
      dimensions: values.EMBEDDING_DIMENSIONS,
      batchSize: values.EMBEDDING_BATCH_SIZE,
      maxRetries: values.MAX_RETRIES,
      timeoutMs: values.LLM_TIMEOUT_MS,
    },
    embeddingCredentials: {
      openaiApiKey: values.OPENAI_API_KEY,
      openaiBaseUrl: values.OPENAI_BASE_URL,
      ollamaBaseUrl: values.OLLAMA_BASE_URL,
    },
    query: {
      timeoutMs: values.QUERY_TIMEOUT_MS,
      maxRows: values.QUERY_MAX_ROWS,
      schemaEnumLimit: values.SCHEMA_ENUM_LIMIT,
    },
    semantic: {
      topK: values.SEMANTIC_TOP_K,
      timeoutMs: values.SEMANTIC_TIMEOUT_MS,
      similarityThreshold: values.SIMILARITY_THRESHOLD,
      useHints: values.USE_SEMANTIC_HINTS,
    },
    logging: { level: values.LOG_LEVEL, format: values.LOG_FORMAT },
    retry,
  };
}
