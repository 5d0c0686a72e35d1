/**
 * @module query
 *
 * The question-answering pipeline.
 */

export * from "./types.js";
export * from "./errors.js";
export { SchemaCache, type InvalidationListener } from "./schema-cache.js";
export { validateCypher, type CypherValidation, type CypherReferences } from "./cypher-validator.js";
export {
  NO_QUERY,
  DEFAULT_MAX_HINT_CHARS,
  sanitizeHint,
  formatHintBlock,
  buildQueryGenerationPrompt,
  buildSynthesisPrompt,
  extractCypher,
} from "./prompts.js";
export { StructuredQueryResolver, type ResolverOptions } from "./structured-query-resolver.js";
export {
  SemanticRetriever,
  DEFAULT_SEMANTIC_INDEXES,
  DEFAULT_COLLECTION,
  vectorCollectionName,
  buildPassageText,
  type SemanticIndexDefinition,
  type SemanticRetrieverOptions,
} from "./semantic-retriever.js";
export { AnswerSynthesizer, summarizeStructuredResult, NO_DATA_FOUND, type SynthesisOutcome } from "./answer-synthesizer.js";
export { joinRetrievals, settle, type Settled, type JoinedRetrieval } from "./retrieval-join.js";
export {
  QueryOrchestrator,
  type OrchestratorOptions,
  type OrchestratorDependencies,
} from "./query-orchestrator.js";
