/**
 * Knowledge graph question answering
 *
 * Library entry point. Answers natural-language questions from a Neo4j
 * graph, enriched with passages from a ChromaDB vector index, and ingests
 * documents into the same graph.
 *
 * @example
 * ```typescript
 * import { loadAppConfig, initializeLogger, createKnowledgeBase } from "knowledge-graph-qa";
 *
 * const config = loadAppConfig();
 * initializeLogger(config.logging);
 * const kb = createKnowledgeBase(config);
 * await kb.connect();
 * const answer = await kb.orchestrator.process("Which employees work in Engineering?");
 * await kb.close();
 * ```
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./utils/index.js";
export * from "./graph/index.js";
export * from "./llm/index.js";
export * from "./providers/index.js";
export * from "./storage/index.js";
export * from "./query/index.js";
export * from "./ingestion/index.js";
export { createKnowledgeBase, type KnowledgeBase, type KnowledgeBaseOverrides } from "./knowledge-base.js";
