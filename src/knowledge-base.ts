/**
 * Service container
 *
 * Builds every component from one {@link AppConfig} in dependency order and
 * owns their connections. The CLI and library callers go through this
 * instead of wiring components by hand.
 *
 * @module knowledge-base
 */

import type pino from "pino";
import type { AppConfig } from "./config/app-config.js";
import type { GraphStore } from "./graph/types.js";
import { Neo4jGraphStore } from "./graph/neo4j-graph-store.js";
import { CompanyDirectory } from "./graph/company-directory.js";
import { DEFAULT_INTROSPECTION_OPTIONS } from "./graph/schema/types.js";
import type { LanguageModel } from "./llm/types.js";
import { createLanguageModel } from "./llm/factory.js";
import type { EmbeddingProvider } from "./providers/types.js";
import { createEmbeddingProvider } from "./providers/factory.js";
import type { VectorIndex } from "./storage/types.js";
import { ChromaVectorIndex } from "./storage/chroma-client.js";
import { SchemaCache } from "./query/schema-cache.js";
import { SemanticRetriever } from "./query/semantic-retriever.js";
import { QueryOrchestrator } from "./query/query-orchestrator.js";
import { DocumentIngestionService } from "./ingestion/document-ingestion-service.js";
import { getComponentLogger } from "./logging/index.js";
import { toError } from "./utils/retry.js";

/**
 * Replacements for the externally backed components, mainly for tests
 */
export interface KnowledgeBaseOverrides {
  store?: GraphStore;
  llm?: LanguageModel;
  embeddings?: EmbeddingProvider;
  vectorIndex?: VectorIndex;
}

export interface KnowledgeBase {
  readonly config: AppConfig;
  readonly store: GraphStore;
  readonly llm: LanguageModel;
  readonly embeddings: EmbeddingProvider;
  readonly vectorIndex: VectorIndex;
  readonly schemaCache: SchemaCache;
  readonly retriever: SemanticRetriever;
  readonly orchestrator: QueryOrchestrator;
  readonly ingestion: DocumentIngestionService;
  readonly directory: CompanyDirectory;
  /**
   * Connect the graph store, then the vector index. A vector index that
   * cannot be reached only degrades semantic retrieval.
   *
   * @throws {GraphConnectionError} when Neo4j is unreachable
   */
  connect(): Promise<void>;
  close(): Promise<void>;
}

let logger: pino.Logger | null = null;

function getLogger(): pino.Logger {
  if (logger === null) {
    logger = getComponentLogger("knowledge-base");
  }
  return logger;
}

export function createKnowledgeBase(config: AppConfig, overrides: KnowledgeBaseOverrides = {}): KnowledgeBase {
  const store = overrides.store ?? new Neo4jGraphStore(config.neo4j);
  const llm = overrides.llm ?? createLanguageModel(config.llm);
  const embeddings = overrides.embeddings ?? createEmbeddingProvider(config.embedding, config.embeddingCredentials);
  const vectorIndex = overrides.vectorIndex ?? new ChromaVectorIndex(config.chroma);

  const schemaCache = new SchemaCache(store, {
    ...DEFAULT_INTROSPECTION_OPTIONS,
    enumLimit: config.query.schemaEnumLimit,
  });
  const retriever = new SemanticRetriever(vectorIndex, embeddings, store, {
    similarityThreshold: config.semantic.similarityThreshold,
  });
  const orchestrator = new QueryOrchestrator(
    { store, schemaCache, llm, retriever },
    {
      queryTimeoutMs: config.query.timeoutMs,
      maxRows: config.query.maxRows,
      semanticTopK: config.semantic.topK,
      semanticTimeoutMs: config.semantic.timeoutMs,
      useHints: config.semantic.useHints,
      synthesisTimeoutMs: config.llm.timeoutMs,
    }
  );
  const ingestion = new DocumentIngestionService(store, llm, schemaCache);
  const directory = new CompanyDirectory(store, { timeoutMs: config.query.timeoutMs });

  return {
    config,
    store,
    llm,
    embeddings,
    vectorIndex,
    schemaCache,
    retriever,
    orchestrator,
    ingestion,
    directory,

    async connect(): Promise<void> {
      await store.connect();
      try {
        await vectorIndex.connect();
      } catch (error) {
        getLogger().warn({ err: toError(error) }, "Vector index unavailable; answers will use structured data only");
      }
    },

    async close(): Promise<void> {
      orchestrator.dispose();
      await store.disconnect();
    },
  };
}
