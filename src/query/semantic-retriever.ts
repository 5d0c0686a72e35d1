/**
 * @module query/semantic-retriever
 *
 * Top-k passage search over embeddings of graph-attached text, and the
 * maintenance operation that rebuilds a collection from current graph
 * contents.
 */

import type pino from "pino";
import type { GraphStore } from "../graph/types.js";
import { quoteIdentifier } from "../graph/schema/introspection.js";
import type { EmbeddingProvider } from "../providers/types.js";
import { EmbeddingError } from "../providers/errors.js";
import type { VectorEntry, VectorIndex } from "../storage/types.js";
import { StorageError } from "../storage/errors.js";
import { SemanticRetrievalError } from "./errors.js";
import type { IndexRebuildResult, RetrievedPassage } from "./types.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";

/**
 * Which nodes feed a collection and which of their properties become text
 */
export interface SemanticIndexDefinition {
  collection: string;
  label: string;
  textProperties: readonly string[];
}

export const DEFAULT_SEMANTIC_INDEXES: readonly SemanticIndexDefinition[] = [
  { collection: "documents", label: "Document", textProperties: ["title", "text"] },
  { collection: "employees", label: "Employee", textProperties: ["name", "title", "department", "bio"] },
];

export const DEFAULT_COLLECTION = "documents";

/** Source nodes are read without a row cap during a rebuild */
const REBUILD_READ_TIMEOUT_MS = 120_000;

export interface SemanticRetrieverOptions {
  indexes?: readonly SemanticIndexDefinition[];
  defaultCollection?: string;
  /** Minimum similarity (0-1) for a passage to be returned */
  similarityThreshold: number;
}

/**
 * Vector collection backing a configured index
 */
export function vectorCollectionName(collection: string): string {
  return `kg_${collection}`;
}

/**
 * `property: value` lines for the properties that carry text
 */
export function buildPassageText(properties: Record<string, unknown>, textProperties: readonly string[]): string {
  const lines: string[] = [];
  for (const name of textProperties) {
    const value = properties[name];
    if (value === null || value === undefined) {
      continue;
    }
    const text = Array.isArray(value) ? value.map(String).join(", ") : String(value);
    if (text.trim().length > 0) {
      lines.push(`${name}: ${text.trim()}`);
    }
  }
  return lines.join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SemanticRetriever {
  private readonly indexes: Map<string, SemanticIndexDefinition>;
  readonly defaultCollection: string;
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
    private readonly store: GraphStore,
    private readonly options: SemanticRetrieverOptions
  ) {
    const indexes = options.indexes ?? DEFAULT_SEMANTIC_INDEXES;
    this.indexes = new Map(indexes.map((def) => [def.collection, def]));
    this.defaultCollection = options.defaultCollection ?? DEFAULT_COLLECTION;
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("query:semantic");
    }
    return this._logger;
  }

  get collections(): string[] {
    return [...this.indexes.keys()];
  }

  /**
   * Most similar passages first. k = 0 and an unbuilt collection both yield
   * an empty list.
   *
   * @throws {SemanticRetrievalError} when embedding or search fails
   */
  async retrieve(question: string, k: number, collection: string = this.defaultCollection): Promise<RetrievedPassage[]> {
    if (k <= 0) {
      return [];
    }
    this.definition(collection);

    let embedding: number[];
    try {
      embedding = await this.embeddings.generateEmbedding(question);
    } catch (error) {
      const cause = toError(error);
      throw new SemanticRetrievalError(
        `Question embedding failed: ${cause.message}`,
        collection,
        cause,
        error instanceof EmbeddingError && error.retryable
      );
    }

    try {
      const matches = await this.vectorIndex.search(vectorCollectionName(collection), embedding, {
        limit: k,
        threshold: this.options.similarityThreshold,
      });
      return matches.map((m) => ({
        text: m.text,
        source: m.metadata.source,
        score: m.similarity,
        label: m.metadata.label,
        nodeId: m.metadata.node_id,
      }));
    } catch (error) {
      const cause = toError(error);
      throw new SemanticRetrievalError(
        `Semantic search failed: ${cause.message}`,
        collection,
        cause,
        error instanceof StorageError && error.retryable
      );
    }
  }

  /**
   * Re-embed every source node of `collection` and replace its vectors
   *
   * @throws {SemanticRetrievalError} when the collection is not configured or any step fails
   */
  async rebuildIndex(collection: string = this.defaultCollection): Promise<IndexRebuildResult> {
    const definition = this.definition(collection);
    const startTime = Date.now();

    try {
      const { rows } = await this.store.executeRead(
        `MATCH (n:${quoteIdentifier(definition.label)}) RETURN elementId(n) AS id, properties(n) AS props`,
        {},
        { timeoutMs: REBUILD_READ_TIMEOUT_MS, maxRows: Number.MAX_SAFE_INTEGER }
      );

      const pending: Array<{ id: string; text: string; source: string }> = [];
      let skipped = 0;
      for (const row of rows) {
        const id = typeof row["id"] === "string" ? row["id"] : String(row["id"]);
        const props = isRecord(row["props"]) ? row["props"] : {};
        const text = buildPassageText(props, definition.textProperties);
        if (text.length === 0) {
          skipped++;
          continue;
        }
        const title = props["title"] ?? props["name"];
        pending.push({ id, text, source: typeof title === "string" && title.length > 0 ? title : id });
      }

      const vectors = pending.length > 0 ? await this.embeddings.generateEmbeddings(pending.map((p) => p.text)) : [];
      const entries: VectorEntry[] = pending.map((p, i) => ({
        id: p.id,
        text: p.text,
        embedding: vectors[i] ?? [],
        metadata: { source: p.source, label: definition.label, node_id: p.id },
      }));

      await this.vectorIndex.replaceCollection(vectorCollectionName(collection), entries);

      const result: IndexRebuildResult = {
        collection,
        label: definition.label,
        indexed: entries.length,
        skipped,
        duration_ms: Date.now() - startTime,
      };
      this.logger.info({ metric: "semantic.rebuild_ms", value: result.duration_ms, ...result }, "Semantic index rebuilt");
      return result;
    } catch (error) {
      const cause = toError(error);
      this.logger.error({ collection, err: cause }, "Semantic index rebuild failed");
      throw new SemanticRetrievalError(`Rebuilding '${collection}' failed: ${cause.message}`, collection, cause);
    }
  }

  private definition(collection: string): SemanticIndexDefinition {
    const definition = this.indexes.get(collection);
    if (!definition) {
      throw new SemanticRetrievalError(
        `Unknown collection '${collection}'. Configured: ${this.collections.join(", ")}`,
        collection
      );
    }
    return definition;
  }
}
