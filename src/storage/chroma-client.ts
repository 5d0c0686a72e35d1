/**
 * ChromaDB vector index
 *
 * Concrete {@link VectorIndex} over the chromadb HTTP client. Collections use
 * cosine space; distances convert to a 0-1 similarity.
 *
 * @module storage/chroma-client
 */

import { ChromaClient, type Collection } from "chromadb";
import { z } from "zod";
import type pino from "pino";
import type {
  ChromaConfig,
  PassageMetadata,
  VectorEntry,
  VectorIndex,
  VectorMatch,
  VectorSearchOptions,
} from "./types.js";
import {
  StorageError,
  StorageConnectionError,
  InvalidParametersError,
  DocumentOperationError,
  SearchOperationError,
} from "./errors.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";

/** Vectors per upsert request */
const UPSERT_BATCH_SIZE = 500;

const PassageMetadataSchema = z.object({
  source: z.string(),
  label: z.string(),
  node_id: z.string(),
});

/**
 * @example
 * ```typescript
 * const index = new ChromaVectorIndex({ host: "localhost", port: 8000 });
 * await index.connect();
 * await index.replaceCollection("kg_documents", entries);
 * const matches = await index.search("kg_documents", queryEmbedding, { limit: 3, threshold: 0.2 });
 * ```
 */
export class ChromaVectorIndex implements VectorIndex {
  private client: ChromaClient | null = null;
  private readonly config: ChromaConfig;
  private _logger: pino.Logger | null = null;

  /** Collection handles, dropped when a collection is deleted */
  private readonly collections: Map<string, Collection> = new Map();

  constructor(config: ChromaConfig) {
    this.config = config;
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("storage:chromadb");
    }
    return this._logger;
  }

  async connect(): Promise<void> {
    const startTime = Date.now();
    const client = new ChromaClient({ path: `http://${this.config.host}:${this.config.port}` });

    try {
      await client.heartbeat();
    } catch (error) {
      const cause = toError(error);
      this.logger.error(
        { metric: "chromadb.connection_ms", value: Date.now() - startTime, host: this.config.host, err: cause },
        "Failed to connect to ChromaDB"
      );
      throw new StorageConnectionError(
        `Failed to connect to ChromaDB at ${this.config.host}:${this.config.port}: ${cause.message}`,
        cause
      );
    }

    this.client = client;
    this.logger.info(
      { metric: "chromadb.connection_ms", value: Date.now() - startTime, host: this.config.host, port: this.config.port },
      "Connected to ChromaDB"
    );
  }

  async healthCheck(): Promise<boolean> {
    if (!this.client) {
      this.logger.warn("Health check failed: Client not connected");
      return false;
    }
    try {
      await this.client.heartbeat();
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "ChromaDB health check failed");
      return false;
    }
  }

  async search(collection: string, embedding: number[], options: VectorSearchOptions): Promise<VectorMatch[]> {
    if (embedding.length === 0) {
      throw new InvalidParametersError("Query embedding must be a non-empty array", "embedding");
    }
    if (options.threshold < 0 || options.threshold > 1) {
      throw new InvalidParametersError("Threshold must be between 0 and 1", "threshold");
    }
    if (options.limit < 1) {
      return [];
    }

    const startTime = Date.now();
    try {
      const handle = await this.getCollectionIfExists(collection);
      if (!handle) {
        this.logger.warn({ collection }, "Collection not found during search");
        return [];
      }

      const result = await handle.query({ queryEmbeddings: [embedding], nResults: options.limit });
      const ids = result.ids[0] ?? [];
      const distances = result.distances?.[0] ?? [];
      const documents = result.documents?.[0] ?? [];
      const metadatas = result.metadatas?.[0] ?? [];

      const matches: VectorMatch[] = [];
      ids.forEach((id, i) => {
        const distance = distances[i] ?? 2;
        const similarity = convertDistanceToSimilarity(distance);
        const metadata = PassageMetadataSchema.safeParse(metadatas[i]);
        if (similarity < options.threshold || !metadata.success) {
          return;
        }
        matches.push({ id, text: documents[i] ?? "", metadata: metadata.data, distance, similarity });
      });
      matches.sort((a, b) => b.similarity - a.similarity);

      this.logger.info(
        { metric: "search.duration_ms", value: Date.now() - startTime, collection, resultsCount: matches.length },
        "Search completed"
      );
      return matches;
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const cause = toError(error);
      throw new SearchOperationError(`Similarity search failed: ${cause.message}`, collection, cause);
    }
  }

  async replaceCollection(collection: string, entries: VectorEntry[]): Promise<void> {
    if (!collection.trim()) {
      throw new InvalidParametersError("Collection name cannot be empty", "collection");
    }
    const client = this.requireClient();
    const startTime = Date.now();

    try {
      if (await this.getCollectionIfExists(collection)) {
        await client.deleteCollection({ name: collection });
        this.collections.delete(collection);
      }
      const handle = await client.getOrCreateCollection({
        name: collection,
        metadata: { "hnsw:space": "cosine" },
      });
      this.collections.set(collection, handle);

      for (let start = 0; start < entries.length; start += UPSERT_BATCH_SIZE) {
        const batch = entries.slice(start, start + UPSERT_BATCH_SIZE);
        await handle.upsert({
          ids: batch.map((e) => e.id),
          embeddings: batch.map((e) => e.embedding),
          metadatas: batch.map((e): PassageMetadata => ({ ...e.metadata })),
          documents: batch.map((e) => e.text),
        });
      }
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const cause = toError(error);
      this.logger.error({ collection, err: cause }, "Collection rebuild failed");
      throw new DocumentOperationError(
        `Failed to replace collection '${collection}': ${cause.message}`,
        collection,
        cause
      );
    }

    this.logger.info(
      {
        metric: "chromadb.replace_collection_ms",
        value: Date.now() - startTime,
        collection,
        documentCount: entries.length,
      },
      `Stored ${entries.length} passages in '${collection}'`
    );
  }

  async count(collection: string): Promise<number> {
    const handle = await this.getCollectionIfExists(collection);
    return handle ? handle.count() : 0;
  }

  /**
   * Existing collection handle, or null without creating one
   */
  private async getCollectionIfExists(name: string): Promise<Collection | null> {
    const cached = this.collections.get(name);
    if (cached) {
      return cached;
    }

    const client = this.requireClient();
    try {
      const existing = await client.listCollectionsAndMetadata();
      if (!existing.some((col) => col.name === name)) {
        return null;
      }
      const handle = await client.getOrCreateCollection({ name, metadata: { "hnsw:space": "cosine" } });
      this.collections.set(name, handle);
      return handle;
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(
        `Failed to check collection existence '${name}': ${cause.message}`,
        "COLLECTION_OPERATION_ERROR",
        cause
      );
    }
  }

  private requireClient(): ChromaClient {
    if (!this.client) {
      throw new StorageConnectionError("Not connected to ChromaDB. Call connect() first.", undefined, false);
    }
    return this.client;
  }
}

/**
 * Cosine distance (0..2) to similarity (0..1)
 */
export function convertDistanceToSimilarity(distance: number): number {
  return Math.max(0, Math.min(1, 1 - distance / 2));
}
