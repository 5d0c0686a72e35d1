/**
 * Type definitions for the ChromaDB vector index
 */

/**
 * Configuration for ChromaDB client connection
 */
export interface ChromaConfig {
  /** ChromaDB server host (default: 'localhost') */
  host: string;
  /** ChromaDB server port (default: 8000) */
  port: number;
}

/**
 * Metadata stored beside every passage vector
 *
 * NOTE: snake_case keys, stored as-is by ChromaDB. A type alias rather than
 * an interface so it satisfies the client's metadata record type.
 */
export type PassageMetadata = {
  /** Human-readable citation, the node's title or name */
  source: string;
  /** Graph label the passage was built from */
  label: string;
  /** Graph identity of the source node */
  node_id: string;
};

/**
 * A passage with its pre-computed embedding, ready to store
 */
export interface VectorEntry {
  id: string;
  text: string;
  embedding: number[];
  metadata: PassageMetadata;
}

export interface VectorSearchOptions {
  limit: number;
  /** Minimum similarity on the 0-1 scale */
  threshold: number;
}

export interface VectorMatch {
  id: string;
  text: string;
  metadata: PassageMetadata;
  /** Raw cosine distance from ChromaDB (0 = identical, 2 = opposite) */
  distance: number;
  /** `1 - distance / 2`, clamped to [0, 1] */
  similarity: number;
}

/**
 * Vector storage used by semantic retrieval
 *
 * @example
 * ```typescript
 * const index: VectorIndex = new ChromaVectorIndex({ host: "localhost", port: 8000 });
 * await index.connect();
 * const matches = await index.search("kg_documents", embedding, { limit: 3, threshold: 0 });
 * ```
 */
export interface VectorIndex {
  /**
   * @throws {StorageConnectionError} If the server cannot be reached
   */
  connect(): Promise<void>;

  healthCheck(): Promise<boolean>;

  /**
   * Nearest passages, most similar first. A collection that does not exist
   * yields an empty list.
   *
   * @throws {SearchOperationError} If the query fails
   */
  search(collection: string, embedding: number[], options: VectorSearchOptions): Promise<VectorMatch[]>;

  /**
   * Drop the collection if present, recreate it and store `entries`
   *
   * @throws {DocumentOperationError} If storing fails
   */
  replaceCollection(collection: string, entries: VectorEntry[]): Promise<void>;

  /**
   * Stored passages, 0 for a missing collection
   */
  count(collection: string): Promise<number>;
}
