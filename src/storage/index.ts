/**
 * ChromaDB Storage Module
 *
 * @module storage
 */

export { ChromaVectorIndex, convertDistanceToSimilarity } from "./chroma-client.js";

export type {
  ChromaConfig,
  PassageMetadata,
  VectorEntry,
  VectorIndex,
  VectorMatch,
  VectorSearchOptions,
} from "./types.js";

export {
  StorageError,
  StorageConnectionError,
  InvalidParametersError,
  DocumentOperationError,
  SearchOperationError,
} from "./errors.js";
