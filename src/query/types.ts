/**
 * @module query/types
 *
 * Records exchanged along the question-answering pipeline.
 */

import type { GraphRow } from "../graph/types.js";

/**
 * A passage returned by semantic retrieval, most similar first
 */
export interface RetrievedPassage {
  text: string;
  /** Citation for the passage, the source node's title or name */
  source: string;
  /** Similarity on the 0-1 scale */
  score: number;
  /** Graph label the passage was built from */
  label: string;
  nodeId: string;
}

/**
 * Rows from executing a generated query
 */
export interface StructuredResult {
  rows: GraphRow[];
  /** More rows matched than the row cap kept */
  truncated: boolean;
}

/**
 * Output of the structured path for one question
 */
export interface ResolvedQuery {
  /** The generated Cypher exactly as executed */
  query: string;
  /** Version of the snapshot the query was generated from */
  schemaVersion: string;
  result: StructuredResult;
}

export type DegradationKind = "retrieval_degraded" | "synthesis_degraded";

/**
 * A non-fatal condition recorded in response metadata
 */
export interface Degradation {
  kind: DegradationKind;
  reason: string;
}

export interface PassageCitation {
  source: string;
  score: number;
  excerpt: string;
}

export interface AnswerMetadata {
  provider: string;
  model: string;
  passages_used: PassageCitation[];
  execution_time_ms: number;
  structured_summary: string;
  structured_rows: GraphRow[];
  row_count: number;
  truncated: boolean;
  schema_version: string;
  degradations: Degradation[];
}

/**
 * Final response for one question
 */
export interface CompositeAnswer {
  question: string;
  answer: string;
  /** Present when the caller asked for the query text */
  generated_query?: string;
  metadata: AnswerMetadata;
}

export type OrchestratorState =
  | "IDLE"
  | "RESOLVING_SCHEMA"
  | "RETRIEVING"
  | "SYNTHESIZING"
  | "DONE"
  | "ERROR";

export interface StateTransition {
  from: OrchestratorState;
  to: OrchestratorState;
  question: string;
  /** Milliseconds since the request started */
  elapsedMs: number;
}

export interface ProcessOptions {
  /** @default true */
  includeQuery?: boolean;
  /** Passages to retrieve; 0 skips semantic retrieval */
  k?: number;
  /** Semantic collection to search */
  collection?: string;
  /** Pass retrieved passages to query generation as hints. @default true */
  useHints?: boolean;
}

/**
 * Result of rebuilding one semantic collection
 */
export interface IndexRebuildResult {
  collection: string;
  label: string;
  indexed: number;
  skipped: number;
  duration_ms: number;
}
