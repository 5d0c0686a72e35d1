/**
 * @module graph/types
 *
 * Store-facing contracts shared by the query path and the ingestion path.
 */

import type { RetryConfig } from "../utils/retry.js";
import type { IntrospectionOptions, SchemaSnapshot } from "./schema/types.js";

/**
 * Connection settings for Neo4j
 */
export interface Neo4jConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  /** Target database, server default when omitted */
  database?: string;
  /** @default 50 */
  maxConnectionPoolSize?: number;
  /** @default 30000 */
  connectionAcquisitionTimeout?: number;
  retry?: RetryConfig;
}

/**
 * One result row with driver values converted to plain JavaScript
 */
export type GraphRow = Record<string, unknown>;

export type QueryParameters = Record<string, unknown>;

/**
 * Bounds applied to a read statement
 */
export interface ReadLimits {
  /** Transaction timeout; exceeding it fails the read */
  timeoutMs: number;
  /** Rows kept from the head of the result; the rest are dropped and flagged */
  maxRows: number;
}

/**
 * Result of a bounded read
 */
export interface ReadResult {
  rows: GraphRow[];
  /** True when the statement produced more than `maxRows` rows */
  truncated: boolean;
}

/**
 * Statement runner scoped to one write transaction
 */
export interface GraphWriteTransaction {
  run(cypher: string, params?: QueryParameters): Promise<GraphRow[]>;
}

/**
 * Access to the structured store
 *
 * Reads run in read-only transactions. Writes are reserved for ingestion.
 */
export interface GraphStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;

  /**
   * Execute a read-only statement under a timeout and row cap
   *
   * At most `maxRows + 1` records are pulled from the server; the extra one
   * only decides `truncated`.
   *
   * @throws {GraphQueryTimeoutError} when the timeout elapses
   * @throws {GraphError} on any other store failure
   */
  executeRead(cypher: string, params: QueryParameters, limits: ReadLimits): Promise<ReadResult>;

  /**
   * Ask the server to compile a statement without running it
   *
   * @throws {GraphSyntaxError} when the server rejects the statement
   */
  explain(cypher: string): Promise<void>;

  /**
   * Run `work` in one write transaction
   *
   * Every statement run through `tx` commits together when `work` resolves,
   * and none does when it rejects. `work` may be re-run after a transient
   * failure.
   */
  executeWrite<T>(work: (tx: GraphWriteTransaction) => Promise<T>): Promise<T>;

  /**
   * Enumerate labels, relationship types and properties currently present
   *
   * @throws {GraphSchemaError} when introspection fails
   */
  introspect(options: IntrospectionOptions): Promise<SchemaSnapshot>;
}
