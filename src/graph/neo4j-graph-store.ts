/**
 * Neo4j Graph Store
 *
 * Concrete {@link GraphStore} over neo4j-driver 5.x. Handles connection
 * pooling, session lifecycle, retry of transient failures and conversion of
 * driver values to plain JavaScript.
 *
 * @module graph/neo4j-graph-store
 */

import neo4j, {
  type Driver,
  type Session,
  type ManagedTransaction,
  type Record as Neo4jRecord,
  type Node as Neo4jNode,
  type Relationship as Neo4jRelationship,
} from "neo4j-driver";
import type pino from "pino";
import type {
  GraphRow,
  GraphStore,
  GraphWriteTransaction,
  Neo4jConfig,
  QueryParameters,
  ReadLimits,
  ReadResult,
} from "./types.js";
import {
  GraphAuthenticationError,
  GraphConnectionError,
  GraphError,
  GraphQueryTimeoutError,
  isRetryableGraphError,
  mapNeo4jError,
} from "./errors.js";
import { introspectSchema } from "./schema/introspection.js";
import type { IntrospectionOptions, SchemaSnapshot } from "./schema/types.js";
import { getComponentLogger } from "../logging/index.js";
import {
  withRetry,
  createRetryOptions,
  createRetryLogger,
  toError,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
} from "../utils/retry.js";
import { withTimeout, TimeoutError } from "../utils/timeout.js";

/**
 * Timeout for introspection reads, which run outside any caller budget
 */
const INTROSPECTION_TIMEOUT_MS = 60_000;

/**
 * Records requested per batch; the driver's own default
 */
const MAX_FETCH_SIZE = 1000;

interface SessionRunOptions {
  timeoutMs?: number;
  /** Records pulled per batch from the server */
  fetchSize?: number;
  /** Statement named in mapped errors */
  reportedQuery?: string;
}

/**
 * @example
 * ```typescript
 * const store = new Neo4jGraphStore({ host: "localhost", port: 7687, username: "neo4j", password });
 * await store.connect();
 * const { rows, truncated } = await store.executeRead(
 *   "MATCH (e:Employee) RETURN e.name AS name",
 *   {},
 *   { timeoutMs: 30000, maxRows: 100 }
 * );
 * await store.disconnect();
 * ```
 */
export class Neo4jGraphStore implements GraphStore {
  private driver: Driver | null = null;
  private readonly config: Neo4jConfig;
  private readonly retryConfig: RetryConfig;
  private _logger: pino.Logger | null = null;

  constructor(config: Neo4jConfig) {
    this.config = config;
    this.retryConfig = config.retry ?? DEFAULT_RETRY_CONFIG;
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("graph:neo4j");
    }
    return this._logger;
  }

  /**
   * Retry transient failures. Timeouts are final: the caller's budget is spent.
   */
  private async withRetryWrapper<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const options = createRetryOptions(this.retryConfig, {
      shouldRetry: (error) => isRetryableGraphError(error) && !(error instanceof GraphQueryTimeoutError),
      onRetry: createRetryLogger(this.logger, operationName, this.retryConfig.maxRetries),
    });

    return withRetry(operation, options);
  }

  private openSession(mode: "READ" | "WRITE", fetchSize?: number): Session {
    if (this.driver === null) {
      throw new GraphConnectionError("Not connected to Neo4j. Call connect() first.");
    }
    return this.driver.session({
      defaultAccessMode: mode === "READ" ? neo4j.session.READ : neo4j.session.WRITE,
      ...(this.config.database !== undefined && { database: this.config.database }),
      ...(fetchSize !== undefined && { fetchSize }),
    });
  }

  /**
   * Create the driver and verify the server answers
   *
   * @throws {GraphConnectionError} If the server stays unreachable after all retries
   * @throws {GraphAuthenticationError} If credentials are rejected
   */
  async connect(): Promise<void> {
    const startTime = Date.now();
    this.logger.info({ host: this.config.host, port: this.config.port }, "Connecting to Neo4j");

    const uri = `bolt://${this.config.host}:${this.config.port}`;
    const driver = neo4j.driver(uri, neo4j.auth.basic(this.config.username, this.config.password), {
      maxConnectionPoolSize: this.config.maxConnectionPoolSize ?? 50,
      connectionAcquisitionTimeout: this.config.connectionAcquisitionTimeout ?? 30000,
    });

    try {
      await this.withRetryWrapper(async () => {
        try {
          await driver.getServerInfo();
        } catch (error) {
          const mapped = mapNeo4jError(toError(error));
          if (mapped instanceof GraphAuthenticationError || mapped instanceof GraphConnectionError) {
            throw mapped;
          }
          throw new GraphConnectionError(
            `Failed to connect to Neo4j at ${uri}: ${mapped.message}`,
            toError(error),
            false
          );
        }
      }, "Neo4j connection");
      this.driver = driver;

      this.logger.info(
        { metric: "neo4j.connection_ms", value: Date.now() - startTime, host: this.config.host },
        "Connected to Neo4j"
      );
    } catch (error) {
      this.logger.error(
        { metric: "neo4j.connection_ms", value: Date.now() - startTime, err: error },
        "Failed to connect to Neo4j"
      );
      await driver.close().catch((closeError: unknown) => {
        this.logger.debug({ err: closeError }, "Error closing driver after failed connect");
      });
      if (error instanceof GraphError) {
        throw error;
      }
      throw new GraphConnectionError(`Failed to connect to Neo4j at ${uri}`, toError(error));
    }
  }

  async disconnect(): Promise<void> {
    if (this.driver === null) {
      return;
    }
    const driver = this.driver;
    this.driver = null;
    await driver.close();
    this.logger.info("Disconnected from Neo4j");
  }

  async healthCheck(): Promise<boolean> {
    if (this.driver === null) {
      this.logger.warn("Health check: Driver not connected");
      return false;
    }
    try {
      await this.driver.getServerInfo();
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "Health check failed");
      return false;
    }
  }

  async executeRead(cypher: string, params: QueryParameters, limits: ReadLimits): Promise<ReadResult> {
    const startTime = Date.now();
    const keep = limits.maxRows + 1;

    try {
      const records = await this.withRetryWrapper(
        () =>
          this.runInSession(
            "READ",
            async (tx) => {
              const pulled: Neo4jRecord[] = [];
              // Leaving the loop stops pulling batches; the rest of the stream is discarded
              for await (const record of tx.run(cypher, params)) {
                pulled.push(record);
                if (pulled.length >= keep) {
                  break;
                }
              }
              return pulled;
            },
            { timeoutMs: limits.timeoutMs, fetchSize: Math.min(keep, MAX_FETCH_SIZE), reportedQuery: cypher }
          ),
        "Neo4j read"
      );

      const truncated = records.length > limits.maxRows;
      const rows = records.slice(0, limits.maxRows).map((r) => this.mapRecord(r));

      this.logger.debug(
        { metric: "neo4j.query_ms", value: Date.now() - startTime, rowCount: rows.length, truncated },
        "Read executed"
      );
      if (truncated) {
        this.logger.warn({ maxRows: limits.maxRows }, "Result truncated to row cap");
      }

      return { rows, truncated };
    } catch (error) {
      this.logger.error(
        { metric: "neo4j.query_ms", value: Date.now() - startTime, err: error, cypher: cypher.substring(0, 200) },
        "Read failed"
      );
      throw error;
    }
  }

  async explain(cypher: string): Promise<void> {
    await this.withRetryWrapper(
      () =>
        this.runInSession(
          "READ",
          async (tx) => {
            await tx.run(`EXPLAIN ${cypher}`);
          },
          { timeoutMs: INTROSPECTION_TIMEOUT_MS, reportedQuery: cypher }
        ),
      "Neo4j explain"
    );
  }

  async executeWrite<T>(work: (tx: GraphWriteTransaction) => Promise<T>): Promise<T> {
    const startTime = Date.now();
    let statements = 0;
    const result = await this.withRetryWrapper(
      () =>
        this.runInSession("WRITE", (tx) => {
          statements = 0;
          return work({
            run: async (cypher, params = {}) => {
              statements++;
              const { records } = await tx.run(cypher, params);
              return records.map((r) => this.mapRecord(r));
            },
          });
        }),
      "Neo4j write"
    );
    this.logger.debug(
      { metric: "neo4j.write_ms", value: Date.now() - startTime, statements },
      "Write transaction committed"
    );
    return result;
  }

  async introspect(options: IntrospectionOptions): Promise<SchemaSnapshot> {
    const startTime = Date.now();
    const snapshot = await introspectSchema(async (cypher, params) => {
      const result = await this.executeRead(cypher, params ?? {}, {
        timeoutMs: INTROSPECTION_TIMEOUT_MS,
        maxRows: Number.MAX_SAFE_INTEGER - 1,
      });
      return result.rows;
    }, options);

    this.logger.info(
      {
        metric: "neo4j.introspection_ms",
        value: Date.now() - startTime,
        version: snapshot.version,
        labels: snapshot.nodeLabels.length,
        relationshipTypes: snapshot.relationshipTypes.length,
      },
      "Schema introspected"
    );
    return snapshot;
  }

  /**
   * Run `work` in a managed transaction on a fresh session, mapping every
   * failure onto GraphError
   */
  private async runInSession<T>(
    mode: "READ" | "WRITE",
    work: (tx: ManagedTransaction) => Promise<T>,
    options: SessionRunOptions = {}
  ): Promise<T> {
    const { timeoutMs, fetchSize, reportedQuery } = options;
    const session = this.openSession(mode, fetchSize);
    const txConfig = timeoutMs !== undefined ? { timeout: timeoutMs } : undefined;

    try {
      const pending =
        mode === "READ" ? session.executeRead(work, txConfig) : session.executeWrite(work, txConfig);
      return await withTimeout(pending, timeoutMs, "Neo4j statement");
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new GraphQueryTimeoutError(
          `Query exceeded timeout of ${error.timeoutMs}ms`,
          error.timeoutMs,
          error
        );
      }
      throw mapNeo4jError(toError(error), { query: reportedQuery, timeoutMs });
    } finally {
      await session.close().catch((closeError: unknown) => {
        this.logger.debug({ err: closeError }, "Error closing session");
      });
    }
  }

  private mapRecord(record: Neo4jRecord): GraphRow {
    const row: GraphRow = {};
    for (const key of record.keys) {
      row[String(key)] = this.convertValue(record.get(key));
    }
    return row;
  }

  /**
   * Convert driver values (integers, nodes, relationships, temporals) recursively
   */
  private convertValue(value: unknown): unknown {
    if (value === null || value === undefined) {
      return value;
    }
    if (neo4j.isInt(value)) {
      return value.inSafeRange() ? value.toNumber() : value.toString();
    }
    if (
      neo4j.isDate(value) ||
      neo4j.isDateTime(value) ||
      neo4j.isLocalDateTime(value) ||
      neo4j.isLocalTime(value) ||
      neo4j.isTime(value) ||
      neo4j.isDuration(value)
    ) {
      return value.toString();
    }
    if (this.isNode(value)) {
      return {
        labels: value.labels,
        ...this.convertProperties(value.properties),
      };
    }
    if (this.isRelationship(value)) {
      return { type: value.type, ...this.convertProperties(value.properties) };
    }
    if (Array.isArray(value)) {
      return value.map((v) => this.convertValue(v));
    }
    if (typeof value === "object") {
      return this.convertProperties(value);
    }
    return value;
  }

  private convertProperties(properties: object): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(properties)) {
      out[k] = this.convertValue(v);
    }
    return out;
  }

  private isNode(value: unknown): value is Neo4jNode {
    return (
      typeof value === "object" &&
      value !== null &&
      "labels" in value &&
      "properties" in value &&
      "identity" in value
    );
  }

  private isRelationship(value: unknown): value is Neo4jRelationship {
    return (
      typeof value === "object" &&
      value !== null &&
      "type" in value &&
      "properties" in value &&
      "start" in value &&
      "end" in value
    );
  }
}
