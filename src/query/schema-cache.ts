/**
 * @module query/schema-cache
 *
 * Holds the current schema snapshot. Loads lazily, shares one in-flight
 * introspection among concurrent callers and drops everything on invalidate.
 */

import type pino from "pino";
import type { GraphStore } from "../graph/types.js";
import type { IntrospectionOptions, SchemaSnapshot } from "../graph/schema/types.js";
import { SchemaUnavailableError } from "./errors.js";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/retry.js";

export type InvalidationListener = () => void;

export class SchemaCache {
  private snapshot: SchemaSnapshot | null = null;
  private loading: Promise<SchemaSnapshot> | null = null;
  /** Bumped on every invalidation; a load started under an older generation is not cached */
  private generation = 0;
  private readonly listeners = new Set<InvalidationListener>();
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly store: GraphStore,
    private readonly options: IntrospectionOptions
  ) {}

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("query:schema-cache");
    }
    return this._logger;
  }

  /**
   * Cached snapshot, introspecting the store only when none is held
   *
   * @throws {SchemaUnavailableError} when introspection fails
   */
  async getSchema(): Promise<SchemaSnapshot> {
    if (this.snapshot) {
      return this.snapshot;
    }
    if (!this.loading) {
      this.loading = this.load(this.generation);
    }
    return this.loading;
  }

  /**
   * Snapshot currently held, without loading
   */
  peek(): SchemaSnapshot | null {
    return this.snapshot;
  }

  /**
   * Drop the snapshot and any pending load, then notify listeners
   */
  invalidate(): void {
    this.generation++;
    this.snapshot = null;
    this.loading = null;
    this.logger.info({ generation: this.generation }, "Schema cache invalidated");
    for (const listener of this.listeners) {
      listener();
    }
  }

  /**
   * @returns a function that removes the listener
   */
  onInvalidate(listener: InvalidationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async load(generation: number): Promise<SchemaSnapshot> {
    const startTime = Date.now();
    try {
      const snapshot = await this.store.introspect(this.options);
      if (generation === this.generation) {
        this.snapshot = snapshot;
        this.loading = null;
      }
      this.logger.info(
        {
          metric: "schema.introspection_ms",
          value: Date.now() - startTime,
          version: snapshot.version,
          labels: snapshot.nodeLabels.length,
          relationshipTypes: snapshot.relationshipTypes.length,
        },
        "Schema snapshot loaded"
      );
      return snapshot;
    } catch (error) {
      if (generation === this.generation) {
        this.loading = null;
      }
      const cause = toError(error);
      this.logger.error({ err: cause }, "Schema introspection failed");
      throw new SchemaUnavailableError(`Schema introspection failed: ${cause.message}`, cause);
    }
  }
}
