/**
 * @module graph
 *
 * Structured store access: the {@link GraphStore} contract, its Neo4j
 * implementation, schema snapshots, the company directory reads and the
 * error hierarchy.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./schema/index.js";
export { Neo4jGraphStore } from "./neo4j-graph-store.js";
export * from "./company-directory.js";
