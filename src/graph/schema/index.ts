/**
 * @module graph/schema
 */

export * from "./types.js";
export { buildSchemaSnapshot, computeSchemaVersion, SchemaVocabulary } from "./snapshot.js";
export { formatSchemaForPrompt } from "./format.js";
export { introspectSchema, quoteIdentifier, type IntrospectionRunner } from "./introspection.js";
