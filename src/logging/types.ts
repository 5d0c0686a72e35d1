/**
 * Logger configuration types
 *
 * @module logging/types
 */

/** "silent" is for tests */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface LoggerConfig {
  level: LogLevel;
  /** "pretty" goes through pino-pretty; "json" writes one object per line */
  format: "json" | "pretty";
  /** Destination override so tests can capture lines */
  stream?: NodeJS.WritableStream;
}

/**
 * Bound to every line of a component logger
 */
export interface ComponentContext {
  /** Colon-separated area and name, e.g. "graph:neo4j" */
  component: string;
  /** Correlates the lines of one question or ingestion */
  requestId?: string;
}
