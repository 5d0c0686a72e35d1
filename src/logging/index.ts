/**
 * Logging Module - Public API
 *
 * Structured logging on Pino with secret redaction and component context.
 *
 * ```typescript
 * // once, at startup
 * initializeLogger({ level: "info", format: "json" });
 *
 * // per module
 * const logger = getComponentLogger("graph:neo4j");
 * logger.error({ err }, "Query failed");
 * ```
 *
 * Environment: `LOG_LEVEL` (silent|fatal|error|warn|info|debug|trace, default info)
 * and `LOG_FORMAT` (json|pretty, default json).
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  isLoggerInitialized,
  resetLogger,
} from "./logger-factory.js";

export {
  REDACT_PATHS,
  REDACT_OPTIONS,
  redactSecrets,
} from "./redactors.js";
