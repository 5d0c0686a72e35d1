/**
 * Configuration Module Exports
 *
 * @module config
 */

export {
  type AppConfig,
  type QueryConfig,
  type SemanticConfig,
  ConfigurationError,
  loadAppConfig,
} from "./app-config.js";
