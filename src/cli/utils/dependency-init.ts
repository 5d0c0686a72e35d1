/**
 * Dependency initialization for CLI commands
 *
 * Loads configuration, starts the logger and connects the service
 * container. Commands receive the container and never build components
 * themselves.
 */

import { loadAppConfig, type AppConfig } from "../../config/index.js";
import { initializeLogger, isLoggerInitialized, getComponentLogger } from "../../logging/index.js";
import { createKnowledgeBase, type KnowledgeBase, type KnowledgeBaseOverrides } from "../../knowledge-base.js";

/**
 * Everything a command may use
 */
export type CliDependencies = KnowledgeBase;

export interface InitializeOptions {
  /** Defaults to the process environment */
  env?: NodeJS.ProcessEnv;
  overrides?: KnowledgeBaseOverrides;
  /** Skip connecting; the health command connects each service itself */
  connect?: boolean;
}

/**
 * CLI logging is quieter than the library default unless LOG_LEVEL is set
 */
function startLogger(config: AppConfig, env: NodeJS.ProcessEnv): void {
  if (isLoggerInitialized()) {
    return;
  }
  initializeLogger({
    level: env["LOG_LEVEL"] ? config.logging.level : "warn",
    format: env["LOG_FORMAT"] ? config.logging.format : "pretty",
  });
}

/**
 * @throws {ConfigurationError} when the environment is invalid
 * @throws {GraphConnectionError} when Neo4j cannot be reached
 */
export async function initializeDependencies(options: InitializeOptions = {}): Promise<CliDependencies> {
  const env = options.env ?? process.env;
  const config = loadAppConfig(env);
  startLogger(config, env);

  const logger = getComponentLogger("cli");
  const kb = createKnowledgeBase(config, options.overrides);

  if (options.connect ?? true) {
    logger.debug({ host: config.neo4j.host, port: config.neo4j.port }, "Connecting to Neo4j");
    try {
      await kb.connect();
    } catch (error) {
      logger.error({ err: error }, "Failed to initialize CLI dependencies");
      throw error;
    }
  }
  return kb;
}

/**
 * Run `command` against connected dependencies, closing them afterwards
 * whether or not it succeeds
 */
export async function withDependencies<T>(
  command: (deps: CliDependencies) => Promise<T>,
  options: InitializeOptions = {}
): Promise<T> {
  const deps = await initializeDependencies(options);
  try {
    return await command(deps);
  } finally {
    await deps.close();
  }
}
