/**
 * Logger Factory
 *
 * Core logging infrastructure built on Pino. Handles root logger creation and
 * component-scoped child loggers.
 *
 * - Writes to stderr so CLI output on stdout stays clean
 * - Redacts secrets automatically
 * - JSON for production, pretty-print for development
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

/**
 * Singleton root logger, initialized once at startup
 */
let rootLogger: pino.Logger | null = null;

function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const pinoOptions = baseOptions(config);

  // Custom stream (log capture in tests)
  if (config.stream) {
    return pino(pinoOptions, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: false,
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once before any component logger is requested.
 *
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger({ level: config.logLevel, format: config.logFormat });
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ config: { level: config.level, format: config.format } }, "Logger initialized");
  } catch (error) {
    // pino-pretty transport unavailable: fall back to plain JSON on stderr
    rootLogger = pino(baseOptions(config), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @throws Error if logger not initialized
 * @internal - application code should use getComponentLogger()
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Whether initializeLogger() has already run
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get a component-scoped logger
 *
 * Child loggers carry the component name (colon notation for hierarchy) and an
 * optional request ID in every line.
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("query:orchestrator", requestId);
 * logger.info({ metric: "query.duration_ms", value: 412 }, "Question answered");
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return root.child(context);
}

/**
 * Reset logger (tests only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
