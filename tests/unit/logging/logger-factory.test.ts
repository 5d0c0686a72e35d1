/**
 * Unit tests for logger factory
 *
 * Tests logger initialization, component-scoped loggers and the JSON line
 * format components rely on.
 */

import { describe, test, expect, afterEach } from "vitest";
import {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  isLoggerInitialized,
  resetLogger,
  type LogLevel,
} from "../../../src/logging/index.js";
import { LogCapture } from "../../helpers/log-capture.js";

describe("Logger Factory", () => {
  afterEach(() => {
    resetLogger();
  });

  describe("initializeLogger", () => {
    test("initializes with JSON format", () => {
      initializeLogger({ level: "info", format: "json" });

      expect(isLoggerInitialized()).toBe(true);
      expect(getRootLogger().level).toBe("info");
    });

    test("throws if initialized twice", () => {
      initializeLogger({ level: "info", format: "json" });

      expect(() => initializeLogger({ level: "debug", format: "json" })).toThrow("Logger already initialized");
    });

    test("accepts every level", () => {
      const levels: LogLevel[] = ["silent", "fatal", "error", "warn", "info", "debug", "trace"];
      for (const level of levels) {
        resetLogger();
        initializeLogger({ level, format: "json" });
        expect(getRootLogger().level).toBe(level);
      }
    });
  });

  describe("getComponentLogger", () => {
    test("throws before initialization", () => {
      expect(() => getComponentLogger("query:orchestrator")).toThrow("Logger not initialized");
    });

    test("tags every line with the component and request id", () => {
      const capture = new LogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("query:resolver", "req-42").info({ rows: 3 }, "Structured query executed");

      const [entry] = capture.byMessage("Structured query executed");
      expect(entry?.component).toBe("query:resolver");
      expect(entry?.["requestId"]).toBe("req-42");
      expect(entry?.["rows"]).toBe(3);
      expect(entry?.level).toBe("info");
    });

    test("omits requestId when none is given", () => {
      const capture = new LogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("graph:neo4j").info("Connected to Neo4j");

      expect(capture.byMessage("Connected to Neo4j")[0]).not.toHaveProperty("requestId");
    });

    test("drops lines below the configured level", () => {
      const capture = new LogCapture();
      initializeLogger({ level: "warn", format: "json", stream: capture.stream });
      const logger = getComponentLogger("ingestion:service");

      logger.info("ignored");
      logger.warn("kept");

      expect(capture.getLogs().map((e) => e.msg)).toEqual(["kept"]);
    });
  });

  describe("resetLogger", () => {
    test("allows re-initialization", () => {
      initializeLogger({ level: "info", format: "json" });
      resetLogger();

      expect(isLoggerInitialized()).toBe(false);
      expect(() => initializeLogger({ level: "debug", format: "json" })).not.toThrow();
    });
  });
});
