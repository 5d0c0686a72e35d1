/**
 * Unit tests for Neo4jGraphStore
 *
 * Runs against the in-process driver mock: no Neo4j instance is needed.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { Neo4jGraphStore } from "../../../src/graph/neo4j-graph-store.js";
import {
  GraphAuthenticationError,
  GraphConnectionError,
  GraphQueryTimeoutError,
  GraphSyntaxError,
} from "../../../src/graph/errors.js";
import { LABEL_COUNTS_QUERY } from "../../../src/graph/schema/introspection.js";
import type { Neo4jConfig } from "../../../src/graph/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  MockDate,
  failServerInfo,
  mockDriverState,
  mockNeo4j,
  neo4jError,
  recordsFrom,
  resetMockDriver,
  setResponder,
} from "../../helpers/neo4j-mock.js";

vi.mock("neo4j-driver", async () => {
  const { mockNeo4j } = await import("../../helpers/neo4j-mock.js");
  return { default: mockNeo4j };
});

const testConfig: Neo4jConfig = {
  host: "localhost",
  port: 7687,
  username: "neo4j",
  password: "test-secret",
  retry: { maxRetries: 1, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 },
};

const LIMITS = { timeoutMs: 5000, maxRows: 2 };

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
  resetMockDriver();
});

afterEach(() => {
  resetLogger();
});

async function connectedStore(config: Neo4jConfig = testConfig): Promise<Neo4jGraphStore> {
  const store = new Neo4jGraphStore(config);
  await store.connect();
  return store;
}

describe("Neo4jGraphStore", () => {
  describe("connect", () => {
    test("creates a bolt driver with basic auth and pool settings", async () => {
      const store = await connectedStore();

      const [driver] = mockDriverState.drivers;
      expect(driver?.uri).toBe("bolt://localhost:7687");
      expect(driver?.auth).toEqual({ scheme: "basic", principal: "neo4j", credentials: "test-secret" });
      expect(driver?.config).toEqual({ maxConnectionPoolSize: 50, connectionAcquisitionTimeout: 30000 });
      await expect(store.healthCheck()).resolves.toBe(true);
    });

    test("retries a transient failure", async () => {
      failServerInfo(neo4jError("ServiceUnavailable", "Connection refused"));

      await expect(connectedStore()).resolves.toBeInstanceOf(Neo4jGraphStore);
    });

    test("fails fast on rejected credentials and closes the driver", async () => {
      failServerInfo(
        neo4jError("Neo.ClientError.Security.Unauthorized", "The client is unauthorized"),
        neo4jError("Neo.ClientError.Security.Unauthorized", "The client is unauthorized")
      );

      await expect(connectedStore()).rejects.toBeInstanceOf(GraphAuthenticationError);
      expect(mockDriverState.serverInfoErrors).toHaveLength(1);
      expect(mockDriverState.drivers[0]?.closed).toBe(true);
    });

    test("gives up after the configured retries", async () => {
      failServerInfo(
        neo4jError("ServiceUnavailable", "Connection refused"),
        neo4jError("ServiceUnavailable", "Connection refused")
      );

      await expect(connectedStore()).rejects.toBeInstanceOf(GraphConnectionError);
    });
  });

  describe("executeRead", () => {
    test("fails before connect", async () => {
      const store = new Neo4jGraphStore(testConfig);

      await expect(store.executeRead("MATCH (n) RETURN n", {}, LIMITS)).rejects.toThrow(
        "Not connected to Neo4j. Call connect() first."
      );
    });

    test("converts driver values and applies the row cap", async () => {
      setResponder(() =>
        recordsFrom([
          {
            name: "Ada",
            age: mockNeo4j.int(36),
            hired: new MockDate("2020-01-06"),
            e: {
              identity: mockNeo4j.int(1),
              labels: ["Employee"],
              properties: { name: "Ada", salary: mockNeo4j.int(120000) },
            },
            tags: [mockNeo4j.int(1), "x"],
          },
          { name: "Alan", age: mockNeo4j.int(41), hired: null, e: null, tags: [] },
          { name: "Grace", age: mockNeo4j.int(29), hired: null, e: null, tags: [] },
        ])
      );
      const store = await connectedStore();

      const result = await store.executeRead("MATCH (e:Employee) RETURN e", { limit: 3 }, LIMITS);

      expect(result.truncated).toBe(true);
      expect(result.rows).toEqual([
        {
          name: "Ada",
          age: 36,
          hired: "2020-01-06",
          e: { labels: ["Employee"], name: "Ada", salary: 120000 },
          tags: [1, "x"],
        },
        { name: "Alan", age: 41, hired: null, e: null, tags: [] },
      ]);
      expect(mockDriverState.runs).toEqual([
        {
          mode: "READ",
          cypher: "MATCH (e:Employee) RETURN e",
          params: { limit: 3 },
          timeout: 5000,
          database: undefined,
          fetchSize: 3,
        },
      ]);
      expect(mockDriverState.sessionsClosed).toBe(1);
    });

    test("stops pulling records one past the cap", async () => {
      setResponder(() => recordsFrom(Array.from({ length: 50 }, (_, i) => ({ n: mockNeo4j.int(i) }))));
      const store = await connectedStore();

      const result = await store.executeRead("UNWIND range(0, 49) AS n RETURN n", {}, LIMITS);

      expect(result).toEqual({ rows: [{ n: 0 }, { n: 1 }], truncated: true });
      expect(mockDriverState.recordsStreamed).toBe(3);
    });

    test("does not flag a result that fits the cap", async () => {
      setResponder(() => recordsFrom([{ n: mockNeo4j.int(1) }, { n: mockNeo4j.int(2) }]));
      const store = await connectedStore();

      const result = await store.executeRead("UNWIND [1, 2] AS n RETURN n", {}, LIMITS);

      expect(result).toEqual({ rows: [{ n: 1 }, { n: 2 }], truncated: false });
      expect(mockDriverState.recordsStreamed).toBe(2);
    });

    test("maps a server-side timeout without retrying", async () => {
      setResponder(() => {
        throw neo4jError("Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration", "terminated");
      });
      const store = await connectedStore();

      const error = await store.executeRead("MATCH (n) RETURN n", {}, LIMITS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GraphQueryTimeoutError);
      expect(error instanceof GraphQueryTimeoutError && error.timeoutMs).toBe(5000);
      expect(mockDriverState.runs).toHaveLength(1);
    });

    test("targets the configured database", async () => {
      const store = await connectedStore({ ...testConfig, database: "company" });

      await store.executeRead("RETURN 1 AS one", {}, LIMITS);

      expect(mockDriverState.runs[0]?.database).toBe("company");
    });
  });

  describe("explain", () => {
    test("reports compile failures against the original statement", async () => {
      setResponder((cypher) => {
        if (cypher.startsWith("EXPLAIN ")) {
          throw neo4jError("Neo.ClientError.Statement.SyntaxError", "Invalid input 'RETRUN'");
        }
        return [];
      });
      const store = await connectedStore();

      const error = await store.explain("MATCH (n) RETRUN n").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GraphSyntaxError);
      expect(error instanceof GraphSyntaxError && error.query).toBe("MATCH (n) RETRUN n");
      expect(mockDriverState.runs.map((r) => r.cypher)).toEqual(["EXPLAIN MATCH (n) RETRUN n"]);
    });
  });

  describe("executeWrite", () => {
    test("runs every statement of the unit of work in one write transaction", async () => {
      setResponder((cypher) => (cypher.startsWith("MERGE") ? recordsFrom([{ name: "Acme Corp" }]) : []));
      const store = await connectedStore();

      const names = await store.executeWrite(async (tx) => {
        await tx.run("CREATE (d:Document {id: $id})", { id: "doc-1" });
        const rows = await tx.run("MERGE (c:Client {name: $name}) RETURN c.name AS name", { name: "Acme Corp" });
        return rows.map((row) => row["name"]);
      });

      expect(names).toEqual(["Acme Corp"]);
      expect(mockDriverState.runs.map((r) => [r.mode, r.cypher, r.timeout])).toEqual([
        ["WRITE", "CREATE (d:Document {id: $id})", undefined],
        ["WRITE", "MERGE (c:Client {name: $name}) RETURN c.name AS name", undefined],
      ]);
      expect(mockDriverState.sessionsClosed).toBe(1);
    });

    test("re-runs the whole unit of work after a transient failure", async () => {
      let calls = 0;
      setResponder((cypher) => {
        calls++;
        if (calls === 2) {
          throw neo4jError("Neo.TransientError.Transaction.DeadlockDetected", "lock cycle");
        }
        return cypher.startsWith("MERGE") ? recordsFrom([{ name: "Acme Corp" }]) : [];
      });
      const store = await connectedStore();

      await store.executeWrite(async (tx) => {
        await tx.run("CREATE (d:Document {id: $id})", { id: "doc-1" });
        await tx.run("MERGE (c:Client {name: $name}) RETURN c.name AS name", { name: "Acme Corp" });
      });

      expect(mockDriverState.runs.map((r) => r.cypher)).toEqual([
        "CREATE (d:Document {id: $id})",
        "MERGE (c:Client {name: $name}) RETURN c.name AS name",
        "CREATE (d:Document {id: $id})",
        "MERGE (c:Client {name: $name}) RETURN c.name AS name",
      ]);
      expect(mockDriverState.sessionsClosed).toBe(2);
    });

    test("maps a statement failure and does not retry it", async () => {
      setResponder(() => {
        throw neo4jError("Neo.ClientError.Statement.SyntaxError", "Invalid input 'X'");
      });
      const store = await connectedStore();

      const error = await store
        .executeWrite((tx) => tx.run("CREATE (x:X"))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GraphSyntaxError);
      expect(mockDriverState.runs).toHaveLength(1);
    });
  });

  describe("introspect", () => {
    test("reads the vocabulary through bounded reads", async () => {
      setResponder((cypher) =>
        cypher === LABEL_COUNTS_QUERY ? recordsFrom([{ label: "Client", count: mockNeo4j.int(2) }]) : []
      );
      const store = await connectedStore();

      const snapshot = await store.introspect({ enumLimit: 10, hiddenProperties: [] });

      expect(snapshot.nodeLabels).toEqual([{ label: "Client", count: 2, properties: [] }]);
      expect(mockDriverState.runs.every((r) => r.mode === "READ" && r.timeout === 60000)).toBe(true);
    });
  });

  describe("disconnect", () => {
    test("closes the driver and reports unhealthy afterwards", async () => {
      const store = await connectedStore();

      await store.disconnect();

      expect(mockDriverState.drivers[0]?.closed).toBe(true);
      await expect(store.healthCheck()).resolves.toBe(false);
    });
  });
});
