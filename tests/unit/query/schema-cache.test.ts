/**
 * Unit tests for SchemaCache
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { SchemaCache } from "../../../src/query/schema-cache.js";
import { SchemaUnavailableError } from "../../../src/query/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { FakeGraphStore, companySchema, extendedCompanySchema } from "../../helpers/fakes.js";

const OPTIONS = { enumLimit: 10, hiddenProperties: [] };

function gate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("SchemaCache", () => {
  test("introspects once and serves the cached snapshot", async () => {
    const store = new FakeGraphStore();
    const cache = new SchemaCache(store, OPTIONS);

    expect(cache.peek()).toBeNull();
    const first = await cache.getSchema();
    const second = await cache.getSchema();

    expect(second).toBe(first);
    expect(cache.peek()).toBe(first);
    expect(store.introspectCalls).toBe(1);
  });

  test("shares one in-flight load among concurrent callers", async () => {
    const store = new FakeGraphStore();
    const pending = gate();
    store.introspectGate = pending.promise;
    const cache = new SchemaCache(store, OPTIONS);

    const a = cache.getSchema();
    const b = cache.getSchema();
    pending.open();

    const [left, right] = await Promise.all([a, b]);
    expect(left).toBe(right);
    expect(store.introspectCalls).toBe(1);
  });

  test("wraps introspection failures and retries on the next call", async () => {
    const store = new FakeGraphStore(new Error("Neo4j unavailable"));
    const cache = new SchemaCache(store, OPTIONS);

    const error = await cache.getSchema().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaUnavailableError);
    expect(error instanceof SchemaUnavailableError && error.message).toBe(
      "Schema introspection failed: Neo4j unavailable"
    );
    expect(error instanceof SchemaUnavailableError && error.retryable).toBe(true);

    store.schema = companySchema();
    await expect(cache.getSchema()).resolves.toBe(store.schema);
    expect(store.introspectCalls).toBe(2);
  });

  test("invalidate forces a fresh introspection and notifies listeners", async () => {
    const store = new FakeGraphStore();
    const cache = new SchemaCache(store, OPTIONS);
    const listener = vi.fn();
    const unsubscribe = cache.onInvalidate(listener);
    await cache.getSchema();

    store.schema = extendedCompanySchema();
    cache.invalidate();

    expect(cache.peek()).toBeNull();
    expect(listener).toHaveBeenCalledTimes(1);
    await expect(cache.getSchema()).resolves.toBe(store.schema);
    expect(store.introspectCalls).toBe(2);

    unsubscribe();
    cache.invalidate();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  test("a load started before invalidation is not cached", async () => {
    const store = new FakeGraphStore();
    const pending = gate();
    store.introspectGate = pending.promise;
    const cache = new SchemaCache(store, OPTIONS);

    const stale = cache.getSchema();
    cache.invalidate();
    store.introspectGate = null;
    const extended = extendedCompanySchema();
    store.schema = extended;
    const fresh = await cache.getSchema();

    store.schema = companySchema();
    pending.open();
    const old = await stale;

    expect(fresh).toBe(extended);
    expect(old.version).toBe(companySchema().version);
    expect(cache.peek()).toBe(extended);
  });
});
