/**
 * Unit tests for retry utility
 *
 * Covers conditional retry, delays derived from config and the retry callbacks.
 */

import { describe, test, expect, vi } from "vitest";
import type pino from "pino";
import {
  withRetry,
  defaultExponentialBackoff,
  createRetryLogger,
  createRetryOptions,
  toError,
} from "../../../src/utils/retry.js";

const noDelay = (): number => 0;

describe("defaultExponentialBackoff", () => {
  test("doubles from one second", () => {
    expect(defaultExponentialBackoff(0)).toBe(1000);
    expect(defaultExponentialBackoff(1)).toBe(2000);
    expect(defaultExponentialBackoff(3)).toBe(8000);
  });
});

describe("withRetry", () => {
  test("returns the first success without retrying", async () => {
    const operation = vi.fn(() => Promise.resolve("ok"));

    await expect(withRetry(operation, { maxRetries: 3 })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("succeeds after transient failures", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      if (attempts < 3) throw new Error(`attempt ${attempts} failed`);
      return "done";
    });

    await expect(withRetry(operation, { maxRetries: 3, calculateBackoff: noDelay })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("throws the last error once retries are exhausted", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      throw new Error(`failure ${attempts}`);
    });

    await expect(withRetry(operation, { maxRetries: 2, calculateBackoff: noDelay })).rejects.toThrow("failure 3");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("stops at the first error shouldRetry rejects", async () => {
    const operation = vi.fn(() => Promise.reject(new Error("authentication failed")));
    const shouldRetry = vi.fn((error: Error) => !error.message.includes("authentication"));

    await expect(
      withRetry(operation, { maxRetries: 3, shouldRetry, calculateBackoff: noDelay })
    ).rejects.toThrow("authentication failed");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledTimes(1);
  });

  test("makes a single attempt with maxRetries 0", async () => {
    const operation = vi.fn(() => Promise.reject(new Error("once")));

    await expect(withRetry(operation, { maxRetries: 0 })).rejects.toThrow("once");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("reports each retry with its zero-based attempt and delay", async () => {
    let attempts = 0;
    const onRetry = vi.fn();
    const operation = async (): Promise<number> => {
      attempts++;
      if (attempts < 3) throw new Error("busy");
      return attempts;
    };

    await withRetry(operation, { maxRetries: 3, calculateBackoff: noDelay, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((call) => [call[0], call[2]])).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });

  test("normalizes non-Error rejections", async () => {
    await expect(withRetry(() => Promise.reject("plain string"), { maxRetries: 0 })).rejects.toThrow("plain string");
  });
});

describe("createRetryOptions", () => {
  test("derives backoff from config and keeps overrides", () => {
    const shouldRetry = (): boolean => false;
    const options = createRetryOptions(
      { maxRetries: 2, initialDelayMs: 10, maxDelayMs: 100, backoffMultiplier: 2 },
      { shouldRetry }
    );

    expect(options.maxRetries).toBe(2);
    expect(options.shouldRetry).toBe(shouldRetry);
    expect(options.calculateBackoff?.(1, new Error("x"))).toBe(20);
  });

  test("applies the multiplier and caps each delay", () => {
    const { calculateBackoff } = createRetryOptions({
      maxRetries: 4,
      initialDelayMs: 100,
      maxDelayMs: 1000,
      backoffMultiplier: 3,
    });
    const error = new Error("x");

    expect([0, 1, 2, 3].map((attempt) => calculateBackoff?.(attempt, error))).toEqual([100, 300, 900, 1000]);
  });
});

describe("createRetryLogger", () => {
  test("logs one-based attempts at warn", () => {
    const warn = vi.fn();
    const logger = { warn } as unknown as pino.Logger;

    createRetryLogger(logger, "Neo4j read", 3)(0, new TypeError("socket hang up"), 1000);

    expect(warn).toHaveBeenCalledWith(
      { attempt: 1, maxRetries: 3, delayMs: 1000, error: "socket hang up", errorType: "TypeError" },
      "Retrying Neo4j read"
    );
  });
});

describe("toError", () => {
  test("passes errors through and wraps anything else", () => {
    const error = new Error("kept");
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe("42");
  });
});
