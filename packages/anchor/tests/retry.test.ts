/**
 * Tests for retry with exponential backoff.
 */

import { describe, it, expect, vi } from "vitest";
import {
  withRetry,
  RetryExhaustedError,
  computeDelay,
  isRetryableRpcError,
} from "../src/resilience/retry.js";
import type { RetryConfig } from "../src/resilience/retry.js";
import { CircuitOpenError } from "../src/resilience/circuit-breaker.js";

const fastConfig: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 10,
  maxDelayMs: 100,
  jitterMs: 0,
};

const noopSleep = async (_ms: number) => {};

describe("withRetry", () => {
  it("returns result on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    await expect(withRetry(fn, fastConfig, () => true, noopSleep)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries until success", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error("fail-1"))
      .mockRejectedValueOnce(new Error("fail-2"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, fastConfig, () => true, noopSleep)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("throws RetryExhaustedError carrying attempts and the last error", async () => {
    const lastErr = new Error("last");
    const fn = vi.fn().mockRejectedValue(lastErr);

    const err = await withRetry(fn, fastConfig, () => true, noopSleep).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 3, lastError: lastErr, cause: lastErr });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("rethrows a non-retryable error immediately", async () => {
    const permanent = new Error("permanent");
    const fn = vi.fn().mockRejectedValue(permanent);

    await expect(withRetry(fn, fastConfig, () => false, noopSleep)).rejects.toBe(permanent);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("sleeps the computed backoff between attempts, not after the last", async () => {
    const sleeps: number[] = [];
    const fn = vi.fn().mockRejectedValue(new Error("down"));

    await withRetry(fn, fastConfig, () => true, async (ms) => {
      sleeps.push(ms);
    }).catch(() => undefined);

    expect(sleeps).toEqual([10, 20]);
  });

  it("reports each retry to the listener", async () => {
    const onRetry = vi.fn();
    const failure = new Error("flaky");
    const fn = vi.fn().mockRejectedValueOnce(failure).mockResolvedValueOnce(1);

    await withRetry(fn, fastConfig, () => true, noopSleep, onRetry);
    expect(onRetry).toHaveBeenCalledWith(1, failure, 10);
  });
});

describe("computeDelay", () => {
  it("doubles per attempt and caps at maxDelayMs", () => {
    expect(computeDelay(0, fastConfig)).toBe(10);
    expect(computeDelay(1, fastConfig)).toBe(20);
    expect(computeDelay(3, fastConfig)).toBe(80);
    expect(computeDelay(4, fastConfig)).toBe(100);
  });

  it("adds at most jitterMs", () => {
    const withJitter = { ...fastConfig, jitterMs: 5 };
    for (let i = 0; i < 20; i++) {
      const delay = computeDelay(0, withJitter);
      expect(delay).toBeGreaterThanOrEqual(10);
      expect(delay).toBeLessThan(15);
    }
  });
});

describe("isRetryableRpcError", () => {
  it("retries network and timeout failures", () => {
    expect(isRetryableRpcError(new Error("fetch failed"))).toBe(true);
    expect(isRetryableRpcError(new Error("The request took too long to respond."))).toBe(true);
    expect(isRetryableRpcError("opaque")).toBe(true);
  });

  it("does not retry permanent failures", () => {
    expect(isRetryableRpcError(new Error("Execution reverted for an unknown reason."))).toBe(false);
    expect(isRetryableRpcError(new Error("insufficient funds for gas * price + value"))).toBe(false);
    expect(isRetryableRpcError(new CircuitOpenError("Circuit breaker is OPEN", 100))).toBe(false);
  });
});
