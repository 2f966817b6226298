import { describe, it, expect, vi } from "vitest";
import { NetworkError } from "../../errors";
import { RetryPolicy, retryPolicies, withRetry } from "../retryPolicy";

const connectionError = () => new NetworkError("socket hang up", { kind: "connection" });
const httpError = (status: number) => new NetworkError(`HTTP ${status}`, { kind: "http", status });

describe("RetryPolicy", () => {
  it("retries transient failures with exponential backoff", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const policy = new RetryPolicy({ maxAttempts: 4, initialDelay: 100, jitter: false, sleep });
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw connectionError();
      return "ok";
    });

    await expect(policy.execute(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("does not retry a permanent HTTP status", async () => {
    const policy = new RetryPolicy({ maxAttempts: 5, sleep: async () => {} });
    const fn = vi.fn(async () => {
      throw httpError(404);
    });

    await expect(policy.execute(fn)).rejects.toMatchObject({ kind: "http", status: 404 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("makes one attempt plus the configured retries, then rethrows the last error", async () => {
    const policy = RetryPolicy.fromRetries(2, { sleep: async () => {} });
    const fn = vi.fn(async () => {
      throw httpError(503);
    });

    await expect(policy.execute(fn)).rejects.toMatchObject({ status: 503 });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(policy.maxAttempts).toBe(3);
  });

  it("caps the delay and applies jitter within twenty percent", () => {
    const plain = new RetryPolicy({ initialDelay: 1000, maxDelay: 3000, jitter: false });
    expect([1, 2, 3, 5].map((attempt) => plain.delayFor(attempt))).toEqual([1000, 2000, 3000, 3000]);

    expect(new RetryPolicy({ initialDelay: 1000, random: () => 0 }).delayFor(1)).toBe(800);
    expect(new RetryPolicy({ initialDelay: 1000, random: () => 1 }).delayFor(1)).toBe(1200);
  });

  it("stops retrying once the signal aborts", async () => {
    const controller = new AbortController();
    const policy = new RetryPolicy({
      maxAttempts: 5,
      sleep: async () => {
        controller.abort();
      },
    });
    const fn = vi.fn(async () => {
      throw connectionError();
    });

    await expect(policy.execute(fn, { signal: controller.signal })).rejects.toMatchObject({ kind: "connection" });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("withRetry", () => {
  it("builds a policy from plain options", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw connectionError();
      return attempt;
    });

    await expect(withRetry(fn, { maxAttempts: 2, sleep: async () => {} })).resolves.toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("accepts a preset policy", async () => {
    const fn = vi.fn(async () => {
      throw connectionError();
    });

    await expect(withRetry(fn, retryPolicies.none)).rejects.toMatchObject({ kind: "connection" });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
