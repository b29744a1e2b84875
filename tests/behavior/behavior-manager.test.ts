import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { BehaviorManager } from "../../src/behavior/behavior-manager.js";
import { ProviderError, RetryExhaustedError } from "../../src/errors.js";
import { createLogger } from "../../src/logger.js";
import type { BehaviorSettings } from "../../src/types.js";

const logger = createLogger({ level: "silent", pretty: false });

function makeSettings(overrides: Partial<BehaviorSettings> = {}): BehaviorSettings {
  return {
    rateLimit: { requestsPerSecond: 1, burst: 1, timeoutMs: 10_000 },
    retry: { maxAttempts: 2, backoffMs: 100, maxBackoffMs: 1000, jitter: false },
    ...overrides,
  };
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date("2026-03-01T00:00:00Z"));
});

afterEach(() => {
  vi.useRealTimers();
});

describe("BehaviorManager", () => {
  it("returns the provider call's result and passes the signal through", async () => {
    const manager = new BehaviorManager(makeSettings(), { logger, now: () => Date.now() });
    const controller = new AbortController();
    const fn = vi.fn().mockResolvedValue(["pr"]);

    await expect(manager.executeWithResult("github", "list", fn, controller.signal)).resolves.toEqual(["pr"]);
    expect(fn).toHaveBeenCalledWith(controller.signal);
  });

  it("spaces calls to the same provider by its rate limit", async () => {
    const manager = new BehaviorManager(makeSettings(), { logger, now: () => Date.now() });
    const calledAt: number[] = [];
    const fn = async (): Promise<void> => {
      calledAt.push(Date.now());
    };
    const start = Date.now();

    const both = Promise.all([manager.execute("github", "merge", fn), manager.execute("github", "merge", fn)]);
    await vi.advanceTimersByTimeAsync(1000);
    await both;

    expect(calledAt.map((t) => t - start)).toEqual([0, 1000]);
  });

  it("does not let one provider's quota slow another", async () => {
    const manager = new BehaviorManager(makeSettings(), { logger, now: () => Date.now() });
    const fn = vi.fn().mockResolvedValue(undefined);

    await manager.execute("github", "merge", fn);
    await manager.execute("gitlab", "merge", fn);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("takes a fresh token for every retry attempt", async () => {
    const manager = new BehaviorManager(makeSettings(), { logger, now: () => Date.now() });
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ProviderError("github", "network", "bad gateway"))
      .mockResolvedValueOnce("ok");

    const result = manager.executeWithResult("github", "get-checks", fn);

    // Backoff ends at 100ms, but the bucket only has a token again at 1000ms.
    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    await expect(result).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("labels exhausted retries with provider and operation", async () => {
    const manager = new BehaviorManager(
      makeSettings({ rateLimit: { requestsPerSecond: 0, burst: 1, timeoutMs: 0 } }),
      { logger },
    );
    const fn = vi.fn().mockRejectedValue(new ProviderError("github", "rate-limit", "secondary rate limit"));

    const outcome = manager.executeWithResult("github", "get-pr-status", fn).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(100);
    const err = await outcome;

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({
      kind: "rate-limit",
      message:
        "github get-pr-status failed after 2 attempts: github provider error (rate-limit): secondary rate limit",
    });
  });

  it("reports retry settings and the buckets in use", async () => {
    const manager = new BehaviorManager(makeSettings(), { logger, now: () => Date.now() });
    expect(manager.stats().rateLimiters).toEqual([]);

    await manager.execute("github", "authenticate", async () => undefined);

    expect(manager.stats()).toEqual({
      retry: { maxAttempts: 2, backoffMs: 100, maxBackoffMs: 1000, jitter: false },
      rateLimiters: [{ name: "github", requestsPerSecond: 1, burst: 1, tokens: 0, timeoutMs: 10_000 }],
    });
  });

  it("skips rate limiting entirely when it is disabled", async () => {
    const manager = new BehaviorManager(
      makeSettings({ rateLimit: { requestsPerSecond: 0, burst: 1, timeoutMs: 0 } }),
      { logger },
    );
    const fn = vi.fn().mockResolvedValue(undefined);

    await Promise.all([1, 2, 3].map(() => manager.execute("github", "merge", fn)));

    expect(fn).toHaveBeenCalledTimes(3);
    expect(manager.stats().rateLimiters).toEqual([]);
  });
});
