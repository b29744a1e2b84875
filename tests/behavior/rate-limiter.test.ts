import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { RateLimiterManager, TokenBucket } from "../../src/behavior/rate-limiter.js";
import { CancellationError, ProviderError } from "../../src/errors.js";

const clock = () => Date.now();

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date("2026-03-01T00:00:00Z"));
});

afterEach(() => {
  vi.useRealTimers();
});

describe("TokenBucket", () => {
  it("rejects a non-positive rate", () => {
    expect(() => new TokenBucket("github", { requestsPerSecond: 0, burst: 1, timeoutMs: 1000 })).toThrow(
      "rate limiter github: requests per second must be positive",
    );
  });

  it("spaces calls one second apart at 1 rps with burst 1", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 1, burst: 1, timeoutMs: 10_000 }, clock);

    expect(await bucket.acquire()).toBe(0);

    let settled = false;
    const second = bucket.acquire().then((waited) => {
      settled = true;
      return waited;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await second).toBe(1000);
  });

  it("queues concurrent callers behind each other", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 1, burst: 1, timeoutMs: 10_000 }, clock);

    const waits = Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);
    await vi.advanceTimersByTimeAsync(2000);

    expect(await waits).toEqual([0, 1000, 2000]);
  });

  it("lets a burst through without waiting", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 1, burst: 3, timeoutMs: 10_000 }, clock);

    expect(await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()])).toEqual([0, 0, 0]);
  });

  it("fails with a rate-limit error when the wait would exceed the timeout", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 1, burst: 1, timeoutMs: 500 }, clock);
    await bucket.acquire();

    const err = await bucket.acquire().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      kind: "rate-limit",
      provider: "github",
      message: "github provider error (rate-limit): rate limiter wait of 1000ms exceeds timeout of 500ms",
    });
    // A refused caller does not hold a reservation.
    expect(bucket.stats().tokens).toBe(0);
  });

  it("gives the token back when the wait is cancelled", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 1, burst: 1, timeoutMs: 10_000 }, clock);
    await bucket.acquire();

    const controller = new AbortController();
    const pending = bucket.acquire(controller.signal);
    await vi.advanceTimersByTimeAsync(500);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancellationError);
    expect(bucket.stats().tokens).toBeCloseTo(0.5);
  });

  it("refuses immediately when the signal has already fired", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 1, burst: 1, timeoutMs: 10_000 }, clock);
    const controller = new AbortController();
    controller.abort();

    await expect(bucket.acquire(controller.signal)).rejects.toThrow("rate limiter github cancelled");
    expect(bucket.stats().tokens).toBe(1);
  });

  it("refills spent tokens over time", async () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 2, burst: 2, timeoutMs: 1000 }, clock);

    expect(await bucket.acquire()).toBe(0);
    expect(await bucket.acquire()).toBe(0);
    expect(bucket.stats().tokens).toBe(0);

    vi.advanceTimersByTime(500);
    expect(bucket.stats().tokens).toBe(1);
  });

  it("never refills past the burst size", () => {
    const bucket = new TokenBucket("github", { requestsPerSecond: 10, burst: 2, timeoutMs: 1000 }, clock);
    vi.advanceTimersByTime(60_000);

    expect(bucket.stats()).toEqual({
      name: "github",
      requestsPerSecond: 10,
      burst: 2,
      tokens: 2,
      timeoutMs: 1000,
    });
  });
});

describe("RateLimiterManager", () => {
  it("is disabled when the rate is zero", () => {
    const manager = new RateLimiterManager({ requestsPerSecond: 0, burst: 1, timeoutMs: 1000 });

    expect(manager.enabled).toBe(false);
    expect(manager.forProvider("github")).toBeUndefined();
    expect(manager.stats()).toEqual([]);
  });

  it("creates one bucket per provider on first use", () => {
    const manager = new RateLimiterManager({ requestsPerSecond: 5, burst: 10, timeoutMs: 1000 }, clock);

    const github = manager.forProvider("github");
    expect(manager.forProvider("github")).toBe(github);
    expect(manager.forProvider("gitlab")).not.toBe(github);
    expect(manager.stats().map((s) => s.name)).toEqual(["github", "gitlab"]);
  });

  it("keeps provider quotas independent", async () => {
    const manager = new RateLimiterManager({ requestsPerSecond: 1, burst: 1, timeoutMs: 1000 }, clock);

    await manager.forProvider("github")?.acquire();
    expect(manager.forProvider("github")?.stats().tokens).toBe(0);
    expect(manager.forProvider("gitlab")?.stats().tokens).toBe(1);
  });
});
