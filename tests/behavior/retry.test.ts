import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { computeBackoff, withRetry } from "../../src/behavior/retry.js";
import { CancellationError, ProviderError, RetryExhaustedError } from "../../src/errors.js";
import { createLogger } from "../../src/logger.js";
import type { RetrySettings } from "../../src/types.js";

const logger = createLogger({ level: "silent", pretty: false });

const settings: RetrySettings = { maxAttempts: 3, backoffMs: 1000, maxBackoffMs: 30_000, jitter: false };

function networkError(): ProviderError {
  return new ProviderError("github", "network", "connection reset");
}

describe("computeBackoff", () => {
  const capped: RetrySettings = { maxAttempts: 5, backoffMs: 1000, maxBackoffMs: 5000, jitter: false };

  it("doubles the delay per attempt up to the cap", () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoff(capped, attempt))).toEqual([1000, 2000, 4000, 5000]);
  });

  it("honors a longer retry-after hint but never past the cap", () => {
    expect(computeBackoff(capped, 1, 3000)).toBe(3000);
    expect(computeBackoff(capped, 1, 60_000)).toBe(5000);
    expect(computeBackoff(capped, 3, 500)).toBe(4000);
  });

  it("adds up to ten percent of jitter", () => {
    const jittered = { ...capped, jitter: true };
    expect(computeBackoff(jittered, 2, 0, () => 0.5)).toBe(2100);
    expect(computeBackoff(jittered, 2, 0, () => 0)).toBe(2000);
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the first successful result without sleeping", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    await expect(withRetry(fn, { settings, operation: "github list", logger })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it("sleeps backoff then twice the backoff before succeeding on the third attempt", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(networkError())
      .mockRejectedValueOnce(networkError())
      .mockResolvedValueOnce("merged");

    const result = withRetry(fn, { settings, operation: "github merge", logger });

    await vi.advanceTimersByTimeAsync(0);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1999);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(3);

    await expect(result).resolves.toBe("merged");
    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
  });

  it("retries errors classified as transient from their message", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("API rate limit exceeded")).mockResolvedValueOnce(42);

    const result = withRetry(fn, { settings, operation: "github rate", logger });
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows non-retryable errors unchanged after one attempt", async () => {
    const authError = new ProviderError("github", "auth", "bad credentials", { statusCode: 401 });
    const fn = vi.fn().mockRejectedValue(authError);

    await expect(withRetry(fn, { settings, operation: "github user", logger })).rejects.toBe(authError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up with RetryExhaustedError after the last attempt", async () => {
    const fn = vi.fn().mockRejectedValue(networkError());

    const outcome = withRetry(fn, { settings, operation: "github list", logger }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(3000);
    const err = await outcome;

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({
      attempts: 3,
      kind: "network",
      message: "github list failed after 3 attempts: github provider error (network): connection reset",
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("stops waiting as soon as the signal fires", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(networkError());

    const outcome = withRetry(fn, {
      settings,
      operation: "github list",
      logger,
      signal: controller.signal,
    }).catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(500);
    controller.abort();
    const err = await outcome;

    expect(err).toBeInstanceOf(CancellationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not call the operation when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue("never");

    await expect(
      withRetry(fn, { settings, operation: "github list", logger, signal: controller.signal }),
    ).rejects.toThrow("github list cancelled");
    expect(fn).not.toHaveBeenCalled();
  });

  it("treats an AbortError from the operation as cancellation", async () => {
    const abortError = new Error("The operation was aborted");
    abortError.name = "AbortError";
    const fn = vi.fn().mockRejectedValue(abortError);

    const err = await withRetry(fn, { settings, operation: "github list", logger }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CancellationError);
    expect(err).toMatchObject({ message: "github list cancelled", cause: abortError });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
