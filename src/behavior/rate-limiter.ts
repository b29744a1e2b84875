import { sleep, throwIfAborted } from "../abort.js";
import { ProviderError } from "../errors.js";
import type { RateLimitSettings } from "../types.js";

export interface RateLimiterStats {
  name: string;
  requestsPerSecond: number;
  burst: number;
  /** Tokens available right now; negative while callers are queued. */
  tokens: number;
  timeoutMs: number;
}

/**
 * Continuously refilled token bucket.
 *
 * A caller reserves its token synchronously before it starts waiting, so
 * concurrent callers queue up behind each other without any lock: the event
 * loop never interleaves two reservations.
 */
export class TokenBucket {
  readonly name: string;
  private readonly settings: RateLimitSettings;
  private readonly now: () => number;
  private tokens: number;
  private updatedAt: number;

  constructor(name: string, settings: RateLimitSettings, now: () => number = Date.now) {
    if (settings.requestsPerSecond <= 0) {
      throw new Error(`rate limiter ${name}: requests per second must be positive`);
    }
    this.name = name;
    this.settings = { ...settings, burst: Math.max(1, settings.burst) };
    this.now = now;
    this.tokens = this.settings.burst;
    this.updatedAt = now();
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.updatedAt);
    this.tokens = Math.min(
      this.settings.burst,
      this.tokens + (elapsedMs / 1000) * this.settings.requestsPerSecond,
    );
    this.updatedAt = now;
  }

  /**
   * Wait for a token.
   * @returns how long the caller waited, in milliseconds.
   * @throws ProviderError ("rate-limit") when the wait would exceed the timeout.
   * @throws CancellationError when the signal fires first.
   */
  async acquire(signal?: AbortSignal): Promise<number> {
    throwIfAborted(signal, `rate limiter ${this.name}`);
    this.refill();

    const deficit = 1 - this.tokens;
    const delayMs = deficit > 0 ? Math.ceil((deficit / this.settings.requestsPerSecond) * 1000) : 0;
    if (delayMs > this.settings.timeoutMs) {
      throw new ProviderError(
        this.name,
        "rate-limit",
        `rate limiter wait of ${delayMs}ms exceeds timeout of ${this.settings.timeoutMs}ms`,
      );
    }

    this.tokens -= 1;
    if (delayMs === 0) {
      return 0;
    }

    try {
      await sleep(delayMs, signal);
    } catch (err: unknown) {
      // Give the reservation back so later callers do not wait for it.
      this.refill();
      this.tokens = Math.min(this.settings.burst, this.tokens + 1);
      throw err;
    }
    return delayMs;
  }

  stats(): RateLimiterStats {
    this.refill();
    return {
      name: this.name,
      requestsPerSecond: this.settings.requestsPerSecond,
      burst: this.settings.burst,
      tokens: this.tokens,
      timeoutMs: this.settings.timeoutMs,
    };
  }
}

/**
 * One bucket per provider, created on first use. Operations of the same
 * provider share its bucket because they share one upstream quota.
 */
export class RateLimiterManager {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly settings: RateLimitSettings;
  private readonly now: () => number;

  constructor(settings: RateLimitSettings, now: () => number = Date.now) {
    this.settings = settings;
    this.now = now;
  }

  get enabled(): boolean {
    return this.settings.requestsPerSecond > 0;
  }

  /** The provider's bucket, or undefined when rate limiting is disabled. */
  forProvider(provider: string): TokenBucket | undefined {
    if (!this.enabled) {
      return undefined;
    }
    let bucket = this.buckets.get(provider);
    if (!bucket) {
      bucket = new TokenBucket(provider, this.settings, this.now);
      this.buckets.set(provider, bucket);
    }
    return bucket;
  }

  stats(): RateLimiterStats[] {
    return [...this.buckets.values()].map((bucket) => bucket.stats());
  }
}
