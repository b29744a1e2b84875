import { logger as rootLogger, type Logger } from "../logger.js";
import type { BehaviorSettings, RetrySettings } from "../types.js";
import { RateLimiterManager, type RateLimiterStats } from "./rate-limiter.js";
import { withRetry } from "./retry.js";

export type ProviderCall<T> = (signal?: AbortSignal) => Promise<T>;

export interface BehaviorManagerOptions {
  logger?: Logger;
  /** Clock for the token buckets; injectable for tests. */
  now?: () => number;
  /** Randomness for retry jitter; injectable for tests. */
  random?: () => number;
}

export interface BehaviorStats {
  retry: RetrySettings;
  rateLimiters: RateLimiterStats[];
}

/**
 * Wraps every outbound provider call with the provider's rate limit and the
 * retry policy. Callers see either the call's result or one final error.
 */
export class BehaviorManager {
  private readonly limiters: RateLimiterManager;
  private readonly retry: RetrySettings;
  private readonly log: Logger;
  private readonly random?: () => number;

  constructor(settings: BehaviorSettings, options: BehaviorManagerOptions = {}) {
    this.limiters = new RateLimiterManager(settings.rateLimit, options.now);
    this.retry = settings.retry;
    this.log = (options.logger ?? rootLogger).child({ component: "behavior-manager" });
    this.random = options.random;
  }

  /** Run a provider call that yields nothing. */
  async execute(
    provider: string,
    operation: string,
    fn: ProviderCall<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.executeWithResult(provider, operation, fn, signal);
  }

  /**
   * Run a provider call under the provider's token bucket, retrying transient
   * failures. Every attempt takes its own token.
   */
  executeWithResult<T>(
    provider: string,
    operation: string,
    fn: ProviderCall<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const bucket = this.limiters.forProvider(provider);
    const log = this.log.child({ provider, operation });

    return withRetry(
      async () => {
        if (bucket) {
          const waited = await bucket.acquire(signal);
          if (waited > 0) {
            log.debug({ waited }, "waited for rate limiter");
          }
        }
        log.debug("executing provider operation");
        return fn(signal);
      },
      {
        settings: this.retry,
        operation: `${provider} ${operation}`,
        logger: log,
        signal,
        random: this.random,
      },
    );
  }

  stats(): BehaviorStats {
    return {
      retry: { ...this.retry },
      rateLimiters: this.limiters.stats(),
    };
  }
}
