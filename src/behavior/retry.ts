import { sleep } from "../abort.js";
import {
  CancellationError,
  ProviderError,
  RetryExhaustedError,
  classifyError,
  errorMessage,
  isCancellation,
  isRetryable,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { RetrySettings } from "../types.js";

export interface RetryOptions {
  settings: RetrySettings;
  /** Used in log lines and in the exhaustion message. */
  operation: string;
  logger: Logger;
  signal?: AbortSignal;
  /** Source of randomness for jitter; injectable for tests. */
  random?: () => number;
}

/**
 * Delay before the next attempt. `attempt` counts from 1, so the first retry
 * waits `backoffMs`, the second `2 * backoffMs`, and so on up to `maxBackoffMs`.
 * A provider retry-after hint raises the delay but never past the cap.
 */
export function computeBackoff(
  settings: RetrySettings,
  attempt: number,
  retryAfterMs = 0,
  random: () => number = Math.random,
): number {
  const exponential = settings.backoffMs * 2 ** (attempt - 1);
  let delay = Math.min(Math.max(exponential, retryAfterMs), settings.maxBackoffMs);
  if (settings.jitter) {
    delay += Math.floor(delay * 0.1 * random());
  }
  return delay;
}

function retryAfterOf(err: unknown): number {
  return err instanceof ProviderError && err.retryAfterMs !== undefined ? err.retryAfterMs : 0;
}

function asCancellation(err: unknown, operation: string): CancellationError {
  return err instanceof CancellationError
    ? err
    : new CancellationError(`${operation} cancelled`, { cause: err });
}

/**
 * Run `fn` until it succeeds, a non-retryable error occurs, or attempts run out.
 * Only `rate-limit` and `network` failures are retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { settings, operation, logger, signal, random } = options;
  const maxAttempts = Math.max(1, settings.maxAttempts);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new CancellationError(`${operation} cancelled`, { cause: signal.reason });
    }

    try {
      const result = await fn(attempt);
      if (attempt > 1) {
        logger.info({ operation, attempt }, "operation succeeded after retry");
      }
      return result;
    } catch (err: unknown) {
      lastError = err;

      if (isCancellation(err) || signal?.aborted) {
        throw asCancellation(err, operation);
      }
      if (!isRetryable(err)) {
        logger.debug({ operation, kind: classifyError(err), err: errorMessage(err) }, "error not retryable");
        throw err;
      }
      if (attempt === maxAttempts) {
        break;
      }

      const delay = computeBackoff(settings, attempt, retryAfterOf(err), random);
      logger.warn(
        { operation, attempt, maxAttempts, delay, err: errorMessage(err) },
        "operation failed, retrying",
      );
      await sleep(delay, signal);
    }
  }

  logger.warn({ operation, attempts: maxAttempts }, "all attempts failed, giving up");
  throw new RetryExhaustedError(operation, maxAttempts, lastError);
}
