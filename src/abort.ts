import { CancellationError } from "./errors.js";

/** Throw a CancellationError when the signal has already fired. */
export function throwIfAborted(signal: AbortSignal | undefined, what = "operation"): void {
  if (signal?.aborted) {
    throw new CancellationError(`${what} cancelled`, { cause: signal.reason });
  }
}

/**
 * Resolve after `ms`, or reject with a CancellationError as soon as the
 * signal fires. The timer is cleared either way.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancellationError("sleep cancelled", { cause: signal.reason }));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancellationError("sleep cancelled", { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
