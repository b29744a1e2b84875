// Error taxonomy shared by providers, the behavior manager and the orchestrators.

export type ErrorKind =
  | "auth"
  | "permission"
  | "not-found"
  | "conflict"
  | "validation"
  | "rate-limit"
  | "network"
  | "unknown";

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["rate-limit", "network"]);

export interface ProviderErrorOptions {
  statusCode?: number;
  /** Provider-supplied hint for how long to wait before trying again. */
  retryAfterMs?: number;
  cause?: unknown;
}

/** A failed provider call, classified so callers can decide whether to retry. */
export class ProviderError extends Error {
  readonly kind: ErrorKind;
  readonly provider: string;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(provider: string, kind: ErrorKind, message: string, options: ProviderErrorOptions = {}) {
    super(`${provider} provider error (${kind}): ${message}`, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.provider = provider;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Thrown once every retry attempt of a transient failure has been used up. */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly kind: ErrorKind;

  constructor(operation: string, attempts: number, lastError: unknown) {
    super(`${operation} failed after ${attempts} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.kind = classifyError(lastError);
  }
}

/** The run's abort signal fired while waiting or working. */
export class CancellationError extends Error {
  constructor(message = "operation cancelled", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CancellationError";
  }
}

/** A run-level failure: nothing could be scheduled at all. */
export class OrchestrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OrchestrationError";
  }
}

/** Missing or invalid configuration file. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const NETWORK_ERRNO_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

const RATE_LIMIT_PATTERNS = ["rate limit", "rate-limit", "too many requests"];

const NETWORK_PATTERNS = [
  "connection reset",
  "connection refused",
  "timeout",
  "timed out",
  "temporary failure",
  "bad gateway",
  "service unavailable",
  "gateway timeout",
];

/** Extract a printable message from any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for our own cancellation error and for DOM-style AbortErrors. */
export function isCancellation(err: unknown): boolean {
  return err instanceof CancellationError || (err instanceof Error && err.name === "AbortError");
}

function errnoCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Map any thrown value onto the error taxonomy. */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof ProviderError || err instanceof RetryExhaustedError) {
    return err.kind;
  }
  if (!(err instanceof Error) || isCancellation(err)) {
    return "unknown";
  }

  const code = errnoCode(err);
  if (code && NETWORK_ERRNO_CODES.has(code)) {
    return "network";
  }

  const message = err.message.toLowerCase();
  if (RATE_LIMIT_PATTERNS.some((p) => message.includes(p))) {
    return "rate-limit";
  }
  if (NETWORK_PATTERNS.some((p) => message.includes(p))) {
    return "network";
  }
  return "unknown";
}

/** Only transient kinds are worth another attempt. */
export function isRetryable(err: unknown): boolean {
  return !isCancellation(err) && RETRYABLE_KINDS.has(classifyError(err));
}
