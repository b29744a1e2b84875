import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { CancellationError, ProviderError, classifyError, isCancellation, type ErrorKind } from "../../errors.js";
import { logger as rootLogger, type Logger } from "../../logger.js";

const execFileAsync = promisify(execFile);

export const PROVIDER_NAME = "github";

/** gh's exit code when no usable login is available. */
const GH_AUTH_EXIT_CODE = 4;

const MAX_BUFFER = 16 * 1024 * 1024;

export interface GhOptions {
  /** Passed to gh as GH_TOKEN; gh's own stored login is used when absent. */
  token?: string;
  signal?: AbortSignal;
  logger?: Logger;
}

function stringField(err: Error, field: "stderr" | "code"): string | undefined {
  if (field in err) {
    const value: unknown = Reflect.get(err, field);
    if (typeof value === "string") return value;
  }
  return undefined;
}

function exitCode(err: Error): number | undefined {
  if ("code" in err && typeof err.code === "number") {
    return err.code;
  }
  return undefined;
}

/** Maps the HTTP status gh prints on failure ("... (HTTP 404)") onto an error kind. */
export function kindForStatus(status: number, text: string): ErrorKind {
  if (status === 401) return "auth";
  if (status === 403) return /rate limit/i.test(text) ? "rate-limit" : "permission";
  if (status === 404) return "not-found";
  if (status === 405 || status === 409) return "conflict";
  if (status === 422) return "validation";
  if (status === 429) return "rate-limit";
  if (status >= 500) return "network";
  return "unknown";
}

/** Turn a failed gh invocation into a classified ProviderError. */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new ProviderError(PROVIDER_NAME, "unknown", String(error));
  }

  if (stringField(error, "code") === "ENOENT") {
    return new ProviderError(PROVIDER_NAME, "unknown", "gh CLI not found. Install it: https://cli.github.com/", {
      cause: error,
    });
  }
  if (exitCode(error) === GH_AUTH_EXIT_CODE) {
    return new ProviderError(PROVIDER_NAME, "auth", "gh CLI not authenticated. Run: gh auth login", {
      cause: error,
    });
  }

  const stderr = stringField(error, "stderr")?.trim() ?? "";
  const text = stderr || error.message;
  const detail = text.split("\n")[0]?.replace(/^gh:\s*/, "") ?? text;

  const status = /\(HTTP (\d{3})\)/.exec(text);
  if (status?.[1]) {
    const statusCode = Number(status[1]);
    return new ProviderError(PROVIDER_NAME, kindForStatus(statusCode, text), detail, {
      statusCode,
      cause: error,
    });
  }
  return new ProviderError(PROVIDER_NAME, classifyError(error), detail, { cause: error });
}

/**
 * Run a `gh` CLI command and return its trimmed stdout. Retrying is left to
 * the caller: every failure is thrown as a classified ProviderError, and an
 * aborted signal kills the child process.
 */
export async function execGh(args: string[], options: GhOptions = {}): Promise<string> {
  const logger = options.logger ?? rootLogger;
  logger.debug({ args }, "gh %s", args[0]);

  const env = options.token ? { ...process.env, GH_TOKEN: options.token } : process.env;
  try {
    const { stdout } = await execFileAsync("gh", args, {
      env,
      signal: options.signal,
      maxBuffer: MAX_BUFFER,
    });
    return stdout.trim();
  } catch (error: unknown) {
    if (isCancellation(error) || options.signal?.aborted) {
      throw new CancellationError("gh command cancelled", { cause: error });
    }
    const providerError = toProviderError(error);
    logger.debug({ args, kind: providerError.kind, error: providerError.message }, "gh command failed");
    throw providerError;
  }
}
