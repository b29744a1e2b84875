// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration options for creating a pino logger instance.
 *
 * @property level - Log severity threshold. Messages below this level are suppressed.
 * @property name - Logger name included in every log entry.
 * @property pretty - Enable pino-pretty for human-readable output. Defaults to true in non-production.
 */
export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

const REDACT_PATHS = [
  "*.password",
  "*.token",
  "*.secret",
  "*.apiKey",
  "*.authorization",
];

/**
 * Create a new pino logger with the given options.
 *
 * Sensitive fields (password, token, secret, apiKey, authorization) are
 * automatically redacted.
 *
 * @param options - Logger configuration. Defaults to info level with pretty output in non-production.
 * @returns A configured pino Logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    name = "pr-fleet",
    pretty = process.env["NODE_ENV"] !== "production",
  } = options;

  const pinoOptions = {
    name,
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
  };

  // Logs go to stderr so that report output on stdout stays machine-readable.
  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
    });
  }
  return pino(pinoOptions, pino.destination(2));
}

/** Narrow a log-level string coming from the CLI or environment. */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env["PR_FLEET_LOG_LEVEL"] ?? "";

/** Default logger instance for convenience. */
export const logger = createLogger({ level: isLogLevel(envLevel) ? envLevel : "info" });

/**
 * Change the root logger's threshold. Child loggers created afterwards
 * inherit the new level; existing children keep theirs.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
