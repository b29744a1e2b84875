/**
 * Shared CLI helpers: argument parsers, config loading, the orchestrator factory and the shutdown signal.
 */

import { InvalidArgumentError } from "commander";
import { loadConfig, toOrchestratorSettings, type ConfigFile } from "../config.js";
import { isDuration } from "../duration.js";
import { CancellationError } from "../errors.js";
import { isLogLevel, logger, type LogLevel } from "../logger.js";
import { Orchestrator } from "../orchestrator.js";
import { createProviders } from "../providers/registry.js";
import { OUTPUT_FORMATS, type OutputFormat } from "./output.js";

/** Options every command inherits from the root program. */
export interface GlobalOptions {
  config?: string;
  logLevel?: LogLevel;
}

/** Load config from the global --config option. */
export function loadConfigFromOpts(configPath?: string): ConfigFile {
  return loadConfig(configPath);
}

/** Wire providers and the orchestration core for a loaded config. */
export function buildOrchestrator(config: ConfigFile): Orchestrator {
  return new Orchestrator(createProviders(config, logger), toOrchestratorSettings(config), { logger });
}

/** Validate a duration argument; the text is kept as written so it can appear in skip reasons. */
export function parseDurationOption(value: string): string {
  const trimmed = value.trim();
  if (!isDuration(trimmed)) {
    throw new InvalidArgumentError("Expected a duration such as 30s, 2h or 7d.");
  }
  return trimmed;
}

/** Comma-separated list; repeated flags accumulate. */
export function parseListOption(value: string, previous: string[] = []): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new InvalidArgumentError("Expected a comma-separated list.");
  }
  return [...previous, ...items];
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Output format must be one of: ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return format;
}

export function parseLogLevelOption(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Log level must be one of: debug, info, warn, error, silent.");
  }
  return value;
}

export interface ShutdownHandle {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * AbortSignal that fires on SIGINT or SIGTERM. In-flight work sees the abort
 * through the signal and winds down; `dispose` removes the handlers.
 */
export function createShutdownSignal(): ShutdownHandle {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    console.error(`\n🛑 Received ${name}, shutting down...`);
    controller.abort(new CancellationError(`received ${name}`));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}
