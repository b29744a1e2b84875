/**
 * CLI command definitions: check, merge, watch, validate, auth and limits.
 */

import type { Command } from "commander";
import { listRepositories, watchIntervalMs, type ConfigFile } from "../config.js";
import { sleep } from "../abort.js";
import { formatDuration, parseDuration } from "../duration.js";
import { errorMessage, isCancellation } from "../errors.js";
import { logger, setLogLevel } from "../logger.js";
import { summarizeMerges } from "../metrics.js";
import type { Orchestrator } from "../orchestrator.js";
import { createProviders } from "../providers/registry.js";
import type { MergeOptions, ProcessOptions } from "../types.js";
import {
  buildOrchestrator,
  createShutdownSignal,
  loadConfigFromOpts,
  parseDurationOption,
  parseListOption,
  parseOutputFormat,
  type GlobalOptions,
} from "./helpers.js";
import {
  formatMergeResults,
  formatProcessResults,
  formatRateLimits,
  renderJson,
  type OutputFormat,
  type ProcessViewOptions,
} from "./output.js";

interface SelectionFlags {
  providers?: string[];
  repos?: string[];
  maxAge?: string;
}

interface CheckFlags extends SelectionFlags {
  requireChecks: boolean;
  output: OutputFormat;
  readyOnly: boolean;
  showSkipped: boolean;
}

interface MergeFlags extends SelectionFlags {
  dryRun: boolean;
  force: boolean;
  deleteBranches: boolean;
  message?: string;
  output: OutputFormat;
}

interface WatchFlags extends SelectionFlags {
  interval?: string;
  merge: boolean;
  dryRun: boolean;
}

/** Register all CLI commands on the given Commander program. */
export function registerCommands(program: Command): void {
  registerCheck(program);
  registerMerge(program);
  registerWatch(program);
  registerValidate(program);
  registerAuth(program);
  registerLimits(program);
}

/** Load the config and apply its log level unless --log-level overrides it. */
function loadForCommand(program: Command): ConfigFile {
  const { config: configPath, logLevel } = program.opts<GlobalOptions>();
  const config = loadConfigFromOpts(configPath);
  setLogLevel(logLevel ?? config.logging.level);
  return config;
}

function processOptionsFrom(flags: SelectionFlags, requireChecks: boolean): ProcessOptions {
  return {
    providers: flags.providers,
    repositories: flags.repos,
    maxAgeMs: flags.maxAge !== undefined ? parseDuration(flags.maxAge) : undefined,
    maxAgeLabel: flags.maxAge,
    requireChecks,
  };
}

function fail(what: string, err: unknown): void {
  if (isCancellation(err)) {
    console.error(`🛑 ${what} cancelled.`);
  } else {
    logger.error({ err: errorMessage(err) }, `${what} failed`);
    console.error(`❌ ${what} failed: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
}

function withSelectionOptions(command: Command): Command {
  return command
    .option("--providers <list>", "Only these providers (comma-separated)", parseListOption)
    .option("--repos <list>", "Only repositories whose name contains one of these (comma-separated)", parseListOption)
    .option("--max-age <duration>", "Skip pull requests older than this (e.g. 7d)", parseDurationOption);
}

// --- check ---
function registerCheck(program: Command): void {
  withSelectionOptions(program.command("check"))
    .description("Evaluate open pull requests without merging")
    .option("--require-checks", "Require passing status checks everywhere", false)
    .option("--output <format>", "Output format: table or json", parseOutputFormat, "table")
    .option("--ready-only", "Only list pull requests that are ready", false)
    .option("--show-skipped", "Also list skipped pull requests", false)
    .action(async (flags: CheckFlags) => {
      const shutdown = createShutdownSignal();
      try {
        const orchestrator = buildOrchestrator(loadForCommand(program));
        const results = await orchestrator.processPRs(
          processOptionsFrom(flags, flags.requireChecks),
          shutdown.signal,
        );
        if (flags.output === "json") {
          console.log(renderJson(results));
        } else {
          const view: ProcessViewOptions = { readyOnly: flags.readyOnly, showSkipped: flags.showSkipped };
          console.log(formatProcessResults(results, view).join("\n"));
        }
      } catch (err: unknown) {
        fail("Check", err);
      } finally {
        shutdown.dispose();
      }
    });
}

// --- merge ---
function registerMerge(program: Command): void {
  withSelectionOptions(program.command("merge"))
    .description("Merge every pull request that is ready")
    .option("--dry-run", "Report what would be merged without merging", false)
    .option("--force", "Also merge pull requests blocked by checks or state", false)
    .option("--delete-branches", "Delete head branches after merging", false)
    .option("--message <text>", "Custom commit title for every merge")
    .option("--output <format>", "Output format: table or json", parseOutputFormat, "table")
    .action(async (flags: MergeFlags) => {
      const shutdown = createShutdownSignal();
      try {
        const config = loadForCommand(program);
        const orchestrator = buildOrchestrator(config);
        const dryRun = flags.dryRun || config.behavior.dry_run;
        const options: MergeOptions = {
          dryRun,
          force: flags.force,
          deleteBranches: flags.deleteBranches,
          customMessage: flags.message,
        };

        const processed = await orchestrator.processPRs(processOptionsFrom(flags, true), shutdown.signal);
        const results = await orchestrator.mergePRs(processed, options, shutdown.signal);

        if (flags.output === "json") {
          console.log(renderJson(results));
        } else {
          console.log(formatMergeResults(results, dryRun).join("\n"));
        }
        if (summarizeMerges(results).failed > 0) {
          process.exitCode = 1;
        }
      } catch (err: unknown) {
        fail("Merge", err);
      } finally {
        shutdown.dispose();
      }
    });
}

async function watchPass(orchestrator: Orchestrator, flags: WatchFlags, dryRun: boolean, signal: AbortSignal): Promise<void> {
  const processed = await orchestrator.processPRs(processOptionsFrom(flags, flags.merge), signal);
  console.log(`\n🔎 ${new Date().toISOString()}`);
  console.log(formatProcessResults(processed).join("\n"));
  if (flags.merge) {
    const merged = await orchestrator.mergePRs(processed, { dryRun }, signal);
    console.log(formatMergeResults(merged, dryRun).join("\n"));
  }
}

// --- watch ---
function registerWatch(program: Command): void {
  withSelectionOptions(program.command("watch"))
    .description("Re-check (and optionally merge) on an interval until interrupted")
    .option("--interval <duration>", "Time between passes (default: behavior.watch_interval)", parseDurationOption)
    .option("--merge", "Merge ready pull requests on every pass", false)
    .option("--dry-run", "With --merge, report instead of merging", false)
    .action(async (flags: WatchFlags) => {
      const shutdown = createShutdownSignal();
      const { signal } = shutdown;
      try {
        const config = loadForCommand(program);
        const orchestrator = buildOrchestrator(config);
        const intervalMs = flags.interval !== undefined ? parseDuration(flags.interval) : watchIntervalMs(config);
        const dryRun = flags.dryRun || config.behavior.dry_run;
        console.log(`👀 Watching every ${formatDuration(intervalMs)} (Ctrl+C to stop)`);

        while (!signal.aborted) {
          try {
            await watchPass(orchestrator, flags, dryRun, signal);
          } catch (err: unknown) {
            if (isCancellation(err)) break;
            logger.error({ err: errorMessage(err) }, "watch pass failed");
            console.error(`❌ Watch pass failed: ${errorMessage(err)}`);
          }
          try {
            await sleep(intervalMs, signal);
          } catch (err: unknown) {
            if (isCancellation(err)) break;
            throw err;
          }
        }
        console.log("👋 Watch stopped.");
      } catch (err: unknown) {
        fail("Watch", err);
      } finally {
        shutdown.dispose();
      }
    });
}

// --- validate ---
function registerValidate(program: Command): void {
  program
    .command("validate")
    .description("Validate the configuration file")
    .action(() => {
      try {
        const config = loadForCommand(program);
        const providers = createProviders(config);
        const repositories = listRepositories(config);
        const { behavior, pr_filters: filters } = config;

        console.log("✅ Configuration is valid");
        console.log(`  Providers:      ${[...providers.keys()].join(", ") || "(none)"}`);
        console.log(`  Repositories:   ${repositories.length}`);
        for (const repo of repositories) {
          const checks = repo.requireChecks ? "checks required" : "checks optional";
          console.log(`    ${repo.provider} ${repo.name} (${repo.mergeStrategy}, ${checks})`);
        }
        console.log(`  Allowed actors: ${filters.allowed_actors.join(", ")}`);
        if (filters.skip_labels.length > 0) {
          console.log(`  Skip labels:    ${filters.skip_labels.join(", ")}`);
        }
        if (filters.max_age) {
          console.log(`  Max age:        ${filters.max_age}`);
        }
        console.log(`  Concurrency:    ${behavior.concurrency}${behavior.dry_run ? " (dry run)" : ""}`);
        console.log(
          `  Rate limit:     ${behavior.rate_limit.requests_per_second} req/s, burst ${behavior.rate_limit.burst}`,
        );
        console.log(
          `  Retry:          ${behavior.retry.max_attempts} attempts, backoff ${behavior.retry.backoff}..${behavior.retry.max_backoff}`,
        );
      } catch (err: unknown) {
        fail("Validation", err);
      }
    });
}

// --- auth ---
function registerAuth(program: Command): void {
  program
    .command("auth")
    .description("Check authentication with every configured provider")
    .action(async () => {
      const shutdown = createShutdownSignal();
      try {
        const orchestrator = buildOrchestrator(loadForCommand(program));
        const results = await orchestrator.authenticate(shutdown.signal);
        for (const result of results) {
          console.log(
            result.success
              ? `✅ ${result.provider}: authenticated`
              : `❌ ${result.provider}: ${result.error?.message ?? "authentication failed"}`,
          );
        }
        if (results.some((r) => !r.success)) {
          process.exitCode = 1;
        }
      } catch (err: unknown) {
        fail("Authentication", err);
      } finally {
        shutdown.dispose();
      }
    });
}

// --- limits ---
function registerLimits(program: Command): void {
  program
    .command("limits")
    .description("Show API rate-limit state for every provider")
    .action(async () => {
      const shutdown = createShutdownSignal();
      try {
        const orchestrator = buildOrchestrator(loadForCommand(program));
        const results = await orchestrator.rateLimits(shutdown.signal);
        console.log(formatRateLimits(results, orchestrator.behavior.stats()).join("\n"));
      } catch (err: unknown) {
        fail("Rate limit lookup", err);
      } finally {
        shutdown.dispose();
      }
    });
}
