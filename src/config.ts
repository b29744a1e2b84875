// Config loader: parse pr-fleet.config.yaml with Zod validation

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { isDuration, parseDuration } from "./duration.js";
import { ConfigError, errorMessage } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import type { OrchestratorSettings, RepositorySettings } from "./types.js";

export const DEFAULT_CONFIG_FILE = "pr-fleet.config.yaml";

// --- Zod Schemas ---

const DurationSchema = z.string().trim().refine(isDuration, {
  message: "expected a duration such as 500ms, 30s, 1h30m or 7d",
});

// An unset ${VAR} leaves an empty value, which YAML reads as null.
const ProviderAuthSchema = z.object({
  token: z
    .string()
    .nullish()
    .transform((token) => token || undefined),
});

const PrFiltersSchema = z.object({
  allowed_actors: z.array(z.string().min(1)).min(1, "at least one allowed actor is required"),
  skip_labels: z.array(z.string().min(1)).default([]),
  max_age: DurationSchema.optional(),
});

const RepositorySchema = z.object({
  name: z.string().regex(/^[^/\s]+\/[^/\s]+$/, "expected 'owner/name'"),
  merge_strategy: z.enum(["merge", "squash", "rebase"]).default("squash"),
  require_checks: z.boolean().default(false),
  skip_labels: z.array(z.string().min(1)).default([]),
  delete_branches: z.boolean().default(false),
});

const RateLimitSchema = z.object({
  requests_per_second: z.number().min(0).default(5),
  burst: z.number().int().min(1).default(10),
  timeout: DurationSchema.default("30s"),
});

const RetrySchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10).default(3),
    backoff: DurationSchema.default("1s"),
    max_backoff: DurationSchema.default("30s"),
    jitter: z.boolean().default(false),
  })
  .superRefine((retry, ctx) => {
    if (isDuration(retry.backoff) && isDuration(retry.max_backoff)) {
      if (parseDuration(retry.backoff) > parseDuration(retry.max_backoff)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["backoff"],
          message: "backoff must not exceed max_backoff",
        });
      }
    }
  });

const BehaviorSchema = z.object({
  concurrency: z.number().int().min(1).max(50).default(5),
  dry_run: z.boolean().default(false),
  watch_interval: DurationSchema.default("30s"),
  rate_limit: RateLimitSchema.default({}),
  retry: RetrySchema.default({}),
});

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
});

export const ConfigFileSchema = z.object({
  auth: z.record(z.string(), ProviderAuthSchema).default({}),
  pr_filters: PrFiltersSchema,
  repositories: z.record(z.string(), z.array(RepositorySchema)).default({}),
  behavior: BehaviorSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// --- Environment variable substitution ---

/** Replace `${VAR}` placeholders with values from process.env */
export function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      return "";
    }
    return value;
  });
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join(".");
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

// --- Loader ---

/**
 * Parse and validate configuration text (after env substitution).
 * @throws ConfigError on YAML syntax errors or schema violations.
 */
export function parseConfig(text: string, source = "configuration"): ConfigFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(substituteEnvVars(text), { customTags: [] });
  } catch (err: unknown) {
    throw new ConfigError(`invalid YAML in ${source}`, [errorMessage(err)]);
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`invalid ${source}`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load and validate pr-fleet.config.yaml.
 * @param configPath – absolute or relative path to YAML config file.
 *   Defaults to `pr-fleet.config.yaml` in the current working directory.
 */
export function loadConfig(configPath?: string): ConfigFile {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`config file not found: ${resolvedPath}`);
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");
  return parseConfig(raw, `config file ${resolvedPath}`);
}

/** Repositories in configuration order: provider keys first, then list order within each. */
export function listRepositories(config: ConfigFile): RepositorySettings[] {
  return Object.entries(config.repositories).flatMap(([provider, repos]) =>
    repos.map((repo) => ({
      provider,
      name: repo.name,
      mergeStrategy: repo.merge_strategy,
      requireChecks: repo.require_checks,
      skipLabels: repo.skip_labels,
      deleteBranches: repo.delete_branches,
    })),
  );
}

/** Runtime settings for the orchestration core. Durations become milliseconds. */
export function toOrchestratorSettings(config: ConfigFile): OrchestratorSettings {
  const { behavior, pr_filters: filters } = config;
  return {
    concurrency: behavior.concurrency,
    dryRun: behavior.dry_run,
    filters: {
      allowedActors: filters.allowed_actors,
      skipLabels: filters.skip_labels,
      maxAgeMs: filters.max_age !== undefined ? parseDuration(filters.max_age) : undefined,
      maxAgeLabel: filters.max_age,
    },
    repositories: listRepositories(config),
    behavior: {
      rateLimit: {
        requestsPerSecond: behavior.rate_limit.requests_per_second,
        burst: behavior.rate_limit.burst,
        timeoutMs: parseDuration(behavior.rate_limit.timeout),
      },
      retry: {
        maxAttempts: behavior.retry.max_attempts,
        backoffMs: parseDuration(behavior.retry.backoff),
        maxBackoffMs: parseDuration(behavior.retry.max_backoff),
        jitter: behavior.retry.jitter,
      },
    },
  };
}

/** Watch interval in milliseconds. */
export function watchIntervalMs(config: ConfigFile): number {
  return parseDuration(config.behavior.watch_interval);
}
