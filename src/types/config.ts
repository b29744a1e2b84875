import type { MergeMethod } from "./provider.js";

// --- Runtime settings built from the YAML config file ---

export interface RateLimitSettings {
  /** Tokens added per second. 0 disables rate limiting. */
  requestsPerSecond: number;
  burst: number;
  /** Longest a caller may wait for a token before the acquisition fails. */
  timeoutMs: number;
}

export interface RetrySettings {
  /** Total attempts including the first call. */
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  jitter: boolean;
}

export interface BehaviorSettings {
  rateLimit: RateLimitSettings;
  retry: RetrySettings;
}

export interface FilterSettings {
  allowedActors: string[];
  skipLabels: string[];
  maxAgeMs?: number;
  /** The max age exactly as configured, used in skip reasons. */
  maxAgeLabel?: string;
}

export interface RepositorySettings {
  provider: string;
  /** `owner/name` */
  name: string;
  mergeStrategy: MergeMethod;
  requireChecks: boolean;
  skipLabels: string[];
  deleteBranches: boolean;
}

export interface OrchestratorSettings {
  concurrency: number;
  dryRun: boolean;
  filters: FilterSettings;
  /** In configuration order. */
  repositories: RepositorySettings[];
  behavior: BehaviorSettings;
}

// --- Per-run options (usually from CLI flags) ---

export interface ProcessOptions {
  /** Restrict to these provider names (case-insensitive exact match). */
  providers?: string[];
  /** Restrict to repositories whose name contains one of these (case-insensitive). */
  repositories?: string[];
  /** Overrides the configured max age for this run. */
  maxAgeMs?: number;
  maxAgeLabel?: string;
  /** Require checks even where the repository does not. */
  requireChecks?: boolean;
  /** Extra skip labels on top of global and repository ones. */
  skipLabels?: string[];
}

export interface MergeOptions {
  dryRun?: boolean;
  /** Merge blocked PRs too. Skipped and errored PRs are never merged. */
  force?: boolean;
  /** Delete the head branch after merging, on top of the repository setting. */
  deleteBranches?: boolean;
  /** Replaces the generated commit title. */
  customMessage?: string;
}
