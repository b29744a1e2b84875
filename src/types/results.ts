import type { Check, MergeMethod, PRStatus, PullRequest, Repository } from "./provider.js";

export type Readiness = "ready" | "skipped" | "blocked" | "errored";

/**
 * Outcome of evaluating one pull request. Exactly one outcome is active:
 * `ready` ⇔ outcome "ready", `skipped` ⇔ outcome "skipped", `error` is set
 * only for "errored". `reason` is never empty.
 */
export interface EvaluatedPR {
  pullRequest: PullRequest;
  outcome: Readiness;
  ready: boolean;
  skipped: boolean;
  reason: string;
  error?: Error;
  status?: PRStatus;
  checks?: Check[];
}

/** One per configured repository. `pullRequests` is empty whenever `error` is set. */
export interface ProcessResult {
  provider: string;
  /** Repository full name as configured. */
  repository: string;
  metadata?: Repository;
  pullRequests: EvaluatedPR[];
  error?: Error;
}

/** One per pull request handed to the merge orchestrator. */
export interface MergeResult {
  provider: string;
  repository: string;
  pullRequest: number;
  title: string;
  author: string;
  method?: MergeMethod;
  success: boolean;
  skipped: boolean;
  reason: string;
  error?: Error;
  mergedAt?: Date;
}

export interface ProcessSummary {
  repositories: number;
  repositoryErrors: number;
  pullRequests: number;
  ready: number;
  skipped: number;
  blocked: number;
  errored: number;
}

export interface MergeSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}
