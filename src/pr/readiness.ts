import type { BehaviorManager } from "../behavior/behavior-manager.js";
import { errorMessage } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import {
  isCheckFailed,
  isCheckSuccessful,
  type Check,
  type EvaluatedPR,
  type PRStatus,
  type Provider,
  type PullRequest,
  type Repository,
} from "../types.js";

/** Filters in effect for one repository: global, repository and run-level settings merged. */
export interface EffectiveFilters {
  allowedActors: readonly string[];
  skipLabels: readonly string[];
  maxAgeMs?: number;
  maxAgeLabel?: string;
  requireChecks: boolean;
}

export interface EvaluationContext {
  provider: Provider;
  behavior: BehaviorManager;
  repository: Repository;
  filters: EffectiveFilters;
  now: Date;
  logger?: Logger;
  signal?: AbortSignal;
}

// --- Outcome constructors: exactly one outcome is ever active ---

function outcome(
  pullRequest: PullRequest,
  kind: EvaluatedPR["outcome"],
  reason: string,
  extra: Partial<Pick<EvaluatedPR, "error" | "status" | "checks">> = {},
): EvaluatedPR {
  return {
    pullRequest,
    outcome: kind,
    ready: kind === "ready",
    skipped: kind === "skipped",
    reason,
    ...extra,
  };
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Rules 1–3: cheap filters that decide whether the PR is in scope at all.
 * Returns a skipped outcome, or undefined when the PR passes every filter.
 */
export function applyFilters(
  pr: PullRequest,
  filters: EffectiveFilters,
  now: Date,
): EvaluatedPR | undefined {
  if (!filters.allowedActors.some((actor) => sameText(actor, pr.author.login))) {
    return outcome(pr, "skipped", `author not in allowed actors: ${pr.author.login}`);
  }

  const matched = pr.labels
    .map((label) => label.name)
    .filter((name) => filters.skipLabels.some((skip) => sameText(skip, name)));
  if (matched.length > 0) {
    return outcome(pr, "skipped", `matched skip labels: ${matched.join(", ")}`);
  }

  if (filters.maxAgeMs !== undefined && now.getTime() - pr.createdAt.getTime() > filters.maxAgeMs) {
    return outcome(pr, "skipped", `older than ${filters.maxAgeLabel ?? `${filters.maxAgeMs}ms`}`);
  }

  return undefined;
}

/** Rules 4–7: decisions from the PR's own fields, no network involved. */
export function checkPullRequestState(pr: PullRequest): EvaluatedPR | undefined {
  if (pr.state !== "open") {
    return outcome(pr, "blocked", "pull request is not open");
  }
  if (pr.draft) {
    return outcome(pr, "blocked", "pull request is a draft");
  }
  // `null` means the provider has not computed it yet; only an explicit false blocks.
  if (pr.mergeable === false) {
    return outcome(pr, "blocked", "merge conflicts");
  }
  if (pr.locked) {
    return outcome(pr, "blocked", "pull request is locked");
  }
  return undefined;
}

/** Reason the combined status blocks the merge, if it does. */
export function statusBlockReason(status: PRStatus): string | undefined {
  if (status.state === "success") {
    return undefined;
  }
  return status.description
    ? `status checks not passing: ${status.state} (${status.description})`
    : `status checks not passing: ${status.state}`;
}

/** Reason the individual checks block the merge, if they do. Failures win over pending checks. */
export function checksBlockReason(checks: readonly Check[]): string | undefined {
  const failed = checks.find(isCheckFailed);
  if (failed) {
    return `check '${failed.name}' failed`;
  }
  const incomplete = checks.find((check) => !isCheckSuccessful(check) && !isCheckFailed(check));
  if (incomplete) {
    return `check '${incomplete.name}' is not complete`;
  }
  return undefined;
}

/**
 * Decide whether one pull request may be merged.
 *
 * Rules run in a fixed order and stop at the first match; the status and
 * check lookups come last because they are the only ones that hit the
 * network. A failed lookup yields "errored", never "blocked": the decision
 * is unknown rather than negative.
 */
export async function evaluatePullRequest(
  pr: PullRequest,
  ctx: EvaluationContext,
): Promise<EvaluatedPR> {
  const log = (ctx.logger ?? rootLogger).child({
    provider: ctx.provider.name,
    repo: ctx.repository.fullName,
    pr: pr.number,
  });

  const decided = applyFilters(pr, ctx.filters, ctx.now) ?? checkPullRequestState(pr);
  if (decided) {
    log.debug({ outcome: decided.outcome, reason: decided.reason }, "pull request evaluated");
    return decided;
  }

  if (!ctx.filters.requireChecks) {
    log.info("pull request is ready for merge");
    return outcome(pr, "ready", "ready to merge");
  }

  let status: PRStatus;
  try {
    status = await ctx.behavior.executeWithResult(
      ctx.provider.name,
      "get-pr-status",
      (signal) => ctx.provider.getPRStatus(ctx.repository, pr, signal),
      ctx.signal,
    );
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    log.error({ err: errorMessage(err) }, "failed to get PR status");
    return outcome(pr, "errored", `failed to get PR status: ${errorMessage(err)}`, { error });
  }

  const statusReason = statusBlockReason(status);
  if (statusReason) {
    log.debug({ reason: statusReason }, "pull request not ready");
    return outcome(pr, "blocked", statusReason, { status });
  }

  let checks: Check[];
  try {
    checks = await ctx.behavior.executeWithResult(
      ctx.provider.name,
      "get-checks",
      (signal) => ctx.provider.getChecks(ctx.repository, pr, signal),
      ctx.signal,
    );
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    log.error({ err: errorMessage(err) }, "failed to get PR checks");
    return outcome(pr, "errored", `failed to get PR checks: ${errorMessage(err)}`, { error, status });
  }

  const checksReason = checksBlockReason(checks);
  if (checksReason) {
    log.debug({ reason: checksReason }, "pull request not ready");
    return outcome(pr, "blocked", checksReason, { status, checks });
  }

  log.info("pull request is ready for merge");
  return outcome(pr, "ready", "ready to merge", { status, checks });
}
