/**
 * Report rendering for CLI commands. Every formatter returns lines so the
 * command decides where they go.
 */

import { formatDuration } from "../duration.js";
import { summarizeMerges, summarizeProcessResults } from "../metrics.js";
import type { RateLimitResult } from "../orchestrator.js";
import type { BehaviorStats } from "../behavior/behavior-manager.js";
import type {
  EvaluatedPR,
  MergeResult,
  MergeSummary,
  ProcessResult,
  ProcessSummary,
  PullRequest,
  Readiness,
} from "../types.js";

export const OUTPUT_FORMATS = ["table", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const OUTCOME_ICONS: Record<Readiness, string> = {
  ready: "✅",
  blocked: "⛔",
  skipped: "⏭️ ",
  errored: "⚠️ ",
};

export interface ProcessViewOptions {
  readyOnly?: boolean;
  showSkipped?: boolean;
}

/** JSON with errors rendered as their messages. */
export function renderJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (v instanceof Error ? v.message : v), 2);
}

function prLabel(pr: PullRequest): string {
  return `#${pr.number} ${pr.title} (@${pr.author.login})`;
}

function isVisible(pr: EvaluatedPR, options: ProcessViewOptions): boolean {
  if (options.readyOnly) return pr.outcome === "ready";
  if (pr.outcome === "skipped") return options.showSkipped === true;
  return true;
}

export function formatProcessSummary(summary: ProcessSummary): string {
  return (
    `Summary: ${summary.repositories} repositories (${summary.repositoryErrors} failed), ` +
    `${summary.pullRequests} pull requests: ${summary.ready} ready, ${summary.blocked} blocked, ` +
    `${summary.skipped} skipped, ${summary.errored} errored`
  );
}

export function formatProcessResults(
  results: readonly ProcessResult[],
  options: ProcessViewOptions = {},
): string[] {
  const lines: string[] = [];
  for (const result of results) {
    lines.push(`${result.provider} ${result.repository}`);
    if (result.error) {
      lines.push(`  ❌ ${result.error.message}`);
      continue;
    }
    const shown = result.pullRequests.filter((pr) => isVisible(pr, options));
    if (shown.length === 0) {
      lines.push("  (no pull requests to show)");
      continue;
    }
    for (const pr of shown) {
      lines.push(`  ${OUTCOME_ICONS[pr.outcome]} ${prLabel(pr.pullRequest)} - ${pr.reason}`);
    }
  }
  lines.push("", formatProcessSummary(summarizeProcessResults(results)));
  return lines;
}

export function formatMergeSummary(summary: MergeSummary, dryRun: boolean): string {
  const verb = dryRun ? "Would merge" : "Merged";
  return `${verb} ${summary.succeeded} of ${summary.total} pull requests (${summary.failed} failed, ${summary.skipped} skipped)`;
}

export function formatMergeResults(results: readonly MergeResult[], dryRun: boolean): string[] {
  const lines = results.map((result) => {
    const icon = result.skipped ? "⏭️ " : result.success ? "✅" : "❌";
    return `${icon} ${result.repository}#${result.pullRequest} ${result.title} - ${result.reason}`;
  });
  lines.push("", formatMergeSummary(summarizeMerges(results), dryRun));
  return lines;
}

export function formatRateLimits(results: readonly RateLimitResult[], stats: BehaviorStats): string[] {
  const lines: string[] = ["API quota:"];
  for (const result of results) {
    if (result.info) {
      const { remaining, limit, resetAt } = result.info;
      lines.push(`  ${result.provider}: ${remaining}/${limit} requests remaining, resets at ${resetAt.toISOString()}`);
    } else {
      lines.push(`  ${result.provider}: ❌ ${result.error?.message ?? "unavailable"}`);
    }
  }

  lines.push("Client limits:");
  const { retry } = stats;
  lines.push(
    `  retry: ${retry.maxAttempts} attempts, backoff ${formatDuration(retry.backoffMs)}` +
      ` up to ${formatDuration(retry.maxBackoffMs)}${retry.jitter ? " with jitter" : ""}`,
  );
  for (const limiter of stats.rateLimiters) {
    lines.push(
      `  ${limiter.name}: ${limiter.requestsPerSecond} req/s, burst ${limiter.burst}, ` +
        `${Math.floor(limiter.tokens)} tokens available`,
    );
  }
  return lines;
}
