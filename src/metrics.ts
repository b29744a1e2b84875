import type { MergeResult, MergeSummary, ProcessResult, ProcessSummary } from "./types.js";

/**
 * Counts repositories and pull requests by outcome. Every evaluated PR lands
 * in exactly one of ready / skipped / blocked / errored.
 */
export function summarizeProcessResults(results: readonly ProcessResult[]): ProcessSummary {
  const summary: ProcessSummary = {
    repositories: results.length,
    repositoryErrors: 0,
    pullRequests: 0,
    ready: 0,
    skipped: 0,
    blocked: 0,
    errored: 0,
  };

  for (const result of results) {
    if (result.error) {
      summary.repositoryErrors++;
      continue;
    }
    summary.pullRequests += result.pullRequests.length;
    for (const pr of result.pullRequests) {
      summary[pr.outcome]++;
    }
  }
  return summary;
}

/** Counts merge outcomes: succeeded, failed, skipped. */
export function summarizeMerges(results: readonly MergeResult[]): MergeSummary {
  const summary: MergeSummary = { total: results.length, succeeded: 0, failed: 0, skipped: 0 };
  for (const result of results) {
    if (result.skipped) {
      summary.skipped++;
    } else if (result.success) {
      summary.succeeded++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}
