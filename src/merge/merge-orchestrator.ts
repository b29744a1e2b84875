import type { BehaviorManager } from "../behavior/behavior-manager.js";
import { OrchestrationError, errorMessage, isCancellation } from "../errors.js";
import type { ParallelExecutor, Task } from "../executor/parallel-executor.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { summarizeMerges } from "../metrics.js";
import type {
  EvaluatedPR,
  MergeOptions,
  MergeResult,
  OrchestratorSettings,
  ProcessResult,
  Provider,
  ProviderRegistry,
  PullRequest,
  Repository,
} from "../types.js";
import { buildCommitMessage } from "./commit-message.js";

export interface MergeOrchestratorDeps {
  providers: ProviderRegistry;
  settings: OrchestratorSettings;
  behavior: BehaviorManager;
  executor: ParallelExecutor;
  logger?: Logger;
  now?: () => Date;
}

type MergeBase = Pick<MergeResult, "provider" | "repository" | "pullRequest" | "title" | "author">;

/** A PR's identity and, once decided, its outcome. */
interface MergeEntry {
  base: MergeBase;
  result?: MergeResult;
}

export const DRY_RUN_REASON = "dry run - would merge";
export const MERGED_REASON = "successfully merged";
export const CANCELLED_REASON = "cancelled before merge";

function baseFor(result: ProcessResult, pr: PullRequest): MergeBase {
  return {
    provider: result.provider,
    repository: result.repository,
    pullRequest: pr.number,
    title: pr.title,
    author: pr.author.login,
  };
}

function skippedResult(base: MergeBase, reason: string): MergeResult {
  return { ...base, success: false, skipped: true, reason };
}

function failedResult(base: MergeBase, error: Error, method?: MergeResult["method"]): MergeResult {
  return { ...base, method, success: false, skipped: false, reason: error.message, error };
}

/**
 * Why a PR must not be merged in this run, or undefined when it may be.
 * `force` overrides a confident "blocked" decision only: skipped PRs are out
 * of scope and errored PRs have no decision at all.
 */
export function skipReason(evaluated: EvaluatedPR, options: MergeOptions): string | undefined {
  switch (evaluated.outcome) {
    case "ready":
      return undefined;
    case "skipped":
      return evaluated.reason;
    case "errored":
      return `evaluation failed: ${evaluated.reason}`;
    case "blocked":
      return options.force ? undefined : evaluated.reason;
  }
}

/**
 * Merges every eligible pull request from a processing pass. Merges run
 * concurrently through the executor; the returned list follows the order of
 * the input PRs regardless of completion order.
 */
export class MergeOrchestrator {
  private readonly deps: MergeOrchestratorDeps;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: MergeOrchestratorDeps) {
    this.deps = deps;
    this.log = (deps.logger ?? rootLogger).child({ component: "merge-orchestrator" });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws OrchestrationError when no provider is configured.
   */
  async mergeAll(
    results: readonly ProcessResult[],
    options: MergeOptions = {},
    signal?: AbortSignal,
  ): Promise<MergeResult[]> {
    if (this.deps.providers.size === 0) {
      throw new OrchestrationError("no providers configured");
    }

    const dryRun = options.dryRun ?? this.deps.settings.dryRun;
    const runOptions: MergeOptions = { ...options, dryRun };
    this.log.info({ dryRun, force: options.force === true }, "starting merge operations");

    const usable = results.filter((result) => {
      if (result.error) {
        this.log.warn(
          { repo: result.repository, err: result.error.message },
          "skipping repository due to processing error",
        );
        return false;
      }
      return true;
    });

    // One entry per PR in input order; tasks fill in their entry's result.
    const entries: MergeEntry[] = [];
    const tasks: Task[] = [];

    for (const result of usable) {
      const provider = this.deps.providers.get(result.provider);
      const repo = result.metadata;

      for (const evaluated of result.pullRequests) {
        const pr = evaluated.pullRequest;
        const entry: MergeEntry = { base: baseFor(result, pr) };
        entries.push(entry);

        const reason = skipReason(evaluated, runOptions);
        if (reason !== undefined) {
          entry.result = skippedResult(entry.base, reason);
          continue;
        }
        if (!provider) {
          entry.result = failedResult(entry.base, new Error(`provider ${result.provider} is not configured`));
          continue;
        }
        if (!repo) {
          entry.result = failedResult(entry.base, new Error("repository metadata not available"));
          continue;
        }

        tasks.push(async (taskSignal) => {
          try {
            entry.result = await this.mergeOne(provider, repo, pr, entry.base, runOptions, taskSignal);
          } catch (err: unknown) {
            this.log.error(
              { repo: entry.base.repository, pr: entry.base.pullRequest, err: errorMessage(err) },
              "merge task failed",
            );
            entry.result = failedResult(
              entry.base,
              new Error(`merge failed: ${errorMessage(err)}`, { cause: err }),
            );
          }
        });
      }
    }

    try {
      await this.deps.executor.execute(tasks, signal);
    } catch (err: unknown) {
      if (!isCancellation(err)) {
        throw err;
      }
      this.log.warn({ err: errorMessage(err) }, "merge run cancelled; keeping completed results");
    }

    // Only tasks the executor never started are left without a result.
    const merged = entries.map((entry) => entry.result ?? skippedResult(entry.base, CANCELLED_REASON));
    this.logSummary(merged, dryRun === true);
    return merged;
  }

  /** Merge one PR. Provider failures are recorded on the result. */
  private async mergeOne(
    provider: Provider,
    repo: Repository,
    pr: PullRequest,
    base: MergeBase,
    options: MergeOptions,
    signal: AbortSignal,
  ): Promise<MergeResult> {
    const log = this.log.child({ provider: provider.name, repo: repo.fullName, pr: pr.number });

    const repoConfig = this.deps.settings.repositories.find(
      (r) => r.provider === base.provider && r.name === base.repository,
    );
    if (!repoConfig) {
      return failedResult(base, new Error("repository configuration not found"));
    }

    const method = repoConfig.mergeStrategy;
    const message = buildCommitMessage(pr, method, options.customMessage);

    if (options.dryRun) {
      log.info({ method }, "[dry run] would merge pull request");
      return { ...base, method, success: true, skipped: false, reason: DRY_RUN_REASON };
    }

    log.info({ method }, "merging pull request");
    try {
      await this.deps.behavior.execute(
        provider.name,
        "merge-pull-request",
        (s) =>
          provider.mergePullRequest(
            repo,
            pr,
            {
              method,
              commitTitle: message.title,
              commitMessage: message.body,
              sha: pr.headSha || undefined,
              deleteBranch: options.deleteBranches === true || repoConfig.deleteBranches,
            },
            s,
          ),
        signal,
      );
    } catch (err: unknown) {
      const error = new Error(`merge failed: ${errorMessage(err)}`, { cause: err });
      log.error({ err: errorMessage(err) }, "failed to merge pull request");
      return failedResult(base, error, method);
    }

    log.info("pull request merged");
    return {
      ...base,
      method,
      success: true,
      skipped: false,
      reason: MERGED_REASON,
      mergedAt: this.now(),
    };
  }

  private logSummary(results: readonly MergeResult[], dryRun: boolean): void {
    const summary = summarizeMerges(results);
    this.log.info(
      { ...summary, dryRun },
      `merge operations completed: ${dryRun ? "would merge" : "merged"} ${summary.succeeded} pull requests`,
    );
    for (const result of results) {
      if (result.error) {
        this.log.error(
          { repo: result.repository, pr: result.pullRequest, err: result.error.message },
          "merge failed",
        );
      }
    }
  }
}
