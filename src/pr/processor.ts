import type { BehaviorManager } from "../behavior/behavior-manager.js";
import { OrchestrationError, errorMessage, isCancellation } from "../errors.js";
import type { ParallelExecutor } from "../executor/parallel-executor.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { summarizeProcessResults } from "../metrics.js";
import {
  parseRepositoryName,
  type OrchestratorSettings,
  type ProcessOptions,
  type ProcessResult,
  type ProviderRegistry,
  type PullRequest,
  type RepositorySettings,
} from "../types.js";
import { evaluatePullRequest, type EffectiveFilters } from "./readiness.js";

export interface PRProcessorDeps {
  providers: ProviderRegistry;
  settings: OrchestratorSettings;
  behavior: BehaviorManager;
  executor: ParallelExecutor;
  logger?: Logger;
  now?: () => Date;
}

const PER_PAGE = 100;

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function wrap(message: string, err: unknown): Error {
  return new Error(`${message}: ${errorMessage(err)}`, { cause: err });
}

/**
 * Discovers open pull requests across every configured repository and
 * evaluates each one. Repositories are fetched concurrently; results come
 * back in configuration order.
 */
export class PRProcessor {
  private readonly deps: PRProcessorDeps;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: PRProcessorDeps) {
    this.deps = deps;
    this.log = (deps.logger ?? rootLogger).child({ component: "pr-processor" });
    this.now = deps.now ?? (() => new Date());
  }

  /** Repositories selected by the run's provider and repository filters, in configuration order. */
  selectRepositories(options: ProcessOptions = {}): RepositorySettings[] {
    const { providers, repositories } = options;
    return this.deps.settings.repositories.filter((repo) => {
      if (providers?.length && !providers.some((p) => sameText(p, repo.provider))) {
        return false;
      }
      if (repositories?.length) {
        const name = repo.name.toLowerCase();
        return repositories.some((filter) => name.includes(filter.toLowerCase()));
      }
      return true;
    });
  }

  /**
   * Evaluate every open pull request in every selected repository.
   * @throws OrchestrationError when no repository is selected.
   * @throws CancellationError when the signal fires before any repository is processed.
   */
  async processAll(options: ProcessOptions = {}, signal?: AbortSignal): Promise<ProcessResult[]> {
    const selected = this.selectRepositories(options);
    if (selected.length === 0) {
      throw new OrchestrationError("no repositories to process");
    }

    this.log.info({ repositories: selected.length }, "processing repositories");

    const results: ProcessResult[] = selected.map((repo) => ({
      provider: repo.provider,
      repository: repo.name,
      pullRequests: [],
    }));

    const tasks = selected.map((repo, index) => async (taskSignal: AbortSignal) => {
      try {
        results[index] = await this.processRepository(repo, options, taskSignal);
      } catch (err: unknown) {
        this.log.error(
          { provider: repo.provider, repo: repo.name, err: errorMessage(err) },
          "repository processing failed",
        );
        results[index] = {
          provider: repo.provider,
          repository: repo.name,
          pullRequests: [],
          error: wrap("failed to process repository", err),
        };
      }
    });

    try {
      await this.deps.executor.execute(tasks, signal);
    } catch (err: unknown) {
      if (!isCancellation(err)) {
        throw err;
      }
      // Keep finished repositories; mark the ones that never started.
      this.log.warn({ err: errorMessage(err) }, "processing cancelled");
      const cancelled = err instanceof Error ? err : new Error(errorMessage(err));
      results.forEach((result, index) => {
        const started = result.metadata !== undefined || result.error !== undefined;
        if (!started) {
          results[index] = { ...result, error: cancelled };
        }
      });
    }

    this.log.info(summarizeProcessResults(results), "pull request processing completed");
    return results;
  }

  private effectiveFilters(repo: RepositorySettings, options: ProcessOptions): EffectiveFilters {
    const { filters } = this.deps.settings;
    const maxAgeMs = options.maxAgeMs ?? filters.maxAgeMs;
    const maxAgeLabel = options.maxAgeMs !== undefined ? options.maxAgeLabel : filters.maxAgeLabel;
    return {
      allowedActors: filters.allowedActors,
      skipLabels: [...filters.skipLabels, ...repo.skipLabels, ...(options.skipLabels ?? [])],
      maxAgeMs,
      maxAgeLabel,
      requireChecks: options.requireChecks === true || repo.requireChecks,
    };
  }

  /** Provider failures are recorded on the returned result. */
  private async processRepository(
    repo: RepositorySettings,
    options: ProcessOptions,
    signal: AbortSignal,
  ): Promise<ProcessResult> {
    const log = this.log.child({ provider: repo.provider, repo: repo.name });
    const result: ProcessResult = { provider: repo.provider, repository: repo.name, pullRequests: [] };
    const { behavior } = this.deps;

    const provider = this.deps.providers.get(repo.provider);
    if (!provider) {
      result.error = new Error(`provider ${repo.provider} is not configured`);
      log.warn("provider not available");
      return result;
    }

    let parsed: { owner: string; name: string };
    try {
      parsed = parseRepositoryName(repo.name);
    } catch (err: unknown) {
      result.error = wrap("invalid repository name", err);
      return result;
    }
    const { owner, name } = parsed;

    try {
      result.metadata = await behavior.executeWithResult(
        provider.name,
        "get-repository",
        (s) => provider.getRepository(owner, name, s),
        signal,
      );
    } catch (err: unknown) {
      result.error = wrap("failed to get repository", err);
      log.error({ err: errorMessage(err) }, "failed to get repository");
      return result;
    }

    const metadata = result.metadata;
    let pullRequests: PullRequest[];
    try {
      pullRequests = await behavior.executeWithResult(
        provider.name,
        "list-pull-requests",
        (s) => provider.listPullRequests(metadata, { state: "open", perPage: PER_PAGE }, s),
        signal,
      );
    } catch (err: unknown) {
      result.error = wrap("failed to list pull requests", err);
      log.error({ err: errorMessage(err) }, "failed to list pull requests");
      return result;
    }

    log.debug({ count: pullRequests.length }, "found pull requests");

    const filters = this.effectiveFilters(repo, options);
    const now = this.now();
    for (const pr of pullRequests) {
      result.pullRequests.push(
        await evaluatePullRequest(pr, {
          provider,
          behavior,
          repository: metadata,
          filters,
          now,
          logger: this.log,
          signal,
        }),
      );
    }
    return result;
  }
}
