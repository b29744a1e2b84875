import { BehaviorManager, type BehaviorManagerOptions } from "./behavior/behavior-manager.js";
import { errorMessage } from "./errors.js";
import { ParallelExecutor } from "./executor/parallel-executor.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import { MergeOrchestrator } from "./merge/merge-orchestrator.js";
import { PRProcessor } from "./pr/processor.js";
import type {
  MergeOptions,
  MergeResult,
  OrchestratorSettings,
  ProcessOptions,
  ProcessResult,
  ProviderRegistry,
  RateLimitInfo,
} from "./types.js";

export interface OrchestratorOptions extends Pick<BehaviorManagerOptions, "random"> {
  logger?: Logger;
  /** Wall clock used for PR age and merge timestamps. */
  now?: () => Date;
}

export interface AuthResult {
  provider: string;
  success: boolean;
  error?: Error;
}

export interface RateLimitResult {
  provider: string;
  info?: RateLimitInfo;
  error?: Error;
}

/**
 * Composition root for one configuration: a single Behavior Manager and
 * Executor shared by processing and merging, so rate limits hold across both.
 */
export class Orchestrator {
  readonly providers: ProviderRegistry;
  readonly settings: OrchestratorSettings;
  readonly behavior: BehaviorManager;
  readonly executor: ParallelExecutor;
  private readonly processor: PRProcessor;
  private readonly merger: MergeOrchestrator;
  private readonly log: Logger;

  constructor(providers: ProviderRegistry, settings: OrchestratorSettings, options: OrchestratorOptions = {}) {
    const logger = options.logger ?? rootLogger;
    const now = options.now ?? (() => new Date());

    this.providers = providers;
    this.settings = settings;
    this.log = logger.child({ component: "orchestrator" });
    this.behavior = new BehaviorManager(settings.behavior, {
      logger,
      now: () => now().getTime(),
      random: options.random,
    });
    this.executor = new ParallelExecutor(settings.concurrency, logger);

    const deps = { providers, settings, behavior: this.behavior, executor: this.executor, logger, now };
    this.processor = new PRProcessor(deps);
    this.merger = new MergeOrchestrator(deps);
  }

  processPRs(options: ProcessOptions = {}, signal?: AbortSignal): Promise<ProcessResult[]> {
    return this.processor.processAll(options, signal);
  }

  mergePRs(results: readonly ProcessResult[], options: MergeOptions = {}, signal?: AbortSignal): Promise<MergeResult[]> {
    return this.merger.mergeAll(results, options, signal);
  }

  /** Authenticate every provider; one failure does not stop the others. */
  async authenticate(signal?: AbortSignal): Promise<AuthResult[]> {
    const results: AuthResult[] = [];
    for (const provider of this.providers.values()) {
      try {
        await this.behavior.execute(provider.name, "authenticate", (s) => provider.authenticate(s), signal);
        results.push({ provider: provider.name, success: true });
      } catch (err: unknown) {
        this.log.error({ provider: provider.name, err: errorMessage(err) }, "authentication failed");
        results.push({ provider: provider.name, success: false, error: toError(err) });
      }
    }
    return results;
  }

  /** Current API quota of every provider. */
  async rateLimits(signal?: AbortSignal): Promise<RateLimitResult[]> {
    const results: RateLimitResult[] = [];
    for (const provider of this.providers.values()) {
      try {
        const info = await this.behavior.executeWithResult(
          provider.name,
          "get-rate-limit",
          (s) => provider.getRateLimit(s),
          signal,
        );
        results.push({ provider: provider.name, info });
      } catch (err: unknown) {
        this.log.warn({ provider: provider.name, err: errorMessage(err) }, "failed to get rate limit");
        results.push({ provider: provider.name, error: toError(err) });
      }
    }
    return results;
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
