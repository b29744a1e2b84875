import pLimit from "p-limit";
import { CancellationError, errorMessage } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";

export type Task = (signal: AbortSignal) => Promise<void>;

export interface ExecutionReport {
  total: number;
  succeeded: number;
  failed: number;
}

export const DEFAULT_CONCURRENCY = 5;

/**
 * Runs independent tasks with at most `concurrency` in flight.
 *
 * Tasks report their own outcome (usually by writing into a pre-indexed slot
 * owned by the caller). A task that throws is logged and counted but never
 * stops its siblings. `execute` itself only throws a CancellationError, when
 * the signal keeps tasks from being started.
 */
export class ParallelExecutor {
  readonly concurrency: number;
  private readonly log: Logger;

  constructor(concurrency: number = DEFAULT_CONCURRENCY, logger?: Logger) {
    this.concurrency = Number.isInteger(concurrency) && concurrency > 0 ? concurrency : DEFAULT_CONCURRENCY;
    this.log = (logger ?? rootLogger).child({ component: "parallel-executor" });
  }

  async execute(tasks: readonly Task[], signal?: AbortSignal): Promise<ExecutionReport> {
    const report: ExecutionReport = { total: tasks.length, succeeded: 0, failed: 0 };
    if (tasks.length === 0) {
      return report;
    }
    if (signal?.aborted) {
      throw new CancellationError("execution cancelled before any task started", {
        cause: signal.reason,
      });
    }

    const taskSignal = signal ?? new AbortController().signal;
    const limit = pLimit(this.concurrency);
    let notStarted = 0;

    this.log.debug({ tasks: tasks.length, concurrency: this.concurrency }, "dispatching tasks");

    await Promise.all(
      tasks.map((task, index) =>
        limit(async () => {
          if (taskSignal.aborted) {
            notStarted++;
            return;
          }
          this.log.debug({ task: index }, "starting task");
          try {
            await task(taskSignal);
            report.succeeded++;
            this.log.debug({ task: index }, "task completed");
          } catch (err: unknown) {
            report.failed++;
            this.log.error({ task: index, err: errorMessage(err) }, "task failed");
          }
        }),
      ),
    );

    if (notStarted > 0) {
      throw new CancellationError(
        `execution cancelled with ${notStarted} of ${tasks.length} tasks not started`,
        { cause: taskSignal.reason },
      );
    }
    return report;
  }
}
