import { describe, it, expect } from "vitest";
import { DEFAULT_CONCURRENCY, ParallelExecutor, type Task } from "../../src/executor/parallel-executor.js";
import { CancellationError } from "../../src/errors.js";
import { createLogger } from "../../src/logger.js";

const logger = createLogger({ level: "silent", pretty: false });

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ParallelExecutor", () => {
  it("falls back to the default concurrency for invalid values", () => {
    expect(new ParallelExecutor(0, logger).concurrency).toBe(DEFAULT_CONCURRENCY);
    expect(new ParallelExecutor(2.5, logger).concurrency).toBe(DEFAULT_CONCURRENCY);
    expect(new ParallelExecutor(3, logger).concurrency).toBe(3);
  });

  it("returns an empty report for no tasks", async () => {
    await expect(new ParallelExecutor(2, logger).execute([])).resolves.toEqual({ total: 0, succeeded: 0, failed: 0 });
  });

  it("never runs more than the configured number of tasks at once", async () => {
    const executor = new ParallelExecutor(2, logger);
    let running = 0;
    let peak = 0;
    const gates = Array.from({ length: 5 }, () => deferred());

    const tasks: Task[] = gates.map((gate) => async () => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
    });

    const done = executor.execute(tasks);
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(running).toBe(2);
    for (const gate of gates) {
      gate.resolve();
    }

    await expect(done).resolves.toEqual({ total: 5, succeeded: 5, failed: 0 });
    expect(peak).toBe(2);
  });

  it("keeps running siblings when a task throws", async () => {
    const executor = new ParallelExecutor(2, logger);
    const results: string[] = new Array<string>(3).fill("");

    const report = await executor.execute([
      async () => {
        results[0] = "a";
      },
      async () => {
        throw new Error("boom");
      },
      async () => {
        results[2] = "c";
      },
    ]);

    expect(report).toEqual({ total: 3, succeeded: 2, failed: 1 });
    expect(results).toEqual(["a", "", "c"]);
  });

  it("lets results land in index order regardless of completion order", async () => {
    const executor = new ParallelExecutor(3, logger);
    const slow = deferred();
    const slots: number[] = [0, 0, 0];

    const done = executor.execute([
      async () => {
        await slow.promise;
        slots[0] = 1;
      },
      async () => {
        slots[1] = 2;
      },
      async () => {
        slots[2] = 3;
      },
    ]);
    slow.resolve();
    await done;

    expect(slots).toEqual([1, 2, 3]);
  });

  it("refuses to start when the signal has already fired", async () => {
    const controller = new AbortController();
    controller.abort();
    let ran = false;

    await expect(
      new ParallelExecutor(2, logger).execute(
        [
          async () => {
            ran = true;
          },
        ],
        controller.signal,
      ),
    ).rejects.toThrow("execution cancelled before any task started");
    expect(ran).toBe(false);
  });

  it("stops dispatching once cancelled but lets started tasks finish", async () => {
    const controller = new AbortController();
    const executor = new ParallelExecutor(1, logger);
    const finished: number[] = [];
    let sawAbort = false;

    const tasks: Task[] = [0, 1, 2].map((index) => async (signal) => {
      if (index === 0) {
        controller.abort();
        sawAbort = signal.aborted;
      }
      finished.push(index);
    });

    const err = await executor.execute(tasks, controller.signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CancellationError);
    expect(err).toMatchObject({ message: "execution cancelled with 2 of 3 tasks not started" });
    expect(finished).toEqual([0]);
    expect(sawAbort).toBe(true);
  });
});
