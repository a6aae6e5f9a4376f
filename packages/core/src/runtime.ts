/**
 * Execution runtime: the clock every suspension goes through and the executors
 * that decide whether independent tasks run one after another or interleave.
 */

import type { Clock } from "./types.js";

/**
 * Wall clock backed by setTimeout.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};

export type ExecutionMode = "blocking" | "concurrent";

/**
 * Runs a list of independent tasks and returns their results in task order.
 */
export interface Executor {
  readonly mode: ExecutionMode;
  all<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<T[]>;
}

/**
 * Runs each task to completion before starting the next.
 */
export const blockingExecutor: Executor = {
  mode: "blocking",
  async all<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<T[]> {
    const results: T[] = [];
    for (const task of tasks) {
      results.push(await task());
    }
    return results;
  },
};

/**
 * Interleaves up to `limit` tasks at a time. After a task rejects no further
 * task is started, and the call rejects once the running ones have settled.
 */
export function concurrentExecutor(limit = 4): Executor {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  return {
    mode: "concurrent",
    async all<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<T[]> {
      const results = new Array<T>(tasks.length);
      let next = 0;
      let failed = false;

      const worker = async (): Promise<void> => {
        while (!failed && next < tasks.length) {
          const index = next++;
          try {
            results[index] = await tasks[index]();
          } catch (error) {
            failed = true;
            throw error;
          }
        }
      };

      const workers = Array.from(
        { length: Math.min(limit, tasks.length) },
        () => worker()
      );
      const settled = await Promise.allSettled(workers);
      for (const outcome of settled) {
        if (outcome.status === "rejected") {
          throw outcome.reason;
        }
      }
      return results;
    },
  };
}
