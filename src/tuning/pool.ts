import { availableParallelism } from "node:os";
import Queue from "queue";

export type Task<T> = () => Promise<T>;

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Runs tasks through a bounded queue and returns their results in task order,
 * whatever order they finish in. A task that rejects ends the run with that error.
 */
export function runPool<T>(tasks: readonly Task<T>[], concurrency: number): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  if (tasks.length === 0) {
    return Promise.resolve(results);
  }
  const queue = new Queue({
    concurrency: Math.max(1, Math.floor(concurrency)),
    autostart: false,
  });
  tasks.forEach((task, index) => {
    queue.push(async () => {
      results[index] = await task();
    });
  });
  return new Promise<T[]>((resolve, reject) => {
    queue.start((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(results);
    });
  });
}
