import { hit, miss, type Attempt } from "./attempt.js";
import { errorMessage } from "./errors.js";

/**
 * Run async tasks with at most `concurrency` in flight.
 * Returns one attempt per task in original order; a rejected task becomes a
 * miss carrying its error message and never aborts its siblings.
 */
export async function runConcurrent<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number
): Promise<Attempt<T>[]> {
  const results: Attempt<T>[] = new Array(tasks.length);
  let cursor = 0;

  async function worker() {
    while (cursor < tasks.length) {
      const i = cursor++;
      const task = tasks[i];
      if (!task) break;
      try {
        results[i] = hit(await task());
      } catch (err) {
        results[i] = miss(errorMessage(err));
      }
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
