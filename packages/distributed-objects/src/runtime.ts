/**
 * Starts every task at once and waits for all of them. Results are in task
 * order regardless of completion order; the first failure rejects the join.
 *
 * Runtimes without a scheduler of their own can use this as their
 * `runConcurrently`.
 *
 * @param tasks - The tasks to run.
 * @returns The results of the tasks.
 */
export async function runConcurrently<Result>(
  tasks: (() => Promise<Result>)[],
): Promise<Result[]> {
  return Promise.all(tasks.map(async (task) => task()));
}
