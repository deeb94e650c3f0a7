/**
 * Per-repository run queue
 *
 * A history run owns the shared working tree from its first head lookup
 * until its restore. Runs against the same resolved path are chained so
 * the next one only starts once the previous tree is back in place.
 */

import * as path from 'path';

const queues = new Map<string, Promise<void>>();

/**
 * Run `task` once every earlier task on the same repository has settled
 */
export async function withRepositoryLock<T>(repoPath: string, task: () => Promise<T>): Promise<T> {
  const key = path.resolve(repoPath);
  const previous = queues.get(key) ?? Promise.resolve();

  const run = previous.then(task);
  // The queue only orders runs; the outcome reaches the caller through `run`
  const settled = run.then(
    () => undefined,
    () => undefined
  );
  queues.set(key, settled);

  try {
    return await run;
  } finally {
    if (queues.get(key) === settled) queues.delete(key);
  }
}

/**
 * Resolves once every queued run, on any repository, has settled
 */
export async function whenRepositoriesIdle(): Promise<void> {
  while (queues.size > 0) {
    await Promise.all(queues.values());
  }
}
