import { performance } from 'node:perf_hooks';

import pMap from 'p-map';

import { detectParallelism } from './detect.js';

export interface TaskDefinition<T> {
  readonly id: string;
  run(): Promise<T> | T;
}

export interface TaskResult<T> {
  readonly id: string;
  readonly index: number;
  readonly value: T;
  readonly durationMs: number;
}

export interface TaskQueueOptions<T = unknown> {
  readonly concurrency?: number;
  /** Invoked as each task settles successfully, in completion order. */
  readonly onTaskComplete?: (result: TaskResult<T>) => void;
}

export interface TaskQueueMetrics {
  readonly concurrency: number;
  readonly taskCount: number;
}

export interface TaskQueueOutcome<T> {
  readonly results: readonly TaskResult<T>[];
  readonly metrics: TaskQueueMetrics;
}

/**
 * Executes the provided tasks while respecting a bounded concurrency limit.
 *
 * Results keep the input ordering regardless of when the underlying tasks resolve. The first
 * failure rejects the queue and no further tasks are started.
 *
 * @param tasks - The definitions describing how to run each unit of work.
 * @param options - Queue configuration, including the desired concurrency cap.
 * @returns Task results alongside derived queue metrics.
 */
export async function runTaskQueue<T>(
  tasks: readonly TaskDefinition<T>[],
  options: TaskQueueOptions<T> = {},
): Promise<TaskQueueOutcome<T>> {
  if (tasks.length === 0) {
    return {
      results: [],
      metrics: { concurrency: 0, taskCount: 0 },
    } satisfies TaskQueueOutcome<T>;
  }

  const concurrency = normaliseConcurrency(options.concurrency, tasks.length);
  const results = await pMap(
    tasks,
    async (task, index) => {
      const startedAt = performance.now();
      const value = await task.run();
      const result = {
        id: task.id,
        index,
        value,
        durationMs: performance.now() - startedAt,
      } satisfies TaskResult<T>;

      options.onTaskComplete?.(result);
      return result;
    },
    { concurrency, stopOnError: true },
  );

  return {
    results,
    metrics: { concurrency, taskCount: tasks.length },
  } satisfies TaskQueueOutcome<T>;
}

/**
 * Derives the effective concurrency to use for a task queue.
 *
 * @param requested - The caller-specified concurrency or `undefined` to auto-detect.
 * @param taskCount - The number of tasks that will be executed.
 * @returns The positive concurrency value that should be applied.
 */
export function normaliseConcurrency(requested: number | undefined, taskCount: number): number {
  if (taskCount <= 0) {
    return 0;
  }

  if (requested !== undefined) {
    if (!Number.isFinite(requested) || requested <= 0) {
      throw new TypeError('Concurrency must be a positive finite number.');
    }

    return Math.max(1, Math.min(taskCount, Math.floor(requested)));
  }

  return Math.max(1, Math.min(taskCount, detectParallelism()));
}
