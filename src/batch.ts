import { maxOverallScore, type ScoringConfig } from './config';
import type { ImplementationRegistry } from './registry';
import { scoreTask, unattemptedResult } from './scorers/task-scorer';
import type { TaskLoader } from './task-data';
import type { BatchResult, ExecutionConfig, TaskPartitions, TaskResult } from './types';

export interface BatchOptions {
  config: ScoringConfig;
  registry: ImplementationRegistry;
  loadTask: TaskLoader;
  execution?: ExecutionConfig; // Default: { mode: 'sequential' }
  verbose?: boolean; // Default: false. Print a line per graded task
}

interface GradedTask {
  taskId: number;
  result: TaskResult;
}

/**
 * Loads, resolves and scores one attempted task
 */
async function gradeAttemptedTask(options: BatchOptions, taskId: number): Promise<GradedTask> {
  const task = await options.loadTask(taskId);
  const resolution = await options.registry.resolve(taskId);
  const { result } = scoreTask(task.examples, resolution, {
    minimalScore: options.config.minimalScore,
  });

  if (options.verbose) {
    console.log(
      `[${task.name}] score ${result.score} | ${result.percentCorrect}% correct ` +
        `(${result.correctExamples.length}/${task.examples.length})`
    );
  }

  return { taskId, result };
}

async function runSequential(options: BatchOptions, taskIds: number[]): Promise<GradedTask[]> {
  const results: GradedTask[] = [];
  for (const taskId of taskIds) {
    results.push(await gradeAttemptedTask(options, taskId));
  }
  return results;
}

/**
 * Run all tasks at once
 */
async function runParallel(options: BatchOptions, taskIds: number[]): Promise<GradedTask[]> {
  return Promise.all(taskIds.map((taskId) => gradeAttemptedTask(options, taskId)));
}

/**
 * Runs task factories with at most `concurrency` in flight, keeping results
 * in input order.
 *
 * After the first rejection no new task starts; the ones already running
 * are awaited and the first error is rethrown.
 */
export async function pLimit<T>(tasks: (() => Promise<T>)[], concurrency: number): Promise<T[]> {
  const results: T[] = [];
  const inFlight = new Set<Promise<void>>();
  const failures: unknown[] = [];

  for (const [index, task] of tasks.entries()) {
    if (failures.length > 0) break;

    const settled: Promise<void> = task()
      .then(
        (result) => {
          results[index] = result;
        },
        (error: unknown) => {
          failures.push(error);
        }
      )
      .finally(() => inFlight.delete(settled));
    inFlight.add(settled);

    if (inFlight.size >= concurrency) {
      await Promise.race(inFlight);
    }
  }

  await Promise.all(inFlight);
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

async function runParallelWithLimit(
  options: BatchOptions,
  taskIds: number[],
  concurrency: number
): Promise<GradedTask[]> {
  return pLimit(
    taskIds.map((taskId) => () => gradeAttemptedTask(options, taskId)),
    concurrency
  );
}

/**
 * Assigns every task to exactly one partition.
 *
 * Precedence for attempted tasks: a score above the minimal score is correct,
 * otherwise no crashed examples is incorrect, otherwise crashed.
 */
export function partitionTasks(
  tasks: ReadonlyMap<number, TaskResult>,
  attempted: ReadonlySet<number>,
  minimalScore: number
): TaskPartitions {
  const partitions: TaskPartitions = { correct: [], incorrect: [], crashed: [], unattempted: [] };
  const taskIds = [...tasks.keys()].sort((a, b) => a - b);

  for (const taskId of taskIds) {
    const result = tasks.get(taskId);
    if (!result || !attempted.has(taskId)) {
      partitions.unattempted.push(taskId);
    } else if (result.score > minimalScore) {
      partitions.correct.push(taskId);
    } else if (result.crashedExamples.length === 0) {
      partitions.incorrect.push(taskId);
    } else {
      partitions.crashed.push(taskId);
    }
  }

  return partitions;
}

/**
 * Scores every task identifier from 1 to `numTasks`.
 *
 * Attempted tasks are graded in the chosen execution mode; the rest get the
 * unattempted result. A task's crash or missing function never stops the
 * batch, but a task whose data cannot be loaded does.
 */
export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  const startTime = Date.now();
  const { config } = options;
  const execution = options.execution || { mode: 'sequential' as const };

  if (execution.mode === 'parallel-limit' && !execution.concurrency) {
    throw new Error('concurrency is required when mode is "parallel-limit"');
  }

  const attemptedIds = (await options.registry.listAttempted()).filter(
    (taskId) => taskId >= 1 && taskId <= config.numTasks
  );

  let graded: GradedTask[];

  switch (execution.mode) {
    case 'sequential':
      graded = await runSequential(options, attemptedIds);
      break;
    case 'parallel':
      graded = await runParallel(options, attemptedIds);
      break;
    case 'parallel-limit':
      graded = await runParallelWithLimit(options, attemptedIds, execution.concurrency ?? 1);
      break;
    default: {
      const _exhaustive: never = execution.mode;
      throw new Error(`Unknown execution mode: ${String(_exhaustive)}`);
    }
  }

  const byId = new Map<number, TaskResult>();
  for (const { taskId, result } of graded) {
    byId.set(taskId, result);
  }

  const tasks: Record<number, TaskResult> = {};
  for (let taskId = 1; taskId <= config.numTasks; taskId++) {
    const result = byId.get(taskId) ?? unattemptedResult(config.minimalScore);
    byId.set(taskId, result);
    tasks[taskId] = result;
  }

  const partitions = partitionTasks(byId, new Set(attemptedIds), config.minimalScore);
  const overallScore = Object.values(tasks).reduce((sum, result) => sum + result.score, 0);

  return {
    timestamp: new Date().toISOString(),
    duration: Date.now() - startTime,
    numTasks: config.numTasks,
    overallScore,
    maxOverallScore: maxOverallScore(config),
    tasks,
    partitions,
  };
}
