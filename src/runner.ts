import type { ChalkInstance } from 'chalk';
import { runBatch } from './batch';
import { formatTaskName, type ScoringConfig } from './config';
import { renderExample } from './grid-renderer';
import { FileSystemRegistry, type ImplementationRegistry } from './registry';
import { writeResults } from './results-writer';
import { roundTo, scoreTask } from './scorers/task-scorer';
import { createTaskLoader, type TaskLoader } from './task-data';
import type { BatchResult, ExampleOutcome, ExecutionConfig, Task, TaskResult } from './types';

export interface ScoreRunOptions {
  config: ScoringConfig;
  registry?: ImplementationRegistry; // Default: solution files under config.solutionsDir
  loadTask?: TaskLoader; // Default: task files under config.dataDir
  verbose?: boolean; // Default: false. Show the error behind every crashed example
  execution?: ExecutionConfig; // Default: { mode: 'sequential' }. All-tasks mode only
  writeReports?: boolean; // Default: true. All-tasks mode only
  colors?: ChalkInstance; // Grid colors for single-task mode
}

export interface SingleTaskReport {
  task: Task;
  /** False when the candidate was missing or not callable; nothing was graded */
  found: boolean;
  result: TaskResult;
  outputs: unknown[];
}

export interface BatchReport {
  result: BatchResult;
  reportPaths: string[];
}

export function createDefaultRegistry(config: ScoringConfig): ImplementationRegistry {
  return new FileSystemRegistry({
    solutionsDir: config.solutionsDir,
    functionName: config.solutionFunctionName,
    maxTaskScore: config.maxTaskScore,
    numTasks: config.numTasks,
  });
}

/**
 * Format the results of a single task for the console
 */
export function formatSingleTaskLog(
  name: string,
  result: TaskResult,
  config: ScoringConfig,
  verbose = false
): string[] {
  const { correctExamples, incorrectExamples, crashedExamples, crashedExampleErrors } = result;
  const total = correctExamples.length + incorrectExamples.length + crashedExamples.length;
  const list = (values: readonly number[]) => `[${values.join(', ')}]`;
  const lines: string[] = [];

  lines.push(`${'='.repeat(20)}${name.toUpperCase()} RESULTS SUMMARY${'='.repeat(20)}`);
  lines.push(`Score: ${result.score}/${config.maxTaskScore}`);
  lines.push(`Percent Correct: ${result.percentCorrect}`);
  lines.push('');
  lines.push(`Correctly solved: ${correctExamples.length}/${total}`);
  lines.push(`\t- ${list(correctExamples)}`);
  lines.push(`Incorrectly solved: ${incorrectExamples.length}/${total}`);
  lines.push(`\t- ${list(incorrectExamples)}`);
  lines.push(`Crashed: ${crashedExamples.length}/${total}`);
  if (verbose) {
    crashedExamples.forEach((index, i) => {
      lines.push(`\t- ${index}: ${crashedExampleErrors[i]}`);
    });
  } else {
    lines.push(`\t- ${list(crashedExamples)}`);
  }

  return lines;
}

function outcomeOf(result: TaskResult, index: number): ExampleOutcome {
  const crashedAt = result.crashedExamples.indexOf(index);
  if (crashedAt !== -1) {
    return { kind: 'crashed', error: result.crashedExampleErrors[crashedAt] };
  }
  return result.correctExamples.includes(index) ? { kind: 'correct' } : { kind: 'incorrect' };
}

/**
 * Scores one task, prints its log and draws its examples.
 *
 * A task whose candidate cannot be resolved stops after a single message,
 * before any log or grid is printed.
 */
export async function scoreSingleTask(taskId: number, options: ScoreRunOptions): Promise<SingleTaskReport> {
  const { config } = options;
  const loadTask = options.loadTask ?? createTaskLoader(config.dataDir);
  const registry = options.registry ?? createDefaultRegistry(config);

  const task = await loadTask(taskId);
  const resolution = await registry.resolve(taskId);
  const { result, outputs } = scoreTask(task.examples, resolution, {
    minimalScore: config.minimalScore,
    storeResults: true,
  });

  if (resolution.status === 'not-found') {
    console.log(`NameError: Function "${config.solutionFunctionName}" not found; the solution cannot be tested.`);
    if (options.verbose) {
      console.log(resolution.reason);
    }
    return { task, found: false, result, outputs };
  }

  console.log(formatSingleTaskLog(task.name, result, config, options.verbose).join('\n'));

  if (config.showGrids !== 'none') {
    const shown = task.examples
      .map((example, index) => ({ example, index, outcome: outcomeOf(result, index) }))
      .filter(({ outcome }) => config.showGrids === 'all' || outcome.kind !== 'correct');

    console.log(`\n${'='.repeat(20)}VISUALIZATION${'='.repeat(20)}`);
    if (shown.length === 0) {
      console.log('No examples to show.');
    }
    for (const { example, index, outcome } of shown) {
      const lines = renderExample(index, example.input, example.output, outputs[index], outcome, {
        colors: options.colors,
      });
      console.log(`${lines.join('\n')}\n`);
    }
  }

  return { task, found: true, result, outputs };
}

/**
 * Scores every task, prints a summary and writes the reports to config.logsDir.
 */
export async function scoreAllTasks(options: ScoreRunOptions): Promise<BatchReport> {
  const { config } = options;
  const execution = options.execution || { mode: 'sequential' as const };

  console.log(`\nScoring ${config.numTasks} tasks from ${config.solutionsDir} (${execution.mode})...\n`);

  const result = await runBatch({
    config,
    registry: options.registry ?? createDefaultRegistry(config),
    loadTask: options.loadTask ?? createTaskLoader(config.dataDir),
    execution,
    verbose: options.verbose,
  });

  const { partitions } = result;
  console.log('\n' + '='.repeat(60));
  console.log('SCORING SUMMARY');
  console.log('='.repeat(60));
  console.log(`Score: ${roundTo(result.overallScore, 3)}/${result.maxOverallScore}`);
  console.log(`Correctly solved: ${partitions.correct.length}/${result.numTasks}`);
  console.log(`Incorrectly solved: ${partitions.incorrect.length}/${result.numTasks}`);
  console.log(`Program crashed: ${partitions.crashed.length}/${result.numTasks}`);
  console.log(`Unattempted: ${partitions.unattempted.length}/${result.numTasks}`);
  console.log(`Total Duration: ${(result.duration / 1000).toFixed(2)}s`);
  if (partitions.correct.length > 0) {
    console.log(`Correct tasks: ${partitions.correct.map(formatTaskName).join(', ')}`);
  }
  console.log('='.repeat(60) + '\n');

  let reportPaths: string[] = [];
  if (options.writeReports !== false) {
    reportPaths = await writeResults(result, config, { verbose: options.verbose });
    console.log(`Results written to: ${config.logsDir}/`);
    for (const reportPath of reportPaths) {
      console.log(`  - ${reportPath}`);
    }
  }

  return { result, reportPaths };
}
