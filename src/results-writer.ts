import fs from 'fs-extra';
import path from 'path';
import { formatTaskName, type BandThresholds, type ScoringConfig } from './config';
import { isFunctionNotFound, roundTo } from './scorers/task-scorer';
import type { BatchResult, TaskResult } from './types';

export const RESULTS_LOG_FILENAME = 'results_log.txt';
export const RESULTS_MARKDOWN_FILENAME = 'results.md';
export const RESULTS_CSV_FILENAME = 'results.csv';
export const RESULTS_JSON_FILENAME = 'results.json';

export type Band = 'red' | 'orange' | 'yellow' | 'green';

const BAND_MARKERS: Record<Band, string> = {
  red: '🟥',
  orange: '🟧',
  yellow: '🟨',
  green: '🟩',
};

/**
 * Color band of a value: red below the first threshold, orange below the
 * second, yellow below the third, green otherwise.
 */
export function band(value: number, thresholds: BandThresholds): Band {
  const [first, second, third] = thresholds;
  if (value < first) return 'red';
  if (value < second) return 'orange';
  if (value < third) return 'yellow';
  return 'green';
}

export interface ReportOptions {
  /** Include the error text of every crashed example. Default: false */
  verbose?: boolean;
}

/**
 * List rendering used throughout the narrative log, e.g. [0, 2]
 */
function formatList(values: readonly number[]): string {
  return `[${values.join(', ')}]`;
}

function taskResult(result: BatchResult, taskId: number): TaskResult {
  const task = result.tasks[taskId];
  if (!task) {
    throw new Error(`No result recorded for ${formatTaskName(taskId)}`);
  }
  return task;
}

/**
 * Format the narrative results log
 */
export function formatResultsLog(
  result: BatchResult,
  config: ScoringConfig,
  options: ReportOptions = {}
): string {
  const { partitions, numTasks } = result;
  const lines: string[] = [];
  const heading = (title: string) => lines.push(`${'='.repeat(20)}${title}${'='.repeat(20)}`);

  heading('RESULTS SUMMARY');
  lines.push(`Score: ${roundTo(result.overallScore, 3)}/${result.maxOverallScore}`);
  lines.push(`Correctly solved: ${partitions.correct.length}/${numTasks}`);
  lines.push(`Incorrectly Solved: ${partitions.incorrect.length}/${numTasks}`);
  lines.push(`Program Crashed: ${partitions.crashed.length}/${numTasks}`);
  lines.push(`Unattempted Tasks: ${partitions.unattempted.length}/${numTasks}`);
  lines.push('');

  heading('CORRECTLY SOLVED TASKS');
  for (const taskId of partitions.correct) {
    lines.push(`${formatTaskName(taskId)}: ${taskResult(result, taskId).score}/${config.maxTaskScore}`);
    lines.push('');
  }

  heading('INCORRECTLY SOLVED TASKS');
  for (const taskId of partitions.incorrect) {
    const task = taskResult(result, taskId);
    lines.push(`${formatTaskName(taskId)}:`);
    lines.push(`\tCorrect Examples: ${formatList(task.correctExamples)}`);
    lines.push(`\tIncorrect Examples: ${formatList(task.incorrectExamples)}`);
    lines.push('');
  }

  heading('CRASHED TASKS');
  for (const taskId of partitions.crashed) {
    const task = taskResult(result, taskId);
    if (isFunctionNotFound(task)) {
      lines.push(`${formatTaskName(taskId)}: NameError-Function "${config.solutionFunctionName}" not found.`);
      lines.push('');
      continue;
    }

    lines.push(`${formatTaskName(taskId)}:`);
    lines.push(`\tCorrect Examples: ${formatList(task.correctExamples)}`);
    lines.push(`\tIncorrect Examples: ${formatList(task.incorrectExamples)}`);
    if (options.verbose) {
      lines.push('\tCrashed Examples:');
      task.crashedExamples.forEach((index, i) => {
        lines.push(`\t\t${index}: ${task.crashedExampleErrors[i]}`);
      });
    } else {
      lines.push(`\tCrashed Examples: ${formatList(task.crashedExamples)}`);
    }
    lines.push('');
  }

  heading('UNATTEMPTED TASKS');
  for (const taskId of partitions.unattempted) {
    lines.push(formatTaskName(taskId));
  }

  return lines.join('\n') + '\n';
}

/**
 * Format the per-task score table as markdown
 */
export function formatResultsAsMarkdown(result: BatchResult, config: ScoringConfig): string {
  const { partitions, numTasks } = result;
  const lines: string[] = [];

  lines.push('# Scoring Results');
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push(`- **Date**: ${new Date(result.timestamp).toLocaleString()}`);
  lines.push(`- **Duration**: ${(result.duration / 1000).toFixed(2)}s`);
  lines.push(`- **Score**: ${roundTo(result.overallScore, 3)}/${result.maxOverallScore}`);
  lines.push(`- **Correct**: ${partitions.correct.length}/${numTasks}`);
  lines.push(`- **Incorrect**: ${partitions.incorrect.length}/${numTasks}`);
  lines.push(`- **Crashed**: ${partitions.crashed.length}/${numTasks}`);
  lines.push(`- **Unattempted**: ${partitions.unattempted.length}/${numTasks}`);
  lines.push('');

  lines.push('## Task Results');
  lines.push('');
  lines.push('| Task | Score | Percent Correct |');
  lines.push('|------|-------|-----------------|');
  for (let taskId = 1; taskId <= numTasks; taskId++) {
    const task = taskResult(result, taskId);
    const scoreMarker = BAND_MARKERS[band(task.score, config.scoreBandThresholds)];
    const percentMarker = BAND_MARKERS[band(task.percentCorrect, config.percentBandThresholds)];
    lines.push(
      `| ${formatTaskName(taskId)} | ${scoreMarker} ${task.score} | ${percentMarker} ${task.percentCorrect} |`
    );
  }
  lines.push('');

  return lines.join('\n');
}

/**
 * Format the per-task score table as CSV
 */
export function formatResultsAsCsv(result: BatchResult, config: ScoringConfig): string {
  const rows = ['task,score,percent_correct,score_band,percent_band'];
  for (let taskId = 1; taskId <= result.numTasks; taskId++) {
    const task = taskResult(result, taskId);
    rows.push(
      [
        formatTaskName(taskId),
        task.score,
        task.percentCorrect,
        band(task.score, config.scoreBandThresholds),
        band(task.percentCorrect, config.percentBandThresholds),
      ].join(',')
    );
  }
  return rows.join('\n') + '\n';
}

/**
 * Write the batch result as JSON file
 * @param filePath - Path where JSON should be written
 */
export async function writeResultsAsJson(result: BatchResult, filePath: string): Promise<void> {
  const json = JSON.stringify(result, null, 2);
  await fs.writeFile(filePath, json, 'utf-8');
}

/**
 * Write every report for a batch run into the configured logs directory
 * @returns Paths of the written files
 */
export async function writeResults(
  result: BatchResult,
  config: ScoringConfig,
  options: ReportOptions = {}
): Promise<string[]> {
  const outputDir = config.logsDir;
  await fs.ensureDir(outputDir);

  const logPath = path.join(outputDir, RESULTS_LOG_FILENAME);
  const markdownPath = path.join(outputDir, RESULTS_MARKDOWN_FILENAME);
  const csvPath = path.join(outputDir, RESULTS_CSV_FILENAME);
  const jsonPath = path.join(outputDir, RESULTS_JSON_FILENAME);

  await fs.writeFile(logPath, formatResultsLog(result, config, options), 'utf-8');
  await fs.writeFile(markdownPath, formatResultsAsMarkdown(result, config), 'utf-8');
  await fs.writeFile(csvPath, formatResultsAsCsv(result, config), 'utf-8');
  await writeResultsAsJson(result, jsonPath);

  return [logPath, markdownPath, csvPath, jsonPath];
}
