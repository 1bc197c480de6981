// Entry points
export {
  scoreSingleTask,
  scoreAllTasks,
  createDefaultRegistry,
  formatSingleTaskLog,
  type ScoreRunOptions,
  type SingleTaskReport,
  type BatchReport,
} from './runner';
export { runCli, parseCliArgs, UsageError, type CliCommand } from './cli';

// User-facing types
export type {
  BatchResult,
  Candidate,
  Example,
  ExampleOutcome,
  ExecutionConfig,
  ExecutionMode,
  Grid,
  GridDisplay,
  Resolution,
  ScoredTask,
  Task,
  TaskPartition,
  TaskPartitions,
  TaskResult,
} from './types';

// Configuration
export {
  DEFAULT_SCORING_CONFIG,
  createScoringConfig,
  formatTaskName,
  parseTaskName,
  parseTaskNumber,
  maxOverallScore,
  type BandThresholds,
  type ScoringConfig,
} from './config';

// Scoring core
import * as exampleGrader from './scorers/example-grader';
import * as taskScorer from './scorers/task-scorer';
export const scorers = {
  gradeExample: exampleGrader.gradeExample,
  gridsEqual: exampleGrader.gridsEqual,
  normalizeGrid: exampleGrader.normalizeGrid,
  scoreTask: taskScorer.scoreTask,
  percentCorrect: taskScorer.percentCorrect,
};
export type { ExampleGrade } from './scorers/example-grader';
export { FUNCTION_NOT_FOUND, FUNCTION_NOT_FOUND_INDEX, isFunctionNotFound } from './scorers/task-scorer';
export { runBatch, partitionTasks, type BatchOptions } from './batch';

// Implementation registries
export {
  FileSystemRegistry,
  InMemoryRegistry,
  computeTentativeScore,
  type ImplementationRegistry,
  type FileSystemRegistryOptions,
} from './registry';

// Task data
export { createTaskLoader, parseTask, flattenExamples, type TaskLoader, type TaskFile } from './task-data';

// Reports
export {
  writeResults,
  writeResultsAsJson,
  formatResultsLog,
  formatResultsAsMarkdown,
  formatResultsAsCsv,
  band,
  type Band,
  type ReportOptions,
} from './results-writer';
export { renderGrid, renderGridWithBorder, renderExample } from './grid-renderer';
