export type ExecutionMode = 'sequential' | 'parallel' | 'parallel-limit';

export interface ExecutionConfig {
  mode: ExecutionMode;
  concurrency?: number; // Required when mode = 'parallel-limit'
}

/**
 * Which examples a single-task run draws in the terminal
 * - 'none': no grids
 * - 'failed': only examples that were incorrect or crashed (default)
 * - 'all': every example
 */
export type GridDisplay = 'none' | 'failed' | 'all';

/** Rectangular matrix of color indices (0-9) */
export type Grid = number[][];

export interface Example {
  readonly input: Grid;
  readonly output: Grid;
}

export interface Task {
  readonly taskId: number;
  readonly name: string; // e.g. "task007"
  readonly examples: readonly Example[]; // train + test + arc-gen, in that order
}

/**
 * A candidate implementation: one grid in, anything out.
 * The return value is not trusted and is normalized before comparison.
 */
export type Candidate = (input: Grid) => unknown;

export type Resolution =
  | {
      status: 'found';
      candidate: Candidate;
      size: number; // Bytes of the implementation's source text
      tentativeScore: number; // Score if every example is correct
    }
  | {
      status: 'not-found';
      reason: string;
    };

export type ExampleOutcome =
  | { kind: 'correct' }
  | { kind: 'incorrect' }
  | { kind: 'crashed'; error: string };

export interface TaskResult {
  readonly score: number;
  readonly percentCorrect: number; // 0-100, 2 decimals
  readonly correctExamples: readonly number[];
  readonly incorrectExamples: readonly number[];
  readonly crashedExamples: readonly number[];
  readonly crashedExampleErrors: readonly string[]; // Parallel to crashedExamples
}

export interface ScoredTask {
  result: TaskResult;
  /** Per-example outputs, only filled when results were requested for display */
  outputs: unknown[];
}

export type TaskPartition = 'correct' | 'incorrect' | 'crashed' | 'unattempted';

/** Ascending task identifiers per partition; every identifier is in exactly one */
export type TaskPartitions = Record<TaskPartition, number[]>;

export interface BatchResult {
  timestamp: string;
  duration: number; // milliseconds
  numTasks: number;
  overallScore: number;
  maxOverallScore: number;
  /** Keyed by task identifier, 1..numTasks */
  tasks: Record<number, TaskResult>;
  partitions: TaskPartitions;
}
