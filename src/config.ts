import type { GridDisplay } from './types';

/** Ascending upper bounds of the red, orange and yellow bands; anything above is green */
export type BandThresholds = readonly [number, number, number];

export interface ScoringConfig {
  readonly numTasks: number;
  readonly maxTaskScore: number;
  readonly minimalScore: number; // Score of any task that is not fully correct
  readonly solutionFunctionName: string; // Export looked up in each solution module
  readonly dataDir: string;
  readonly solutionsDir: string;
  readonly logsDir: string;
  readonly scoreBandThresholds: BandThresholds;
  readonly percentBandThresholds: BandThresholds;
  readonly showGrids: GridDisplay;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze({
  numTasks: 400,
  maxTaskScore: 2500,
  minimalScore: 0.001,
  solutionFunctionName: 'p',
  dataDir: './data',
  solutionsDir: './task_solutions',
  logsDir: './logs',
  scoreBandThresholds: [625, 1250, 1875] as const,
  percentBandThresholds: [25, 50, 75] as const,
  showGrids: 'failed' as const,
});

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function validateThresholds(name: string, thresholds: BandThresholds): void {
  const [first, second, third] = thresholds;
  if (!(first < second && second < third)) {
    throw new Error(`${name} must be strictly ascending, got [${thresholds.join(', ')}]`);
  }
}

/**
 * Builds the immutable configuration for a scoring run.
 * Overrides are merged over {@link DEFAULT_SCORING_CONFIG} and validated.
 */
export function createScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  const config: ScoringConfig = { ...DEFAULT_SCORING_CONFIG, ...overrides };

  if (!Number.isInteger(config.numTasks) || config.numTasks < 1) {
    throw new Error(`numTasks must be a positive integer, got ${config.numTasks}`);
  }
  if (!Number.isInteger(config.maxTaskScore) || config.maxTaskScore < 1) {
    throw new Error(`maxTaskScore must be a positive integer, got ${config.maxTaskScore}`);
  }
  if (!(config.minimalScore > 0 && config.minimalScore < 1)) {
    throw new Error(`minimalScore must be between 0 and 1 (exclusive), got ${config.minimalScore}`);
  }
  if (!IDENTIFIER_PATTERN.test(config.solutionFunctionName)) {
    throw new Error(`solutionFunctionName must be a valid identifier, got "${config.solutionFunctionName}"`);
  }
  validateThresholds('scoreBandThresholds', config.scoreBandThresholds);
  validateThresholds('percentBandThresholds', config.percentBandThresholds);

  return Object.freeze(config);
}

/** Upper bound of the overall score: every task correct with a zero-byte solution */
export function maxOverallScore(config: ScoringConfig): number {
  return config.numTasks * config.maxTaskScore;
}

/**
 * Task identifier to its file stem, e.g. 7 → "task007"
 */
export function formatTaskName(taskId: number): string {
  return `task${String(taskId).padStart(3, '0')}`;
}

/**
 * Inverse of {@link formatTaskName}; returns undefined for anything that is not `task<digits>`
 */
export function parseTaskName(name: string): number | undefined {
  const match = /^task(\d+)$/.exec(name);
  return match ? Number(match[1]) : undefined;
}

/**
 * Validates a task number typed by a user. Leading zeros are accepted.
 * @throws Error when the value is not all digits or falls outside [1, numTasks]
 */
export function parseTaskNumber(value: string, numTasks: number): number {
  const taskId = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(taskId) || taskId < 1 || taskId > numTasks) {
    throw new Error(
      `"${value}" is not a valid task number; you must input an integer from 1 to ${numTasks}`
    );
  }
  return taskId;
}
