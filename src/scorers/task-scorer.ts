import type { Example, Resolution, ScoredTask, TaskResult } from '../types';
import { createDummyOutput, gradeExample } from './example-grader';

/**
 * Error recorded for a task whose candidate could not be resolved.
 * Reports match on this value instead of parsing error text.
 */
export const FUNCTION_NOT_FOUND = 'function-not-found';

/**
 * Crashed-example index recorded alongside {@link FUNCTION_NOT_FOUND}; never a real example index
 */
export const FUNCTION_NOT_FOUND_INDEX = -1;

export interface ScoreTaskOptions {
  minimalScore: number;
  /** Keep produced outputs for display. Default: false */
  storeResults?: boolean;
}

/**
 * Rounds to `decimals` places, resolving exact ties to the even neighbour
 * (3.125 → 3.12, 3.135 → 3.14).
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const rounded = scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return rounded / factor;
}

export function percentCorrect(correct: number, total: number): number {
  return total === 0 ? 0 : roundTo((correct / total) * 100, 2);
}

/**
 * Result of a task with no candidate at all
 */
export function unattemptedResult(minimalScore: number): TaskResult {
  return {
    score: minimalScore,
    percentCorrect: 0,
    correctExamples: [],
    incorrectExamples: [],
    crashedExamples: [],
    crashedExampleErrors: [],
  };
}

/**
 * Result of a task whose candidate was looked up but is missing or not callable
 */
export function functionNotFoundResult(minimalScore: number): TaskResult {
  return {
    score: minimalScore,
    percentCorrect: 0,
    correctExamples: [],
    incorrectExamples: [],
    crashedExamples: [FUNCTION_NOT_FOUND_INDEX],
    crashedExampleErrors: [FUNCTION_NOT_FOUND],
  };
}

export function isFunctionNotFound(result: TaskResult): boolean {
  return result.crashedExampleErrors[0] === FUNCTION_NOT_FOUND;
}

/**
 * Grades every example of a task, in order, and applies the scoring rule:
 * the tentative score when every example is correct, the minimal score otherwise.
 */
export function scoreTask(
  examples: readonly Example[],
  resolution: Resolution,
  options: ScoreTaskOptions
): ScoredTask {
  const { minimalScore, storeResults = false } = options;

  if (resolution.status === 'not-found') {
    return {
      result: functionNotFoundResult(minimalScore),
      outputs: storeResults ? examples.map((example) => createDummyOutput(example.output)) : [],
    };
  }

  const correctExamples: number[] = [];
  const incorrectExamples: number[] = [];
  const crashedExamples: number[] = [];
  const crashedExampleErrors: string[] = [];
  const outputs: unknown[] = [];

  examples.forEach((example, index) => {
    const { outcome, output } = gradeExample(resolution.candidate, example);

    switch (outcome.kind) {
      case 'correct':
        correctExamples.push(index);
        break;
      case 'incorrect':
        incorrectExamples.push(index);
        break;
      case 'crashed':
        crashedExamples.push(index);
        crashedExampleErrors.push(outcome.error);
        break;
      default: {
        const _exhaustive: never = outcome;
        throw new Error(`Unknown outcome: ${JSON.stringify(_exhaustive)}`);
      }
    }

    if (storeResults) {
      outputs.push(output);
    }
  });

  // Zero examples cannot prove anything, so they never earn the tentative score
  const allCorrect = examples.length > 0 && correctExamples.length === examples.length;

  return {
    result: {
      score: allCorrect ? resolution.tentativeScore : minimalScore,
      percentCorrect: percentCorrect(correctExamples.length, examples.length),
      correctExamples,
      incorrectExamples,
      crashedExamples,
      crashedExampleErrors,
    },
    outputs,
  };
}
