import { describe, expect, test } from 'vitest';
import { InMemoryRegistry } from '../src/registry';
import {
  FUNCTION_NOT_FOUND,
  FUNCTION_NOT_FOUND_INDEX,
  functionNotFoundResult,
  isFunctionNotFound,
  percentCorrect,
  roundTo,
  scoreTask,
  unattemptedResult,
} from '../src/scorers/task-scorer';
import type { Example, Grid, Resolution } from '../src/types';

const MINIMAL = 0.001;

// Each output is the input unchanged
const identityExamples: Example[] = [
  { input: [[1, 2]], output: [[1, 2]] },
  { input: [[3], [4]], output: [[3], [4]] },
  { input: [[5, 6], [7, 8]], output: [[5, 6], [7, 8]] },
];

const identity = (g: Grid) => g.map((r) => r);
const IDENTITY_SOURCE = 'export const p = (g) => g.map((r) => r);'; // 40 bytes

function found(candidate: (g: Grid) => unknown, tentativeScore = 2000): Resolution {
  return { status: 'found', candidate, size: 2500 - tentativeScore, tentativeScore };
}

describe('Task Scoring', () => {
  test('all examples correct earns the size-based score', async () => {
    const registry = new InMemoryRegistry(2500).register(1, identity, IDENTITY_SOURCE);
    const resolution = await registry.resolve(1);

    const { result } = scoreTask(identityExamples, resolution, { minimalScore: MINIMAL });

    expect(result.score).toBe(2460);
    expect(result.percentCorrect).toBe(100);
    expect(result.correctExamples).toEqual([0, 1, 2]);
    expect(result.incorrectExamples).toEqual([]);
    expect(result.crashedExamples).toEqual([]);
    expect(result.crashedExampleErrors).toEqual([]);
  });

  test('one wrong example drops the score to the minimal score', () => {
    const candidate = (g: Grid) => (g.length === 2 && g[0].length === 1 ? [[0], [0]] : g);

    const { result } = scoreTask(identityExamples, found(candidate), { minimalScore: MINIMAL });

    expect(result.score).toBe(0.001);
    expect(result.percentCorrect).toBe(66.67);
    expect(result.correctExamples).toEqual([0, 2]);
    expect(result.incorrectExamples).toEqual([1]);
    expect(result.crashedExamples).toEqual([]);
  });

  test('a crash is recorded with its error and does not stop later examples', () => {
    const candidate = (g: Grid) => {
      if (g.length === 2 && g[0].length === 2) throw new Error('unsupported shape');
      return g;
    };

    const { result } = scoreTask(identityExamples, found(candidate), { minimalScore: MINIMAL });

    expect(result.score).toBe(0.001);
    expect(result.crashedExamples).toEqual([2]);
    expect(result.crashedExampleErrors).toEqual(['Error: unsupported shape']);
    expect(result.correctExamples).toEqual([0, 1]);
    expect(result.incorrectExamples).toEqual([]);
    expect(result.percentCorrect).toBe(66.67);
  });

  test('an unprintable throw does not stop the task', () => {
    const candidate = (g: Grid) => {
      if (g.length === 1) throw Object.create(null);
      return g;
    };

    const { result } = scoreTask(identityExamples, found(candidate), { minimalScore: MINIMAL });

    expect(result.crashedExamples).toEqual([0]);
    expect(result.crashedExampleErrors).toEqual(['<unprintable [object Object]>']);
    expect(result.correctExamples).toEqual([1, 2]);
  });

  test('examples after a crash are still graded', () => {
    const candidate = (g: Grid) => {
      if (g.length === 1) throw new Error('first one fails');
      return g;
    };

    const { result } = scoreTask(identityExamples, found(candidate), { minimalScore: MINIMAL });

    expect(result.crashedExamples).toEqual([0]);
    expect(result.correctExamples).toEqual([1, 2]);
  });

  test('missing candidate yields the function-not-found result', () => {
    const resolution: Resolution = { status: 'not-found', reason: 'No candidate registered for task009' };

    const { result, outputs } = scoreTask(identityExamples, resolution, { minimalScore: MINIMAL });

    expect(result.score).toBe(0.001);
    expect(result.percentCorrect).toBe(0);
    expect(result.correctExamples).toEqual([]);
    expect(result.incorrectExamples).toEqual([]);
    expect(result.crashedExamples).toEqual([FUNCTION_NOT_FOUND_INDEX]);
    expect(result.crashedExampleErrors).toEqual([FUNCTION_NOT_FOUND]);
    expect(isFunctionNotFound(result)).toBe(true);
    expect(outputs).toEqual([]);
  });

  test('missing candidate with stored results gives zero-filled outputs', () => {
    const resolution: Resolution = { status: 'not-found', reason: 'missing' };

    const { outputs } = scoreTask(identityExamples, resolution, { minimalScore: MINIMAL, storeResults: true });

    expect(outputs).toEqual([[[0, 0]], [[0], [0]], [[0, 0], [0, 0]]]);
  });

  test('outputs are only kept when requested', () => {
    const withoutResults = scoreTask(identityExamples, found(identity), { minimalScore: MINIMAL });
    expect(withoutResults.outputs).toEqual([]);

    const withResults = scoreTask(identityExamples, found(identity), { minimalScore: MINIMAL, storeResults: true });
    expect(withResults.outputs).toEqual(identityExamples.map((example) => example.output));
  });

  test('crashed examples store a zero-filled output in index order', () => {
    const candidate = (g: Grid) => {
      if (g.length === 2 && g[0].length === 1) throw new Error('boom');
      return g;
    };

    const { outputs } = scoreTask(identityExamples, found(candidate), { minimalScore: MINIMAL, storeResults: true });

    expect(outputs).toEqual([[[1, 2]], [[0], [0]], [[5, 6], [7, 8]]]);
  });

  test('a task without examples scores the minimal score', () => {
    const { result } = scoreTask([], found(identity), { minimalScore: MINIMAL });
    expect(result.score).toBe(0.001);
    expect(result.percentCorrect).toBe(0);
  });

  test('every example lands in exactly one list', () => {
    const candidate = (g: Grid) => {
      if (g.length === 1) return g;
      if (g[0].length === 1) throw new Error('column');
      return [[0]];
    };

    const { result } = scoreTask(identityExamples, found(candidate), { minimalScore: MINIMAL });
    const all = [...result.correctExamples, ...result.incorrectExamples, ...result.crashedExamples].sort();

    expect(all).toEqual([0, 1, 2]);
    expect(result.percentCorrect).toBe(33.33);
  });

  test('scoring twice gives identical results', () => {
    const resolution = found(identity, 1800);
    const first = scoreTask(identityExamples, resolution, { minimalScore: MINIMAL });
    const second = scoreTask(identityExamples, resolution, { minimalScore: MINIMAL });
    expect(second).toEqual(first);
  });
});

describe('Degenerate Results', () => {
  test('unattempted result has no example entries', () => {
    expect(unattemptedResult(MINIMAL)).toEqual({
      score: 0.001,
      percentCorrect: 0,
      correctExamples: [],
      incorrectExamples: [],
      crashedExamples: [],
      crashedExampleErrors: [],
    });
    expect(isFunctionNotFound(unattemptedResult(MINIMAL))).toBe(false);
  });

  test('function-not-found result carries the sentinel', () => {
    expect(functionNotFoundResult(MINIMAL).crashedExampleErrors).toEqual(['function-not-found']);
  });
});

describe('Percent Correct', () => {
  test('rounds to two decimals', () => {
    expect(percentCorrect(2, 3)).toBe(66.67);
    expect(percentCorrect(1, 3)).toBe(33.33);
    expect(percentCorrect(1, 8)).toBe(12.5);
    expect(percentCorrect(0, 5)).toBe(0);
  });

  test('exact ties round to the even neighbour', () => {
    expect(percentCorrect(1, 32)).toBe(3.12);
    expect(percentCorrect(5, 32)).toBe(15.62);
    expect(percentCorrect(3, 32)).toBe(9.38);
    expect(percentCorrect(1, 16)).toBe(6.25);
  });

  test('roundTo keeps the requested decimals', () => {
    expect(roundTo(2000.39900000001, 3)).toBe(2000.399);
  });
});
