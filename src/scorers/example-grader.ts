import type { Candidate, Example, ExampleOutcome, Grid } from '../types';

/**
 * A grid in comparable form: its shape plus row-major cells
 */
interface NormalizedGrid {
  rows: number;
  cols: number;
  cells: number[];
}

type NumericTypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

const TYPED_ARRAY_CONSTRUCTORS = [
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
  Float32Array,
  Float64Array,
];

function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return TYPED_ARRAY_CONSTRUCTORS.some((ctor) => value instanceof ctor);
}

function toRow(value: unknown): number[] | undefined {
  const cells: unknown[] | undefined = Array.isArray(value)
    ? value
    : isNumericTypedArray(value)
      ? Array.from(value)
      : undefined;
  if (!cells) return undefined;

  const row: number[] = [];
  for (const cell of cells) {
    if (typeof cell !== 'number' || !Number.isFinite(cell)) return undefined;
    row.push(cell);
  }
  return row;
}

/**
 * Normalizes an untrusted value into a rectangular numeric grid.
 * Returns undefined for anything ragged, non-numeric or not an array of rows.
 */
export function normalizeGrid(value: unknown): NormalizedGrid | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  if (value.length === 0) {
    return { rows: 0, cols: 0, cells: [] };
  }

  const cells: number[] = [];
  let cols: number | undefined;

  for (const rawRow of value) {
    const row = toRow(rawRow);
    if (!row) return undefined;
    if (cols === undefined) {
      cols = row.length;
    } else if (row.length !== cols) {
      return undefined;
    }
    cells.push(...row);
  }

  return { rows: value.length, cols: cols ?? 0, cells };
}

/**
 * Deep elementwise equality: same shape, same value in every cell.
 * Values that cannot be normalized never equal anything.
 */
export function gridsEqual(actual: unknown, expected: unknown): boolean {
  const a = normalizeGrid(actual);
  const b = normalizeGrid(expected);
  if (!a || !b) return false;
  if (a.rows !== b.rows || a.cols !== b.cols) return false;
  return a.cells.every((cell, i) => cell === b.cells[i]);
}

/**
 * Zero-filled grid with the same shape as `grid`
 */
export function createDummyOutput(grid: Grid): Grid {
  return grid.map((row) => row.map(() => 0));
}

/**
 * Text recorded for a crash. Never throws, even for values that refuse
 * conversion to a string.
 */
export function describeError(error: unknown): string {
  try {
    return error instanceof Error ? error.toString() : String(error);
  } catch {
    return `<unprintable ${Object.prototype.toString.call(error)}>`;
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export const PROMISE_RETURNED_ERROR = 'TypeError: candidate returned a Promise; solutions must be synchronous';

export interface ExampleGrade {
  outcome: ExampleOutcome;
  /** Produced value, or a zero-filled grid of the expected shape when the candidate crashed */
  output: unknown;
}

/**
 * Runs a candidate on one example and classifies the result.
 *
 * This is the only place a fault raised by candidate code becomes a value:
 * anything thrown is reported as `crashed` and never propagates.
 */
export function gradeExample(candidate: Candidate, example: Example): ExampleGrade {
  let output: unknown;
  try {
    output = candidate(structuredClone(example.input));
  } catch (error) {
    return {
      outcome: { kind: 'crashed', error: describeError(error) },
      output: createDummyOutput(example.output),
    };
  }

  if (isThenable(output)) {
    // Already graded as crashed; a later rejection must not go unhandled
    void Promise.resolve(output).then(undefined, () => undefined);
    return {
      outcome: { kind: 'crashed', error: PROMISE_RETURNED_ERROR },
      output: createDummyOutput(example.output),
    };
  }

  return {
    outcome: gridsEqual(output, example.output) ? { kind: 'correct' } : { kind: 'incorrect' },
    output,
  };
}
