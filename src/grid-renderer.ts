/**
 * Grid rendering utilities for terminal display
 */

import chalk, { type ChalkInstance } from 'chalk';
import { normalizeGrid } from './scorers/example-grader';
import type { ExampleOutcome, Grid } from './types';

export const GRID_COLORS = [
  '#000000', // 0: black
  '#1e93ff', // 1: blue
  '#fa3e31', // 2: red
  '#4fcc30', // 3: green
  '#ffdd00', // 4: yellow
  '#999999', // 5: grey
  '#e53ba3', // 6: pink
  '#ff861c', // 7: orange
  '#88d8f1', // 8: light blue
  '#931131', // 9: maroon
];

export function getColorCode(color: number): string {
  return GRID_COLORS[color] ?? GRID_COLORS[0];
}

export interface RenderOptions {
  /** Print the cell value on top of its color instead of a plain block */
  numbers?: boolean;
  colors?: ChalkInstance;
}

/**
 * Render a grid as colored blocks, two characters per cell.
 */
export function renderGrid(grid: Grid, options: RenderOptions = {}): string[] {
  const colors = options.colors ?? chalk;

  return grid.map((row) =>
    row
      .map((cell) => {
        const paint = colors.bgHex(getColorCode(cell));
        return options.numbers ? paint(`${cell} `) : paint('  ');
      })
      .join('')
  );
}

/**
 * Render grid with border and optional title.
 */
export function renderGridWithBorder(grid: Grid, title?: string, options: RenderOptions = {}): string[] {
  const colors = options.colors ?? chalk;
  const width = (grid[0]?.length ?? 0) * 2;
  const borderWidth = Math.max(width, title ? title.length + 1 : 0);

  const result: string[] = [];
  if (title) {
    result.push(colors.gray(`┌${title.padEnd(borderWidth, '─')}┐`));
  } else {
    result.push(colors.gray(`┌${'─'.repeat(borderWidth)}┐`));
  }
  for (const row of renderGrid(grid, options)) {
    result.push(colors.gray('│') + row + ' '.repeat(borderWidth - width) + colors.gray('│'));
  }
  result.push(colors.gray(`└${'─'.repeat(borderWidth)}┘`));

  return result;
}

/**
 * Renders whatever a candidate produced: a bordered grid when it normalizes
 * to one, otherwise a one-line note.
 */
export function renderValue(value: unknown, title: string, options: RenderOptions = {}): string[] {
  const normalized = normalizeGrid(value);
  if (!normalized) {
    const text = typeof value === 'string' ? JSON.stringify(value) : String(value);
    return [`${title}: (not a grid: ${text.length > 40 ? `${text.slice(0, 37)}...` : text})`];
  }

  const grid: Grid = [];
  for (let r = 0; r < normalized.rows; r++) {
    grid.push(normalized.cells.slice(r * normalized.cols, (r + 1) * normalized.cols));
  }
  return renderGridWithBorder(grid, title, options);
}

/**
 * Places blocks of lines side by side, padding shorter blocks with blank lines.
 */
export function sideBySide(blocks: string[][], gap = 2): string[] {
  const height = Math.max(0, ...blocks.map((block) => block.length));
  // chalk escape codes do not take up columns
  const visibleWidth = (line: string) => line.replace(/\x1b\[[0-9;]*m/g, '').length;
  const widths = blocks.map((block) => Math.max(0, ...block.map(visibleWidth)));

  const lines: string[] = [];
  for (let i = 0; i < height; i++) {
    const parts = blocks.map((block, b) => {
      const line = block[i] ?? '';
      return line + ' '.repeat(widths[b] - visibleWidth(line));
    });
    lines.push(parts.join(' '.repeat(gap)).trimEnd());
  }
  return lines;
}

function describeOutcome(outcome: ExampleOutcome): string {
  switch (outcome.kind) {
    case 'correct':
      return '✓ Correct';
    case 'incorrect':
      return '✗ Incorrect';
    case 'crashed':
      return `✗ Crashed: ${outcome.error}`;
  }
}

/**
 * Input, expected output and produced output of one example, side by side
 */
export function renderExample(
  index: number,
  input: Grid,
  expected: Grid,
  produced: unknown,
  outcome: ExampleOutcome,
  options: RenderOptions = {}
): string[] {
  return [
    `Example ${index} (${describeOutcome(outcome)})`,
    ...sideBySide([
      renderGridWithBorder(input, 'Input', options),
      renderGridWithBorder(expected, 'Expected', options),
      renderValue(produced, 'Produced', options),
    ]),
  ];
}
