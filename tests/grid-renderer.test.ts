import { describe, expect, test } from 'vitest';
import { Chalk } from 'chalk';
import {
  getColorCode,
  renderExample,
  renderGrid,
  renderGridWithBorder,
  renderValue,
  sideBySide,
} from '../src/grid-renderer';

// No escape codes, so lines can be compared as plain text
const colors = new Chalk({ level: 0 });

describe('Grid Colors', () => {
  test('maps cell values to the palette', () => {
    expect(getColorCode(0)).toBe('#000000');
    expect(getColorCode(3)).toBe('#4fcc30');
    expect(getColorCode(9)).toBe('#931131');
  });

  test('unknown values fall back to black', () => {
    expect(getColorCode(12)).toBe('#000000');
  });
});

describe('Grid Rendering', () => {
  test('each cell is two columns wide', () => {
    expect(renderGrid([[1, 2], [3, 4]], { colors })).toEqual(['    ', '    ']);
  });

  test('numbers mode prints the cell values', () => {
    expect(renderGrid([[1, 2], [3, 4]], { colors, numbers: true })).toEqual(['1 2 ', '3 4 ']);
  });

  test('border fits the grid', () => {
    expect(renderGridWithBorder([[1, 2], [3, 4]], 'In', { colors })).toEqual([
      '┌In──┐',
      '│    │',
      '│    │',
      '└────┘',
    ]);
  });

  test('border widens for a long title', () => {
    expect(renderGridWithBorder([[1]], 'Input', { colors })).toEqual(['┌Input─┐', '│      │', '└──────┘']);
  });

  test('border without a title', () => {
    expect(renderGridWithBorder([[5]], undefined, { colors })).toEqual(['┌──┐', '│  │', '└──┘']);
  });
});

describe('Produced Values', () => {
  test('grid-like values are drawn', () => {
    expect(renderValue([Uint8Array.from([1])], 'Out', { colors })).toEqual(['┌Out─┐', '│    │', '└────┘']);
  });

  test('other values get a one-line note', () => {
    expect(renderValue('hello', 'Produced', { colors })).toEqual(['Produced: (not a grid: "hello")']);
    expect(renderValue(undefined, 'Produced', { colors })).toEqual(['Produced: (not a grid: undefined)']);
  });

  test('long notes are truncated', () => {
    const [line] = renderValue('x'.repeat(50), 'P', { colors });
    expect(line).toBe(`P: (not a grid: "${'x'.repeat(36)}...)`);
  });
});

describe('Layout', () => {
  test('pads blocks to a common width and height', () => {
    expect(sideBySide([['ab', 'c'], ['xyz']])).toEqual(['ab  xyz', 'c']);
  });

  test('escape codes do not count towards width', () => {
    expect(sideBySide([['\x1b[31mab\x1b[39m', 'c'], ['xyz']])).toEqual(['\x1b[31mab\x1b[39m  xyz', 'c']);
  });

  test('renders an example with its outcome', () => {
    const lines = renderExample(3, [[1]], [[2]], 'oops', { kind: 'crashed', error: 'Error: boom' }, { colors });

    expect(lines).toEqual([
      'Example 3 (✗ Crashed: Error: boom)',
      '┌Input─┐  ┌Expected─┐  Produced: (not a grid: "oops")',
      '│      │  │         │',
      '└──────┘  └─────────┘',
    ]);
  });
});
