import {
  describe,
  expect,
  it
} from 'vitest';

import {
  formatGrid,
  formatPuzzleString
} from '../src/formatters.ts';
import { parsePuzzle } from '../src/parsers.ts';
import { CLASSIC_PUZZLE } from './sudokuTestHelper.ts';

describe('formatGrid', () => {
  it('frames each box and marks empty cells with dots', () => {
    expect(formatGrid(parsePuzzle(CLASSIC_PUZZLE)).split('\n')).toEqual([
      '+-------+-------+-------+',
      '| 5 3 . | . 7 . | . . . |',
      '| 6 . . | 1 9 5 | . . . |',
      '| . 9 8 | . . . | . 6 . |',
      '+-------+-------+-------+',
      '| 8 . . | . 6 . | . . 3 |',
      '| 4 . . | 8 . 3 | . . 1 |',
      '| 7 . . | . 2 . | . . 6 |',
      '+-------+-------+-------+',
      '| . 6 . | . . . | 2 8 . |',
      '| . . . | 4 1 9 | . . 5 |',
      '| . . . | . 8 . | . 7 9 |',
      '+-------+-------+-------+'
    ]);
  });
});

describe('formatPuzzleString', () => {
  it('writes the 81-character form', () => {
    expect(formatPuzzleString(parsePuzzle(CLASSIC_PUZZLE))).toBe(CLASSIC_PUZZLE);
  });

  it('uses the requested empty character', () => {
    expect(formatPuzzleString(parsePuzzle(CLASSIC_PUZZLE), '-').slice(0, 9)).toBe('53--7----');
  });
});
