import type {
  CellValue,
  Grid
} from '../src/grid.ts';

import { DIGITS } from '../src/digits.ts';
import {
  BOARD_SIZE,
  BOX_SIZE,
  CELL_COUNT,
  cloneGrid,
  getCellValue
} from '../src/grid.ts';
import { parsePuzzle } from '../src/parsers.ts';
import { ensureNonNullable } from '../src/typeGuards.ts';

export const CLASSIC_PUZZLE = '53..7....6..195....98....6.8...6...34..8.3..17...2...6.6....28....419..5....8..79';
export const CLASSIC_SOLUTION = '534678912672195348198342567859761423426853791713924856961537284287419635345286179';

/**
 * The classic solution with R4C6, R4C9, R5C6 and R5C9 blanked. Those cells hold 1 and 3
 * crosswise, so both ways of filling them are valid.
 */
export const TWO_SOLUTION_PUZZLE = '53467891267219534819834256785976.42.42685.79.713924856961537284287419635345286179';

/**
 * Row 1 holds 1-8 and 9 sits at R2C9, leaving R1C9 without a candidate.
 */
export const DEAD_END_PUZZLE = `12345678.${'.'.repeat(8)}9${'.'.repeat(63)}`;

export function blankCells(puzzle: string, shouldBlank: (row: number, column: number) => boolean): CellValue[][] {
  const grid = parsePuzzle(puzzle);
  return grid.map((values, row) => values.map((value, column) => shouldBlank(row, column) ? null : value));
}

/**
 * Counts completions by trying every digit in every empty cell in reading order,
 * checking each placement against the whole grid.
 */
export function bruteForceCount(grid: Grid): number {
  const cells = cloneGrid(grid);

  function isAllowed(row: number, column: number, digit: number): boolean {
    const boxTop = Math.floor(row / BOX_SIZE) * BOX_SIZE;
    const boxLeft = Math.floor(column / BOX_SIZE) * BOX_SIZE;
    for (let i = 0; i < BOARD_SIZE; i++) {
      if (getCellValue(cells, row, i) === digit || getCellValue(cells, i, column) === digit) {
        return false;
      }
      if (getCellValue(cells, boxTop + Math.floor(i / BOX_SIZE), boxLeft + i % BOX_SIZE) === digit) {
        return false;
      }
    }
    return true;
  }

  function walk(index: number): number {
    if (index === CELL_COUNT) {
      return 1;
    }
    const row = Math.floor(index / BOARD_SIZE);
    const column = index % BOARD_SIZE;
    const values = ensureNonNullable(cells[row]);
    if (values[column] !== null) {
      return walk(index + 1);
    }
    let total = 0;
    for (const digit of DIGITS) {
      if (isAllowed(row, column, digit)) {
        values[column] = digit;
        total += walk(index + 1);
        values[column] = null;
      }
    }
    return total;
  }

  return walk(0);
}
