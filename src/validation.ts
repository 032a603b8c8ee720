import type { Digit } from './digits.ts';
import type {
  CellPosition,
  Grid,
  House
} from './grid.ts';

import {
  BOARD_SIZE,
  countEmpty,
  getCellValue,
  HOUSES
} from './grid.ts';

export interface Conflict {
  readonly cells: readonly CellPosition[];
  readonly digit: Digit;
  readonly house: House;
}

/**
 * Lists every house holding a digit more than once. Empty cells are ignored.
 */
export function findConflicts(grid: Grid): Conflict[] {
  const conflicts: Conflict[] = [];
  for (const house of HOUSES) {
    const cellsByDigit = new Map<Digit, CellPosition[]>();
    for (const cell of house.cells) {
      const digit = getCellValue(grid, cell.row, cell.column);
      if (digit === null) {
        continue;
      }
      const cells = cellsByDigit.get(digit) ?? [];
      cells.push(cell);
      cellsByDigit.set(digit, cells);
    }
    for (const [digit, cells] of [...cellsByDigit].sort(([a], [b]) => a - b)) {
      if (cells.length > 1) {
        conflicts.push({ cells, digit, house });
      }
    }
  }
  return conflicts;
}

/**
 * True when every row, column and box holds each digit exactly once.
 */
export function isSolvedGrid(grid: Grid): boolean {
  const isFullSize = grid.length === BOARD_SIZE && grid.every((row) => row.length === BOARD_SIZE);
  return isFullSize && countEmpty(grid) === 0 && isValidGrid(grid);
}

export function isValidGrid(grid: Grid): boolean {
  return findConflicts(grid).length === 0;
}
