import type { Digit } from './digits.ts';

export type CellValue = Digit | null;

export type Grid = readonly (readonly CellValue[])[];

export type HouseType = 'box' | 'column' | 'row';

export interface CellPosition {
  readonly column: number;
  readonly row: number;
}

export interface House {
  readonly cells: readonly CellPosition[];
  readonly index: number;
  readonly type: HouseType;
}

export const BOX_SIZE = 3;
export const BOARD_SIZE = BOX_SIZE * BOX_SIZE;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

export function boxIndex(row: number, column: number): number {
  return Math.floor(row / BOX_SIZE) * BOX_SIZE + Math.floor(column / BOX_SIZE);
}

export function cloneGrid(grid: Grid): CellValue[][] {
  return grid.map((row) => [...row]);
}

export function countEmpty(grid: Grid): number {
  let count = 0;
  for (const row of grid) {
    for (const value of row) {
      if (value === null) {
        count++;
      }
    }
  }
  return count;
}

export function createEmptyGrid(): CellValue[][] {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, (): CellValue => null));
}

export function getCellRef(row: number, column: number): string {
  return `R${String(row + 1)}C${String(column + 1)}`;
}

/**
 * Reads a cell, treating positions outside the grid as empty.
 */
export function getCellValue(grid: Grid, row: number, column: number): CellValue {
  return grid[row]?.[column] ?? null;
}

function buildHouses(): House[] {
  const rows: House[] = [];
  const columns: House[] = [];
  const boxes: House[] = [];
  for (let index = 0; index < BOARD_SIZE; index++) {
    const rowCells: CellPosition[] = [];
    const columnCells: CellPosition[] = [];
    const boxCells: CellPosition[] = [];
    const boxTop = Math.floor(index / BOX_SIZE) * BOX_SIZE;
    const boxLeft = (index % BOX_SIZE) * BOX_SIZE;
    for (let offset = 0; offset < BOARD_SIZE; offset++) {
      rowCells.push({ column: offset, row: index });
      columnCells.push({ column: index, row: offset });
      boxCells.push({
        column: boxLeft + offset % BOX_SIZE,
        row: boxTop + Math.floor(offset / BOX_SIZE)
      });
    }
    rows.push({ cells: rowCells, index, type: 'row' });
    columns.push({ cells: columnCells, index, type: 'column' });
    boxes.push({ cells: boxCells, index, type: 'box' });
  }
  return [...rows, ...columns, ...boxes];
}

/**
 * All 27 houses: rows first, then columns, then boxes, each ordered by index.
 */
export const HOUSES: readonly House[] = buildHouses();
