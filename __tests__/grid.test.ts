import {
  describe,
  expect,
  it
} from 'vitest';

import {
  boxIndex,
  cloneGrid,
  countEmpty,
  createEmptyGrid,
  getCellRef,
  HOUSES
} from '../src/grid.ts';
import { parsePuzzle } from '../src/parsers.ts';
import { CLASSIC_PUZZLE } from './sudokuTestHelper.ts';

describe('boxIndex', () => {
  it('numbers boxes in reading order', () => {
    expect(boxIndex(0, 0)).toBe(0);
    expect(boxIndex(1, 5)).toBe(1);
    expect(boxIndex(4, 8)).toBe(5);
    expect(boxIndex(8, 3)).toBe(7);
    expect(boxIndex(8, 8)).toBe(8);
  });
});

describe('getCellRef', () => {
  it('uses one-based row and column numbers', () => {
    expect(getCellRef(0, 0)).toBe('R1C1');
    expect(getCellRef(3, 7)).toBe('R4C8');
  });
});

describe('HOUSES', () => {
  it('lists rows, columns and boxes', () => {
    expect(HOUSES).toHaveLength(27);
    expect(HOUSES.map((house) => house.type).slice(8, 10)).toEqual(['row', 'column']);
    expect(HOUSES[26]?.type).toBe('box');
  });

  it('covers the cells of a box', () => {
    const box = HOUSES.find((house) => house.type === 'box' && house.index === 5);
    expect(box?.cells.map((cell) => boxIndex(cell.row, cell.column))).toEqual([5, 5, 5, 5, 5, 5, 5, 5, 5]);
    expect(box?.cells[0]).toEqual({ column: 6, row: 3 });
    expect(box?.cells[8]).toEqual({ column: 8, row: 5 });
  });
});

describe('grid helpers', () => {
  it('counts empty cells', () => {
    expect(countEmpty(createEmptyGrid())).toBe(81);
    expect(countEmpty(parsePuzzle(CLASSIC_PUZZLE))).toBe(51);
  });

  it('copies rows when cloning', () => {
    const grid = parsePuzzle(CLASSIC_PUZZLE);
    const copy = cloneGrid(grid);
    copy[0] = [];
    expect(grid[0]?.[0]).toBe(5);
  });
});
