import type { Digit } from './digits.ts';
import type { HouseType } from './grid.ts';

import { getCellRef } from './grid.ts';

/**
 * The givens of a puzzle break the Sudoku rules: `digit` at (`row`, `column`)
 * already appears in the named house.
 */
export class InvalidPuzzleError extends Error {
  public override readonly name = 'InvalidPuzzleError';

  public constructor(
    public readonly row: number,
    public readonly column: number,
    public readonly digit: Digit,
    public readonly house: HouseType
  ) {
    super(`Digit ${String(digit)} at ${getCellRef(row, column)} repeats in its ${house}`);
  }
}

/**
 * Puzzle text or grid that cannot be read as a 9x9 board.
 */
export class MalformedInputError extends Error {
  public override readonly name = 'MalformedInputError';

  public constructor(message: string, public readonly position: null | number = null) {
    super(message);
  }
}
