import type {
  Digit,
  DigitMask
} from './digits.ts';
import type {
  CellValue,
  Grid,
  HouseType
} from './grid.ts';

import {
  addDigit,
  complementMask,
  EMPTY_MASK,
  hasDigit,
  isDigit,
  maskDigits,
  removeDigit
} from './digits.ts';
import {
  InvalidPuzzleError,
  MalformedInputError
} from './errors.ts';
import {
  BOARD_SIZE,
  boxIndex,
  CELL_COUNT,
  getCellRef
} from './grid.ts';
import { ensureNonNullable } from './typeGuards.ts';

/**
 * A 9x9 board together with the digits in use by every row, column and box.
 *
 * The three constraint-set families always mirror the cell values: `place` and
 * `clear` update a cell and its three sets in one step, so legality checks and
 * candidate lookups never rescan the grid.
 */
export class Board {
  public get emptyCount(): number {
    return this._emptyCount;
  }

  private _emptyCount = CELL_COUNT;
  private readonly boxUsed: DigitMask[] = createMasks();
  private readonly cells: CellValue[] = Array.from({ length: CELL_COUNT }, (): CellValue => null);
  private readonly columnUsed: DigitMask[] = createMasks();
  private readonly rowUsed: DigitMask[] = createMasks();

  public constructor(grid: Grid) {
    assertGridShape(grid);
    for (let row = 0; row < BOARD_SIZE; row++) {
      const values = ensureNonNullable(grid[row]);
      for (let column = 0; column < BOARD_SIZE; column++) {
        const digit = values[column] ?? null;
        if (digit === null) {
          continue;
        }
        const house = this.findConflictingHouse(row, column, digit);
        if (house !== null) {
          throw new InvalidPuzzleError(row, column, digit, house);
        }
        this.place(row, column, digit);
      }
    }
  }

  public candidateMask(row: number, column: number): DigitMask {
    const index = cellIndex(row, column);
    if (this.cells[index] !== null) {
      return EMPTY_MASK;
    }
    return complementMask(this.usedMask(row, column));
  }

  public candidates(row: number, column: number): Digit[] {
    return maskDigits(this.candidateMask(row, column));
  }

  public canPlace(row: number, column: number, digit: Digit): boolean {
    return hasDigit(this.candidateMask(row, column), digit);
  }

  /**
   * Empties a filled cell and releases its digit from the cell's row, column and box.
   * Returns the digit that was removed.
   */
  public clear(row: number, column: number): Digit {
    const index = cellIndex(row, column);
    const digit = this.cells[index] ?? null;
    if (digit === null) {
      throw new Error(`Cannot clear ${getCellRef(row, column)}: cell is already empty`);
    }
    const box = boxIndex(row, column);
    this.cells[index] = null;
    this.rowUsed[row] = removeDigit(ensureNonNullable(this.rowUsed[row]), digit);
    this.columnUsed[column] = removeDigit(ensureNonNullable(this.columnUsed[column]), digit);
    this.boxUsed[box] = removeDigit(ensureNonNullable(this.boxUsed[box]), digit);
    this._emptyCount++;
    return digit;
  }

  public clone(): Board {
    return new Board(this.toGrid());
  }

  public getValue(row: number, column: number): CellValue {
    return this.cells[cellIndex(row, column)] ?? null;
  }

  public isComplete(): boolean {
    return this._emptyCount === 0;
  }

  public isEmpty(row: number, column: number): boolean {
    return this.getValue(row, column) === null;
  }

  /**
   * Writes `digit` into an empty cell. Callers must only pass a digit reported by
   * `candidates`; anything else is a bug in the caller and throws.
   */
  public place(row: number, column: number, digit: Digit): void {
    const index = cellIndex(row, column);
    if (this.cells[index] !== null) {
      throw new Error(`Cannot place ${String(digit)} at ${getCellRef(row, column)}: cell is filled`);
    }
    if (!this.canPlace(row, column, digit)) {
      throw new Error(`Cannot place ${String(digit)} at ${getCellRef(row, column)}: digit is not a candidate`);
    }
    const box = boxIndex(row, column);
    this.cells[index] = digit;
    this.rowUsed[row] = addDigit(ensureNonNullable(this.rowUsed[row]), digit);
    this.columnUsed[column] = addDigit(ensureNonNullable(this.columnUsed[column]), digit);
    this.boxUsed[box] = addDigit(ensureNonNullable(this.boxUsed[box]), digit);
    this._emptyCount--;
  }

  public toGrid(): CellValue[][] {
    const grid: CellValue[][] = [];
    for (let row = 0; row < BOARD_SIZE; row++) {
      grid.push(this.cells.slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE));
    }
    return grid;
  }

  private findConflictingHouse(row: number, column: number, digit: Digit): HouseType | null {
    if (hasDigit(ensureNonNullable(this.rowUsed[row]), digit)) {
      return 'row';
    }
    if (hasDigit(ensureNonNullable(this.columnUsed[column]), digit)) {
      return 'column';
    }
    if (hasDigit(ensureNonNullable(this.boxUsed[boxIndex(row, column)]), digit)) {
      return 'box';
    }
    return null;
  }

  private usedMask(row: number, column: number): DigitMask {
    /* eslint-disable-next-line no-bitwise -- Union of three digit masks. */
    return ensureNonNullable(this.rowUsed[row]) | ensureNonNullable(this.columnUsed[column]) | ensureNonNullable(this.boxUsed[boxIndex(row, column)]);
  }
}

function assertGridShape(grid: Grid): void {
  if (grid.length !== BOARD_SIZE) {
    throw new MalformedInputError(`Grid must have ${String(BOARD_SIZE)} rows, found ${String(grid.length)}`);
  }
  for (const [row, values] of grid.entries()) {
    if (values.length !== BOARD_SIZE) {
      throw new MalformedInputError(`Row ${String(row + 1)} must have ${String(BOARD_SIZE)} cells, found ${String(values.length)}`);
    }
    for (const [column, value] of values.entries()) {
      if (value !== null && !isDigit(value)) {
        throw new MalformedInputError(`${getCellRef(row, column)} holds ${String(value)}, expected a digit 1-9 or null`, row * BOARD_SIZE + column);
      }
    }
  }
}

function cellIndex(row: number, column: number): number {
  if (!Number.isInteger(row) || !Number.isInteger(column) || row < 0 || row >= BOARD_SIZE || column < 0 || column >= BOARD_SIZE) {
    throw new RangeError(`Cell (${String(row)}, ${String(column)}) is outside the board`);
  }
  return row * BOARD_SIZE + column;
}

function createMasks(): DigitMask[] {
  return Array.from({ length: BOARD_SIZE }, (): DigitMask => EMPTY_MASK);
}
