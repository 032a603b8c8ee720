import type { Board } from './Board.ts';
import type { DigitMask } from './digits.ts';
import type { CellPosition } from './grid.ts';

import {
  countDigits,
  maskDigits
} from './digits.ts';
import { BOARD_SIZE } from './grid.ts';
import { isPositiveInteger } from './typeGuards.ts';

export interface CellSelection extends CellPosition {
  readonly candidateCount: number;
  readonly candidates: DigitMask;
}

interface SearchVisitor {
  /**
   * Leave the board filled in when `onSolution` stops the search.
   */
  readonly keepSolution: boolean;
  /**
   * Called at every complete board. Returns `true` to stop searching.
   */
  onSolution(): boolean;
}

const UNIQUENESS_CAP = 2;

/**
 * Counts the completions of `board`, stopping once `maxSolutions` have been found.
 * A result equal to `maxSolutions` is a lower bound, not the full count.
 * The board is left exactly as it was passed in.
 */
export function countSolutions(board: Board, maxSolutions?: number): number {
  if (maxSolutions !== undefined && !isPositiveInteger(maxSolutions)) {
    throw new RangeError(`maxSolutions must be a positive integer, got ${String(maxSolutions)}`);
  }
  let count = 0;
  backtrack(board, {
    keepSolution: false,
    onSolution(): boolean {
      count++;
      return count === maxSolutions;
    }
  });
  return count;
}

export function hasUniqueSolution(board: Board): boolean {
  return countSolutions(board, UNIQUENESS_CAP) === 1;
}

/**
 * Picks the empty cell with the fewest candidates, scanning in row-major order so the
 * first such cell wins ties. Returns `null` when the board has no empty cells.
 */
export function selectCell(board: Board): CellSelection | null {
  let best: CellSelection | null = null;
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let column = 0; column < BOARD_SIZE; column++) {
      if (!board.isEmpty(row, column)) {
        continue;
      }
      const candidates = board.candidateMask(row, column);
      const candidateCount = countDigits(candidates);
      if (best === null || candidateCount < best.candidateCount) {
        best = { candidateCount, candidates, column, row };
        if (candidateCount === 0) {
          return best;
        }
      }
    }
  }
  return best;
}

/**
 * Fills `board` in place with its first completion. On `false` no completion exists
 * and the board is unchanged.
 */
export function solve(board: Board): boolean {
  return backtrack(board, {
    keepSolution: true,
    onSolution(): boolean {
      return true;
    }
  });
}

function backtrack(board: Board, visitor: SearchVisitor): boolean {
  const cell = selectCell(board);
  if (cell === null) {
    return visitor.onSolution();
  }
  for (const digit of maskDigits(cell.candidates)) {
    board.place(cell.row, cell.column, digit);
    const stopped = backtrack(board, visitor);
    if (stopped && visitor.keepSolution) {
      return true;
    }
    board.clear(cell.row, cell.column);
    if (stopped) {
      return true;
    }
  }
  return false;
}
