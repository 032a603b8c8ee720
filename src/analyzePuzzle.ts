import type {
  CellValue,
  Grid
} from './grid.ts';

import { Board } from './Board.ts';
import { countEmpty } from './grid.ts';
import {
  countSolutions,
  solve
} from './search.ts';

export interface AnalyzeOptions {
  /**
   * Stop counting after this many solutions; `null` counts them all. Defaults to 2,
   * enough to tell a unique puzzle from an ambiguous one.
   */
  readonly maxSolutions?: null | number;
}

export interface PuzzleAnalysis {
  /**
   * `solutionCount` hit the cap, so more solutions may exist.
   */
  readonly capped: boolean;
  readonly emptyCount: number;
  readonly solution: CellValue[][] | null;
  readonly solutionCount: number;
}

const DEFAULT_MAX_SOLUTIONS = 2;

export function analyzePuzzle(grid: Grid, options: AnalyzeOptions = {}): PuzzleAnalysis {
  const board = new Board(grid);
  const maxSolutions = options.maxSolutions === undefined ? DEFAULT_MAX_SOLUTIONS : options.maxSolutions;
  const solutionCount = countSolutions(board, maxSolutions ?? undefined);
  const solution = solutionCount > 0 && solve(board) ? board.toGrid() : null;
  return {
    capped: solutionCount === maxSolutions,
    emptyCount: countEmpty(grid),
    solution,
    solutionCount
  };
}
