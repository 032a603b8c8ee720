export type {
  AnalyzeOptions,
  PuzzleAnalysis
} from './analyzePuzzle.ts';
export type {
  Digit,
  DigitMask
} from './digits.ts';
export type {
  CellPosition,
  CellValue,
  Grid,
  House,
  HouseType
} from './grid.ts';
export type { PuzzleSpec } from './parsers.ts';
export type { CellSelection } from './search.ts';
export type { Conflict } from './validation.ts';

export { analyzePuzzle } from './analyzePuzzle.ts';
export { Board } from './Board.ts';
export {
  DIGITS,
  isDigit,
  maskDigits
} from './digits.ts';
export {
  InvalidPuzzleError,
  MalformedInputError
} from './errors.ts';
export {
  formatGrid,
  formatPuzzleString
} from './formatters.ts';
export {
  boxIndex,
  cloneGrid,
  countEmpty,
  createEmptyGrid,
  getCellRef,
  HOUSES
} from './grid.ts';
export {
  parsePuzzle,
  parsePuzzleSpec
} from './parsers.ts';
export {
  countSolutions,
  hasUniqueSolution,
  selectCell,
  solve
} from './search.ts';
export {
  findConflicts,
  isSolvedGrid,
  isValidGrid
} from './validation.ts';
