import type { CellValue } from './grid.ts';

import { load } from 'js-yaml';

import { isDigit } from './digits.ts';
import { MalformedInputError } from './errors.ts';
import {
  BOARD_SIZE,
  CELL_COUNT
} from './grid.ts';
import {
  isPositiveInteger,
  isRecord
} from './typeGuards.ts';

export interface PuzzleSpec {
  readonly grid: CellValue[][];
  /**
   * `null` asks for an exhaustive count.
   */
  readonly maxSolutions?: null | number;
  readonly title: string;
}

const EMPTY_CELL_CHARS = new Set(['-', '.', '_']);

/**
 * Reads the 81-character puzzle form: `1`-`9` for givens, `.`, `_` or `-` for
 * empty cells. Whitespace anywhere in the text is skipped.
 */
export function parsePuzzle(text: string): CellValue[][] {
  const cells: CellValue[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (/\s/.test(ch)) {
      continue;
    }
    if (EMPTY_CELL_CHARS.has(ch)) {
      cells.push(null);
      continue;
    }
    const digit = /^[1-9]$/.test(ch) ? Number(ch) : NaN;
    if (!isDigit(digit)) {
      throw new MalformedInputError(`Invalid character '${ch}' at index ${String(i)}`, i);
    }
    cells.push(digit);
  }

  if (cells.length !== CELL_COUNT) {
    throw new MalformedInputError(`Puzzle must contain ${String(CELL_COUNT)} cells, found ${String(cells.length)}`);
  }

  const grid: CellValue[][] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    grid.push(cells.slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE));
  }
  return grid;
}

export function parsePuzzleSpec(text: string, fallbackTitle: string): PuzzleSpec {
  const spec: unknown = load(text);
  if (!isRecord(spec)) {
    throw new MalformedInputError('Puzzle file must be a mapping');
  }

  const puzzle = spec['puzzle'];
  if (typeof puzzle !== 'string') {
    throw new MalformedInputError('puzzle is required and must be a string');
  }

  const title = spec['title'] ?? '';
  if (typeof title !== 'string') {
    throw new MalformedInputError('title must be a string');
  }

  const result = { grid: parsePuzzle(puzzle), title: title.trim() || fallbackTitle };

  const maxSolutions = spec['maxSolutions'];
  if (maxSolutions === undefined) {
    return result;
  }
  if (maxSolutions === null || isPositiveInteger(maxSolutions)) {
    return { ...result, maxSolutions };
  }
  throw new MalformedInputError('maxSolutions must be a positive integer or null');
}
