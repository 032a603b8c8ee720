/**
 * Solve a Sudoku puzzle from the command line.
 *
 * Usage:
 *     npm run solve -- tests/fixtures/classic.yaml
 *     npm run solve -- "53..7....6..195....98....6.8...6...34..8.3..17...2...6.6....28....419..5....8..79"
 *
 * A YAML puzzle file holds `puzzle` (81 cells, whitespace ignored) and optionally
 * `title` and `maxSolutions` (a positive integer, or null to count every solution).
 */

/* eslint-disable no-console -- CLI script output. */

import type { PuzzleSpec } from '../src/parsers.ts';

import {
  existsSync,
  readFileSync
} from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import { analyzePuzzle } from '../src/analyzePuzzle.ts';
import {
  InvalidPuzzleError,
  MalformedInputError
} from '../src/errors.ts';
import {
  formatGrid,
  formatPuzzleString
} from '../src/formatters.ts';
import {
  parsePuzzle,
  parsePuzzleSpec
} from '../src/parsers.ts';

const FIRST_CLI_ARG_INDEX = 2;
const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

function isYamlPath(arg: string): boolean {
  return YAML_EXTENSIONS.has(extname(arg));
}

function loadSpec(arg: string): PuzzleSpec {
  if (isYamlPath(arg)) {
    return parsePuzzleSpec(readFileSync(arg, 'utf-8'), basename(arg, extname(arg)));
  }
  return { grid: parsePuzzle(arg), title: 'Command line puzzle' };
}

function main(): void {
  const arg = process.argv[FIRST_CLI_ARG_INDEX];
  if (arg === undefined) {
    console.error('Usage: npm run solve -- <puzzle.yaml | 81-character puzzle>');
    process.exit(1);
  }
  if (isYamlPath(arg) && !existsSync(arg)) {
    console.error(`Error: ${arg} not found`);
    process.exit(1);
  }

  try {
    const spec = loadSpec(arg);
    console.log(`${spec.title}:`);
    console.log(formatGrid(spec.grid));

    const analysis = analyzePuzzle(spec.grid, spec.maxSolutions === undefined ? {} : { maxSolutions: spec.maxSolutions });
    console.log(`Empty cells: ${String(analysis.emptyCount)}`);
    const countLabel = analysis.capped ? `at least ${String(analysis.solutionCount)}` : String(analysis.solutionCount);
    console.log(`Solutions: ${countLabel}`);

    if (analysis.solution === null) {
      console.log('No solution exists for this puzzle.');
      return;
    }
    console.log('Solution:');
    console.log(formatGrid(analysis.solution));
    console.log(formatPuzzleString(analysis.solution));
  } catch (error: unknown) {
    if (error instanceof MalformedInputError || error instanceof InvalidPuzzleError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

main();

/* eslint-enable no-console -- End CLI script output. */
