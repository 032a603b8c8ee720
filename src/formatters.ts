import type { Grid } from './grid.ts';

import { BOX_SIZE } from './grid.ts';

const BOX_RULE = '-'.repeat(BOX_SIZE * 2 + 1);
const BORDER = `+${Array.from({ length: BOX_SIZE }, () => BOX_RULE).join('+')}+`;

/**
 * Renders the grid as text with each 3x3 box framed, `.` marking empty cells.
 *
 * ```
 * +-------+-------+-------+
 * | 5 3 . | . 7 . | . . . |
 * ```
 */
export function formatGrid(grid: Grid): string {
  const lines = [BORDER];
  for (const [row, values] of grid.entries()) {
    if (row > 0 && row % BOX_SIZE === 0) {
      lines.push(BORDER);
    }
    const boxes: string[] = [];
    for (let start = 0; start < values.length; start += BOX_SIZE) {
      boxes.push(values.slice(start, start + BOX_SIZE).map((value) => value === null ? '.' : String(value)).join(' '));
    }
    lines.push(`| ${boxes.join(' | ')} |`);
  }
  lines.push(BORDER);
  return lines.join('\n');
}

export function formatPuzzleString(grid: Grid, emptyChar = '.'): string {
  return grid.map((row) => row.map((value) => value === null ? emptyChar : String(value)).join('')).join('');
}
