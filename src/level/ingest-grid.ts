import { levelEmptyError, levelNotRectangularError } from './level-error.js';
import type { CharGrid } from './types.js';

function splitLines(text: string): readonly string[] {
  if (text === '') {
    return [];
  }

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export function ingestGrid(text: string): CharGrid {
  const rows = splitLines(text).map((line) => Array.from(line));
  const firstRow = rows[0];
  if (firstRow === undefined || firstRow.length === 0) {
    throw levelEmptyError();
  }

  const width = firstRow.length;
  for (const [index, row] of rows.entries()) {
    if (row.length !== width) {
      throw levelNotRectangularError(index, row.length, width);
    }
  }

  return { width, height: rows.length, rows };
}

export function charAt(grid: CharGrid, x: number, y: number): string | undefined {
  return grid.rows[y]?.[x];
}
