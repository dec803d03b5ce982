import type { Grid } from './grid.ts';

import {
  BLANK,
  CELL_COUNT,
  GRID_SIZE
} from './grid.ts';
import { ensureNonNullable } from './typeGuards.ts';

export interface CellRef {
  readonly columnId: number;
  readonly rowId: number;
}

const CHAR_CODE_A = 65;
const BLANK_CHARS = new Set(['.', '0']);

export function formatGrid(grid: Grid): string {
  return grid.map((row) => row.join('')).join('\n');
}

export function formatPuzzleLine(grid: Grid): string {
  return grid.map((row) => row.join('')).join('');
}

/**
 * Row letter followed by column digit: row 1, column 1 is `A1`, row 9, column 9 is `I9`.
 */
export function getCellRef(rowId: number, columnId: number): string {
  return String.fromCharCode(CHAR_CODE_A + rowId - 1) + String(columnId);
}

export function parseCellRef(token: string): CellRef {
  const m = /^(?<row>[A-I])(?<col>[1-9])$/.exec(token.trim().toUpperCase());
  if (!m) {
    throw new Error(`Bad cell ref: ${token}`);
  }
  const groups = ensureNonNullable(m.groups);
  return {
    columnId: parseInt(ensureNonNullable(groups['col']), 10),
    rowId: ensureNonNullable(groups['row']).charCodeAt(0) - CHAR_CODE_A + 1
  };
}

/**
 * Parses 81 cells in row-major order. Digits 1-9 are clues, `0` and `.` are blanks,
 * whitespace is ignored.
 */
export function parsePuzzleLine(text: string): Grid {
  const chars = Array.from(text.replace(/\s+/g, ''));
  if (chars.length !== CELL_COUNT) {
    throw new Error(`Expected ${String(CELL_COUNT)} cells, got ${String(chars.length)}`);
  }
  const values = chars.map((ch, i) => {
    if (BLANK_CHARS.has(ch)) {
      return BLANK;
    }
    if (!/^[1-9]$/.test(ch)) {
      throw new Error(`Unexpected character '${ch}' at position ${String(i + 1)}`);
    }
    return parseInt(ch, 10);
  });
  return Array.from({ length: GRID_SIZE }, (_, r) => values.slice(r * GRID_SIZE, (r + 1) * GRID_SIZE));
}
