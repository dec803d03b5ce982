import {
  ensureNonNullable,
  isGridValue
} from './typeGuards.ts';

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type Grid = readonly (readonly number[])[];

export const BLANK = 0;
export const BOX_SIZE = 3;
export const GRID_SIZE = 9;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export function assertGrid(value: unknown): asserts value is Grid {
  if (!Array.isArray(value) || value.length !== GRID_SIZE) {
    throw new Error(`Grid must have ${String(GRID_SIZE)} rows`);
  }
  for (const [rowIndex, row] of value.entries()) {
    if (!Array.isArray(row) || row.length !== GRID_SIZE) {
      throw new Error(`Row ${String(rowIndex + 1)} must have ${String(GRID_SIZE)} cells`);
    }
    for (const [columnIndex, cellValue] of row.entries()) {
      if (!isGridValue(cellValue)) {
        throw new Error(`Cell at row ${String(rowIndex + 1)}, column ${String(columnIndex + 1)} must be an integer 0-9: ${String(cellValue)}`);
      }
    }
  }
}

export function cloneGrid(grid: Grid): number[][] {
  return grid.map((row) => [...row]);
}

export function countClues(grid: Grid): number {
  let count = 0;
  for (const row of grid) {
    for (const value of row) {
      if (value !== BLANK) {
        count++;
      }
    }
  }
  return count;
}

export function getGridValue(grid: Grid, rowIndex: number, columnIndex: number): number {
  return ensureNonNullable(ensureNonNullable(grid[rowIndex])[columnIndex]);
}

/**
 * Checks that every row, column and box holds each digit 1-9 exactly once.
 */
export function isValidSolution(grid: Grid): boolean {
  for (const group of getGroups(grid)) {
    const seen = new Set<number>();
    for (const value of group) {
      if (value === BLANK || seen.has(value)) {
        return false;
      }
      seen.add(value);
    }
    if (seen.size !== GRID_SIZE) {
      return false;
    }
  }
  return true;
}

export function preservesClues(puzzle: Grid, solution: Grid): boolean {
  for (let r = 0; r < GRID_SIZE; r++) {
    for (let c = 0; c < GRID_SIZE; c++) {
      const clue = getGridValue(puzzle, r, c);
      if (clue !== BLANK && clue !== getGridValue(solution, r, c)) {
        return false;
      }
    }
  }
  return true;
}

function getGroups(grid: Grid): number[][] {
  const groups: number[][] = [];
  for (let i = 0; i < GRID_SIZE; i++) {
    groups.push([...ensureNonNullable(grid[i])]);
    groups.push(grid.map((row) => ensureNonNullable(row[i])));
  }
  for (let boxRow = 0; boxRow < GRID_SIZE; boxRow += BOX_SIZE) {
    for (let boxColumn = 0; boxColumn < GRID_SIZE; boxColumn += BOX_SIZE) {
      const box: number[] = [];
      for (let r = boxRow; r < boxRow + BOX_SIZE; r++) {
        for (let c = boxColumn; c < boxColumn + BOX_SIZE; c++) {
          box.push(getGridValue(grid, r, c));
        }
      }
      groups.push(box);
    }
  }
  return groups;
}
