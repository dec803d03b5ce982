import type { Grid } from '../grid.ts';
import type { SolveMetricsSnapshot } from '../SolveMetrics.ts';
import type {
  SolveResult,
  Solver,
  SolverName
} from './Solver.ts';

import {
  assertGrid,
  BLANK,
  BOX_SIZE,
  CELL_COUNT,
  cloneGrid,
  countClues,
  DIGITS,
  GRID_SIZE
} from '../grid.ts';
import { SolveMetrics } from '../SolveMetrics.ts';
import { ensureNonNullable } from '../typeGuards.ts';

interface Position {
  readonly columnIndex: number;
  readonly rowIndex: number;
}

/**
 * Baseline solver: fills the first blank cell in row-major order with the
 * smallest digit that fits, undoing the placement when the rest cannot be filled.
 */
export class BacktrackingSolver implements Solver {
  public readonly description = 'Plain backtracking without propagation';
  public get lastMetrics(): null | SolveMetricsSnapshot {
    return this._lastMetrics;
  }

  public readonly name: SolverName = 'backtracking';

  private _lastMetrics: null | SolveMetricsSnapshot = null;

  public solve(grid: Grid): SolveResult {
    assertGrid(grid);
    const metrics = new SolveMetrics();
    metrics.blankCells = CELL_COUNT - countClues(grid);
    const work = cloneGrid(grid);

    const solved = hasConsistentClues(work) && fill(work, metrics);
    const snapshot = metrics.toJSON();
    this._lastMetrics = snapshot;
    if (!solved) {
      return { metrics: snapshot, status: 'failed' };
    }
    return { grid: work, metrics: snapshot, status: 'solved' };
  }
}

function canPlace(work: readonly (readonly number[])[], position: Position, digit: number): boolean {
  const { columnIndex, rowIndex } = position;
  const row = ensureNonNullable(work[rowIndex]);
  for (let i = 0; i < GRID_SIZE; i++) {
    if (i !== columnIndex && row[i] === digit) {
      return false;
    }
    if (i !== rowIndex && ensureNonNullable(work[i])[columnIndex] === digit) {
      return false;
    }
  }
  const boxRow = rowIndex - rowIndex % BOX_SIZE;
  const boxColumn = columnIndex - columnIndex % BOX_SIZE;
  for (let r = boxRow; r < boxRow + BOX_SIZE; r++) {
    for (let c = boxColumn; c < boxColumn + BOX_SIZE; c++) {
      if ((r !== rowIndex || c !== columnIndex) && ensureNonNullable(work[r])[c] === digit) {
        return false;
      }
    }
  }
  return true;
}

function fill(work: number[][], metrics: SolveMetrics): boolean {
  const position = findBlank(work);
  if (position === null) {
    return true;
  }
  const row = ensureNonNullable(work[position.rowIndex]);
  for (const digit of DIGITS) {
    if (!canPlace(work, position, digit)) {
      continue;
    }
    row[position.columnIndex] = digit;
    metrics.assignments++;
    if (fill(work, metrics)) {
      return true;
    }
    row[position.columnIndex] = BLANK;
    metrics.backtracks++;
  }
  return false;
}

function findBlank(work: readonly (readonly number[])[]): null | Position {
  for (let rowIndex = 0; rowIndex < GRID_SIZE; rowIndex++) {
    const columnIndex = ensureNonNullable(work[rowIndex]).indexOf(BLANK);
    if (columnIndex >= 0) {
      return { columnIndex, rowIndex };
    }
  }
  return null;
}

function hasConsistentClues(work: readonly (readonly number[])[]): boolean {
  for (let rowIndex = 0; rowIndex < GRID_SIZE; rowIndex++) {
    for (let columnIndex = 0; columnIndex < GRID_SIZE; columnIndex++) {
      const value = ensureNonNullable(ensureNonNullable(work[rowIndex])[columnIndex]);
      if (value !== BLANK && !canPlace(work, { columnIndex, rowIndex }, value)) {
        return false;
      }
    }
  }
  return true;
}
