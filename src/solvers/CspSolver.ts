import type { Grid } from '../grid.ts';
import type { SolveMetricsSnapshot } from '../SolveMetrics.ts';
import type { Topology } from '../Topology.ts';
import type {
  SolveResult,
  Solver,
  SolverName
} from './Solver.ts';

import { Board } from '../Board.ts';
import {
  assertGrid,
  CELL_COUNT,
  countClues
} from '../grid.ts';
import { Propagator } from '../Propagator.ts';
import { Search } from '../Search.ts';
import { SolveMetrics } from '../SolveMetrics.ts';
import { SUDOKU_TOPOLOGY } from '../Topology.ts';

/**
 * Constraint propagation over the initial clues, then MRV depth-first search
 * for whatever propagation leaves open.
 */
export class CspSolver implements Solver {
  public readonly description = 'Constraint propagation with backtracking search';
  public get lastMetrics(): null | SolveMetricsSnapshot {
    return this._lastMetrics;
  }

  public readonly name: SolverName = 'cp';

  private _lastMetrics: null | SolveMetricsSnapshot = null;

  public constructor(private readonly topology: Topology = SUDOKU_TOPOLOGY) {
  }

  public solve(grid: Grid): SolveResult {
    assertGrid(grid);
    const metrics = new SolveMetrics();
    const propagator = new Propagator(this.topology, metrics);
    const search = new Search(this.topology, propagator, metrics);

    const clueCount = countClues(grid);
    metrics.blankCells = CELL_COUNT - clueCount;

    const propagated = propagator.propagateInitial(grid, Board.createFull());
    if (propagated !== null) {
      metrics.cellsSolvedByPropagation = propagated.solvedCount - clueCount;
      metrics.solvedByPropagationOnly = propagated.isSolution();
    }

    const solution = search.search(propagated);
    const snapshot = metrics.toJSON();
    this._lastMetrics = snapshot;
    if (solution === null) {
      return { metrics: snapshot, status: 'failed' };
    }
    return { grid: solution.toGrid(), metrics: snapshot, status: 'solved' };
  }
}
