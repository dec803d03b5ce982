import {
  describe,
  expect,
  it
} from 'vitest';

import { BacktrackingSolver } from '../../src/solvers/BacktrackingSolver.ts';
import { CspSolver } from '../../src/solvers/CspSolver.ts';
import {
  CLASSIC_PUZZLE,
  CLASSIC_SOLUTION,
  DUPLICATE_ROW_PUZZLE,
  grid,
  ONE_BLANK_PUZZLE
} from '../sudokuTestHelper.ts';

describe('BacktrackingSolver', () => {
  it('solves the classic puzzle', () => {
    const result = new BacktrackingSolver().solve(grid(CLASSIC_PUZZLE));
    expect(result.status).toBe('solved');
    expect(result.status === 'solved' ? result.grid : null).toEqual(grid(CLASSIC_SOLUTION));
    expect(result.metrics.assignments).toBe(4208);
    expect(result.metrics.backtracks).toBe(4157);
  });

  it('agrees with the propagation solver on a uniquely solvable puzzle', () => {
    const baseline = new BacktrackingSolver().solve(grid(CLASSIC_PUZZLE));
    const propagated = new CspSolver().solve(grid(CLASSIC_PUZZLE));
    expect(baseline.status === 'solved' ? baseline.grid : null).toEqual(propagated.status === 'solved' ? propagated.grid : null);
  });

  it('places a single blank with one assignment', () => {
    const solver = new BacktrackingSolver();
    solver.solve(grid(ONE_BLANK_PUZZLE));
    expect(solver.lastMetrics).toEqual({
      assignments: 1,
      backtracks: 0,
      blankCells: 1,
      cellsSolvedByPropagation: 0,
      contradictions: 0,
      solvedByPropagationOnly: false
    });
  });

  it('fails on clashing clues without searching', () => {
    const result = new BacktrackingSolver().solve(grid(DUPLICATE_ROW_PUZZLE));
    expect(result.status).toBe('failed');
    expect(result.metrics.assignments).toBe(0);
  });
});
