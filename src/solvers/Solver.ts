import type { Grid } from '../grid.ts';
import type { SolveMetricsSnapshot } from '../SolveMetrics.ts';

export type SolveResult = FailedResult | SolvedResult;

export type SolverName = 'backtracking' | 'cp';

export interface Solver {
  readonly description: string;
  readonly lastMetrics: null | SolveMetricsSnapshot;
  readonly name: SolverName;
  solve(grid: Grid): SolveResult;
}

interface FailedResult {
  readonly metrics: SolveMetricsSnapshot;
  readonly status: 'failed';
}

interface SolvedResult {
  readonly grid: Grid;
  readonly metrics: SolveMetricsSnapshot;
  readonly status: 'solved';
}
