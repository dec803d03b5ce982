import type {
  Solver,
  SolverName
} from './Solver.ts';

import { BacktrackingSolver } from './BacktrackingSolver.ts';
import { CspSolver } from './CspSolver.ts';

export const DEFAULT_SOLVER_NAME: SolverName = 'cp';

export function createDefaultSolvers(): Solver[] {
  return [
    new CspSolver(),
    new BacktrackingSolver()
  ];
}

export function findSolver(name: string): Solver {
  const solver = createDefaultSolvers().find((candidate) => candidate.name === name);
  if (!solver) {
    throw new Error(`Unknown solver: ${name}`);
  }
  return solver;
}
