export type {
  Digit,
  Grid
} from './grid.ts';
export type { NamedPuzzle } from './puzzleFiles.ts';
export type { SolveMetricsSnapshot } from './SolveMetrics.ts';
export type {
  SolveResult,
  Solver,
  SolverName
} from './solvers/Solver.ts';
export type { UnitType } from './Topology.ts';

export { Board } from './Board.ts';
export {
  assertGrid,
  countClues,
  isValidSolution,
  preservesClues
} from './grid.ts';
export {
  formatGrid,
  formatPuzzleLine,
  getCellRef,
  parseCellRef,
  parsePuzzleLine
} from './parsers.ts';
export { Propagator } from './Propagator.ts';
export {
  loadPuzzleFile,
  parseGridBlocks,
  parsePuzzleYaml
} from './puzzleFiles.ts';
export { Search } from './Search.ts';
export { SolveMetrics } from './SolveMetrics.ts';
export { BacktrackingSolver } from './solvers/BacktrackingSolver.ts';
export {
  createDefaultSolvers,
  DEFAULT_SOLVER_NAME,
  findSolver
} from './solvers/createDefaultSolvers.ts';
export { CspSolver } from './solvers/CspSolver.ts';
export {
  Cell,
  SUDOKU_TOPOLOGY,
  Topology,
  Unit
} from './Topology.ts';
