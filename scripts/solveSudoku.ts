/**
 * Solve every Sudoku puzzle in a file and print the solutions with their counters.
 *
 * Usage:
 *     npm run solve -- puzzles/sample.yaml
 *     npm run solve -- puzzles/sample.txt backtracking
 *
 * `.yaml`/`.yml` files hold `puzzles: [{ name, grid }]`; any other file is read as
 * `Grid NN` blocks of nine lines of nine digits (0 for a blank).
 */

/* eslint-disable no-console -- CLI script output. */

import type { NamedPuzzle } from '../src/puzzleFiles.ts';
import type { Solver } from '../src/solvers/Solver.ts';

import { existsSync } from 'node:fs';

import { formatGrid } from '../src/parsers.ts';
import { loadPuzzleFile } from '../src/puzzleFiles.ts';
import {
  DEFAULT_SOLVER_NAME,
  findSolver
} from '../src/solvers/createDefaultSolvers.ts';

const FIRST_CLI_ARG_INDEX = 2;

function main(): void {
  const puzzlePath = process.argv[FIRST_CLI_ARG_INDEX];
  const solverName = process.argv[FIRST_CLI_ARG_INDEX + 1] ?? DEFAULT_SOLVER_NAME;
  if (puzzlePath === undefined) {
    console.error('Usage: npm run solve -- <puzzles-file> [cp|backtracking]');
    process.exit(1);
  }
  if (!existsSync(puzzlePath)) {
    console.error(`Error: ${puzzlePath} not found`);
    process.exit(1);
  }

  let solver: Solver;
  try {
    solver = findSolver(solverName);
  } catch (error: unknown) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const puzzles = loadPuzzleFile(puzzlePath);
  console.log(`${solver.description}: ${String(puzzles.length)} puzzle(s)`);

  let solvedCount = 0;
  for (const puzzle of puzzles) {
    if (solvePuzzle(solver, puzzle)) {
      solvedCount++;
    }
  }
  console.log(`Solved ${String(solvedCount)} of ${String(puzzles.length)} puzzles`);
}

function solvePuzzle(solver: Solver, puzzle: NamedPuzzle): boolean {
  const result = solver.solve(puzzle.grid);
  console.log('');
  console.log(puzzle.name);
  if (result.status === 'failed') {
    console.log('No solution');
  } else {
    console.log(formatGrid(result.grid));
  }
  console.log(`assignments: ${String(result.metrics.assignments)}, backtracks: ${String(result.metrics.backtracks)}`);
  return result.status === 'solved';
}

main();

/* eslint-enable no-console -- End CLI script output. */
