import {
  describe,
  expect,
  it
} from 'vitest';

import { Board } from '../src/Board.ts';
import { isValidSolution } from '../src/grid.ts';
import { Propagator } from '../src/Propagator.ts';
import { Search } from '../src/Search.ts';
import { SolveMetrics } from '../src/SolveMetrics.ts';
import { SUDOKU_TOPOLOGY } from '../src/Topology.ts';
import { ensureNonNullable } from '../src/typeGuards.ts';
import {
  CLASSIC_PUZZLE,
  grid
} from './sudokuTestHelper.ts';

function createSearch(): { metrics: SolveMetrics; propagator: Propagator; search: Search } {
  const metrics = new SolveMetrics();
  const propagator = new Propagator(SUDOKU_TOPOLOGY, metrics);
  return { metrics, propagator, search: new Search(SUDOKU_TOPOLOGY, propagator, metrics) };
}

describe('Search', () => {
  describe('selectMostConstrainedCell', () => {
    it('picks the first cell on a tie', () => {
      const { search } = createSearch();
      expect(search.selectMostConstrainedCell(Board.createFull())?.ref).toBe('A1');
    });

    it('skips solved cells and prefers fewer candidates', () => {
      const { propagator, search } = createSearch();
      const board = Board.createFull();
      propagator.assign(board, SUDOKU_TOPOLOGY.getCellByRef('A1'), 5);
      expect(search.selectMostConstrainedCell(board)?.ref).toBe('A2');

      board.removeCandidate(SUDOKU_TOPOLOGY.getCellByRef('H8'), 1);
      board.removeCandidate(SUDOKU_TOPOLOGY.getCellByRef('H8'), 2);
      expect(search.selectMostConstrainedCell(board)?.ref).toBe('H8');
    });

    it('returns null once every cell is solved', () => {
      const { propagator, search } = createSearch();
      const board = ensureNonNullable(propagator.propagateInitial(grid(CLASSIC_PUZZLE), Board.createFull()));
      expect(search.selectMostConstrainedCell(board)).toBeNull();
    });
  });

  describe('search', () => {
    it('passes a failed board through', () => {
      const { search } = createSearch();
      expect(search.search(null)).toBeNull();
    });

    it('returns a solved board as is', () => {
      const { propagator, search } = createSearch();
      const board = ensureNonNullable(propagator.propagateInitial(grid(CLASSIC_PUZZLE), Board.createFull()));
      expect(search.search(board)).toBe(board);
    });

    it('completes an empty board without touching it', () => {
      const { metrics, search } = createSearch();
      const board = Board.createFull();
      const solution = ensureNonNullable(search.search(board));
      expect(isValidSolution(solution.toGrid())).toBe(true);
      expect(solution.toGrid()[0]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(board.solvedCount).toBe(0);
      expect(metrics.backtracks).toBe(0);
    });

    it('fails and counts a backtrack per dead guess', () => {
      const { metrics, search } = createSearch();
      const board = Board.createFull();
      const a1 = SUDOKU_TOPOLOGY.getCellByRef('A1');
      // A1 may only be 1 or 2, and neither digit fits anywhere else in row A.
      for (const digit of [3, 4, 5, 6, 7, 8, 9] as const) {
        board.removeCandidate(a1, digit);
      }
      for (const cell of SUDOKU_TOPOLOGY.rows[0]?.cells ?? []) {
        if (cell !== a1) {
          board.removeCandidate(cell, 1);
          board.removeCandidate(cell, 2);
        }
      }
      expect(search.search(board)).toBeNull();
      expect(metrics.backtracks).toBe(2);
    });
  });
});
