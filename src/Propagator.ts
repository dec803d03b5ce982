import type { Board } from './Board.ts';
import type {
  Digit,
  Grid
} from './grid.ts';
import type { SolveMetrics } from './SolveMetrics.ts';
import type {
  Cell,
  Topology
} from './Topology.ts';

import { getGridValue } from './grid.ts';
import { isDigit } from './typeGuards.ts';

/**
 * Enforces naked singles and hidden singles until a fixed point or a contradiction.
 *
 * `assign` and `remove` mutate the board in place and return `false` on a
 * contradiction; the board is then inconsistent and must be dropped by its owner.
 */
export class Propagator {
  public constructor(private readonly topology: Topology, private readonly metrics: SolveMetrics) {
  }

  /**
   * Commits `digit` to `cell` by eliminating every other candidate.
   */
  public assign(board: Board, cell: Cell, digit: Digit): boolean {
    this.metrics.assignments++;
    for (const other of board.getCandidates(cell)) {
      if (other !== digit && !this.remove(board, cell, other)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Assigns every clue of the puzzle. Returns `null` when two clues contradict.
   */
  public propagateInitial(puzzle: Grid, board: Board): Board | null {
    for (const cell of this.topology.cells) {
      const value = getGridValue(puzzle, cell.rowIndex, cell.columnIndex);
      if (isDigit(value) && !this.assign(board, cell, value)) {
        return null;
      }
    }
    return board;
  }

  public remove(board: Board, cell: Cell, digit: Digit): boolean {
    if (!board.removeCandidate(cell, digit)) {
      return true;
    }

    const remaining = board.getCandidates(cell);
    const [onlyDigit] = remaining;
    if (onlyDigit === undefined) {
      this.metrics.contradictions++;
      return false;
    }

    if (remaining.length === 1) {
      for (const peer of this.topology.getPeers(cell)) {
        if (!this.remove(board, peer, onlyDigit)) {
          return false;
        }
      }
    }

    for (const unit of this.topology.getUnits(cell)) {
      const places = unit.cells.filter((unitCell) => board.hasCandidate(unitCell, digit));
      const [onlyPlace] = places;
      if (onlyPlace === undefined) {
        this.metrics.contradictions++;
        return false;
      }
      if (places.length === 1 && !board.isSolved(onlyPlace) && !this.assign(board, onlyPlace, digit)) {
        return false;
      }
    }
    return true;
  }
}
