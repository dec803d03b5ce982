import type { Board } from './Board.ts';
import type { Propagator } from './Propagator.ts';
import type { SolveMetrics } from './SolveMetrics.ts';
import type {
  Cell,
  Topology
} from './Topology.ts';

/**
 * Depth-first search that branches on the unsolved cell with the fewest candidates.
 * Every guess goes into a clone, so a dead branch is discarded with its board.
 */
export class Search {
  public constructor(
    private readonly topology: Topology,
    private readonly propagator: Propagator,
    private readonly metrics: SolveMetrics
  ) {
  }

  public search(board: Board | null): Board | null {
    if (board === null) {
      return null;
    }

    const cell = this.selectMostConstrainedCell(board);
    if (cell === null) {
      return board;
    }

    for (const digit of board.getCandidates(cell)) {
      const trial = board.clone();
      const result = this.propagator.assign(trial, cell, digit) ? this.search(trial) : null;
      if (result !== null) {
        return result;
      }
      this.metrics.backtracks++;
    }
    return null;
  }

  /**
   * First unsolved cell, in cell order, among those with the fewest candidates.
   * `null` when every cell is solved.
   */
  public selectMostConstrainedCell(board: Board): Cell | null {
    let best: Cell | null = null;
    let bestCount = Infinity;
    for (const cell of this.topology.cells) {
      const count = board.candidateCount(cell);
      if (count > 1 && count < bestCount) {
        best = cell;
        bestCount = count;
      }
    }
    return best;
  }
}
