/**
 * Counters of one solve call. A solver creates a fresh instance per call.
 */
export class SolveMetrics {
  public assignments = 0;
  /**
   * Failed search guesses: the guessed digit either contradicted at once or
   * its whole subtree ran out of candidates.
   */
  public backtracks = 0;
  public blankCells = 0;
  public cellsSolvedByPropagation = 0;
  /**
   * Every emptied candidate set and every unit left with no place for a digit,
   * at any depth of propagation.
   */
  public contradictions = 0;
  public solvedByPropagationOnly = false;

  public toJSON(): SolveMetricsSnapshot {
    return {
      assignments: this.assignments,
      backtracks: this.backtracks,
      blankCells: this.blankCells,
      cellsSolvedByPropagation: this.cellsSolvedByPropagation,
      contradictions: this.contradictions,
      solvedByPropagationOnly: this.solvedByPropagationOnly
    };
  }
}

export interface SolveMetricsSnapshot {
  readonly assignments: number;
  readonly backtracks: number;
  readonly blankCells: number;
  readonly cellsSolvedByPropagation: number;
  readonly contradictions: number;
  readonly solvedByPropagationOnly: boolean;
}
