import type {
  Digit,
  Grid
} from './grid.ts';
import type { Cell } from './Topology.ts';

import {
  BLANK,
  CELL_COUNT,
  DIGITS,
  GRID_SIZE
} from './grid.ts';
import { ensureNonNullable } from './typeGuards.ts';

/**
 * Candidate digits of every cell. The propagator mutates a board in place;
 * search clones it before each guess.
 */
export class Board {
  public get solvedCount(): number {
    return this.candidates.filter((set) => set.size === 1).length;
  }

  private constructor(private readonly candidates: readonly Set<Digit>[]) {
  }

  public static createFull(): Board {
    return new Board(Array.from({ length: CELL_COUNT }, () => new Set(DIGITS)));
  }

  public candidateCount(cell: Cell): number {
    return this.getSet(cell).size;
  }

  public clone(): Board {
    return new Board(this.candidates.map((set) => new Set(set)));
  }

  public getCandidates(cell: Cell): Digit[] {
    return [...this.getSet(cell)].sort((a, b) => a - b);
  }

  public hasCandidate(cell: Cell, digit: Digit): boolean {
    return this.getSet(cell).has(digit);
  }

  public isSolution(): boolean {
    return this.candidates.every((set) => set.size === 1);
  }

  public isSolved(cell: Cell): boolean {
    return this.getSet(cell).size === 1;
  }

  public removeCandidate(cell: Cell, digit: Digit): boolean {
    return this.getSet(cell).delete(digit);
  }

  /**
   * Solved cells hold their digit, every other cell is blank.
   */
  public toGrid(): Grid {
    return Array.from({ length: GRID_SIZE }, (_, r) =>
      Array.from({ length: GRID_SIZE }, (__, c) => {
        const set = ensureNonNullable(this.candidates[r * GRID_SIZE + c]);
        const [only] = set;
        return set.size === 1 && only !== undefined ? only : BLANK;
      }));
  }

  private getSet(cell: Cell): Set<Digit> {
    return ensureNonNullable(this.candidates[cell.index]);
  }
}
