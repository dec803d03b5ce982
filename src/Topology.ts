import {
  BOX_SIZE,
  GRID_SIZE
} from './grid.ts';
import {
  getCellRef,
  parseCellRef
} from './parsers.ts';
import { ensureNonNullable } from './typeGuards.ts';

export type UnitType = 'box' | 'column' | 'row';

export class Cell {
  public readonly index: number;
  public readonly ref: string;

  public get boxIndex(): number {
    return Math.floor(this.rowIndex / BOX_SIZE) * BOX_SIZE + Math.floor(this.columnIndex / BOX_SIZE);
  }

  public constructor(public readonly rowIndex: number, public readonly columnIndex: number) {
    this.index = rowIndex * GRID_SIZE + columnIndex;
    this.ref = getCellRef(rowIndex + 1, columnIndex + 1);
  }

  public static compare(a: Cell, b: Cell): number {
    return a.index - b.index;
  }

  public toString(): string {
    return this.ref;
  }
}

export class Unit {
  public constructor(public readonly type: UnitType, public readonly id: number, public readonly cells: readonly Cell[]) {
  }

  public contains(cell: Cell): boolean {
    return this.cells.includes(cell);
  }

  public toString(): string {
    const typeLabel = `${this.type.charAt(0).toUpperCase()}${this.type.substring(1)}`;
    return `${typeLabel} ${String(this.id)}`;
  }
}

/**
 * Cells, units and peers of the 9x9 board. Built once and shared read-only by every solve.
 */
export class Topology {
  public readonly boxes: readonly Unit[];
  public readonly cells: readonly Cell[];
  public readonly columns: readonly Unit[];
  public readonly rows: readonly Unit[];
  public readonly units: readonly Unit[];
  private readonly peersByCell: readonly (readonly Cell[])[];
  private readonly unitsByCell: readonly (readonly Unit[])[];

  public constructor() {
    const grid: Cell[][] = [];
    for (let r = 0; r < GRID_SIZE; r++) {
      const row: Cell[] = [];
      for (let c = 0; c < GRID_SIZE; c++) {
        row.push(new Cell(r, c));
      }
      grid.push(row);
    }
    this.cells = Object.freeze(grid.flat());

    const rows: Unit[] = [];
    const columns: Unit[] = [];
    const boxes: Unit[] = [];
    for (let i = 0; i < GRID_SIZE; i++) {
      rows.push(new Unit('row', i + 1, Object.freeze([...ensureNonNullable(grid[i])])));
      columns.push(new Unit('column', i + 1, Object.freeze(grid.map((gridRow) => ensureNonNullable(gridRow[i])))));
      boxes.push(new Unit('box', i + 1, Object.freeze(this.cells.filter((cell) => cell.boxIndex === i))));
    }
    this.rows = Object.freeze(rows);
    this.columns = Object.freeze(columns);
    this.boxes = Object.freeze(boxes);
    this.units = Object.freeze([...rows, ...columns, ...boxes]);

    this.unitsByCell = Object.freeze(this.cells.map((cell) => Object.freeze([
      ensureNonNullable(rows[cell.rowIndex]),
      ensureNonNullable(columns[cell.columnIndex]),
      ensureNonNullable(boxes[cell.boxIndex])
    ])));

    this.peersByCell = Object.freeze(this.cells.map((cell) => {
      const peers = new Set<Cell>();
      for (const unit of this.getUnits(cell)) {
        for (const other of unit.cells) {
          if (other !== cell) {
            peers.add(other);
          }
        }
      }
      return Object.freeze([...peers].sort(Cell.compare));
    }));
  }

  public getCell(rowIndex: number, columnIndex: number): Cell {
    if (columnIndex < 0 || columnIndex >= GRID_SIZE) {
      throw new Error(`No cell at row ${String(rowIndex)}, column ${String(columnIndex)}`);
    }
    return ensureNonNullable(this.cells[rowIndex * GRID_SIZE + columnIndex], `No cell at row ${String(rowIndex)}, column ${String(columnIndex)}`);
  }

  public getCellByRef(ref: string): Cell {
    const parsed = parseCellRef(ref);
    return this.getCell(parsed.rowId - 1, parsed.columnId - 1);
  }

  public getPeers(cell: Cell): readonly Cell[] {
    return ensureNonNullable(this.peersByCell[cell.index]);
  }

  /**
   * Row, column and box of the cell, in that order.
   */
  public getUnits(cell: Cell): readonly Unit[] {
    return ensureNonNullable(this.unitsByCell[cell.index]);
  }
}

export const SUDOKU_TOPOLOGY = new Topology();
