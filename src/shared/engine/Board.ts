import {
  BOARD_CONFIG,
  CELL_SYMBOLS,
  EMPTY_CELL,
  type CellKind,
  type CellState,
  type PlayerId,
  type Position,
} from '../types/game';
import { positionOutOfBounds } from './errors';

/**
 * What the board looks like to anything outside the session: every query,
 * no writes.
 */
export interface ReadonlyBoard {
  readonly rows: number;
  readonly cols: number;
  isInBounds(pos: Position): boolean;
  get(row: number, col: number): CellState;
  at(pos: Position): CellState;
  countCells(kind: CellKind): number;
  positionsOf(kind: CellKind): Position[];
  render(symbols?: Readonly<Record<PlayerId, string>>): string;
}

/**
 * Fixed-size grid of cell states. The board knows nothing about the rules;
 * legality of every write is the caller's responsibility.
 */
export class Board implements ReadonlyBoard {
  readonly rows: number;
  readonly cols: number;
  private cells: CellState[][];

  constructor(rows: number = BOARD_CONFIG.rows, cols: number = BOARD_CONFIG.cols) {
    this.rows = rows;
    this.cols = cols;
    this.cells = Array.from({ length: rows }, () =>
      Array.from({ length: cols }, () => EMPTY_CELL)
    );
  }

  isInBounds(pos: Position): boolean {
    return pos.row >= 0 && pos.row < this.rows && pos.col >= 0 && pos.col < this.cols;
  }

  /**
   * @throws BoardConstraintViolation when the coordinate is off the grid.
   */
  get(row: number, col: number): CellState {
    return this.rowAt(row, col)[col];
  }

  /**
   * Overwrites a cell unconditionally.
   *
   * @throws BoardConstraintViolation when the coordinate is off the grid.
   */
  set(row: number, col: number, state: CellState): void {
    this.rowAt(row, col)[col] = state;
  }

  at(pos: Position): CellState {
    return this.get(pos.row, pos.col);
  }

  countCells(kind: CellKind): number {
    return this.positionsOf(kind).length;
  }

  positionsOf(kind: CellKind): Position[] {
    const result: Position[] = [];
    this.cells.forEach((cells, row) => {
      cells.forEach((cell, col) => {
        if (cell.kind === kind) {
          result.push({ row, col });
        }
      });
    });
    return result;
  }

  /**
   * Human-readable grid: a header of 1-based column numbers, then one line per
   * row prefixed with its 1-based number.
   *
   *   1234567
   * 1 +++B+++
   */
  render(symbols: Readonly<Record<PlayerId, string>> = BOARD_CONFIG.symbols): string {
    let header = '  ';
    for (let col = 0; col < this.cols; col++) {
      header += String(col + 1);
    }

    const lines = [header];
    this.cells.forEach((cells, row) => {
      const body = cells
        .map((cell) => (cell.kind === 'occupied' ? symbols[cell.player] : CELL_SYMBOLS[cell.kind]))
        .join('');
      lines.push(`${row + 1} ${body}`);
    });

    return lines.join('\n') + '\n';
  }

  private rowAt(row: number, col: number): CellState[] {
    if (!Number.isInteger(row) || !Number.isInteger(col) || !this.isInBounds({ row, col })) {
      throw positionOutOfBounds(row, col, this.rows, this.cols);
    }
    return this.cells[row];
  }
}
