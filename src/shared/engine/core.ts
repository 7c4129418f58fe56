import { DIRECTIONS, type Direction, type Position } from '../types/game';
import type { ReadonlyBoard } from './Board';

export interface Delta {
  readonly row: number;
  readonly col: number;
}

/** Row grows downwards, column grows to the right. */
export const DIRECTION_DELTAS: Readonly<Record<Direction, Delta>> = {
  N: { row: -1, col: 0 },
  NE: { row: -1, col: 1 },
  E: { row: 0, col: 1 },
  SE: { row: 1, col: 1 },
  S: { row: 1, col: 0 },
  SW: { row: 1, col: -1 },
  W: { row: 0, col: -1 },
  NW: { row: -1, col: -1 },
};

export function stepPosition(from: Position, direction: Direction): Position {
  const delta = DIRECTION_DELTAS[direction];
  return { row: from.row + delta.row, col: from.col + delta.col };
}

/**
 * Moore neighbourhood of a cell, clipped to the board. Corners have 3
 * neighbours, edges 5, interior cells 8.
 */
export function getNeighborPositions(board: ReadonlyBoard, pos: Position): Position[] {
  return DIRECTIONS.map((direction) => stepPosition(pos, direction)).filter((p) =>
    board.isInBounds(p)
  );
}
