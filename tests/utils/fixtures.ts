/**
 * Test Fixtures and Utilities
 * Common helpers for Isola tests
 */

import {
  BURNED_CELL,
  type CellKind,
  type Direction,
  type Position,
} from '../../src/shared/types/game';
import type { Board, ReadonlyBoard } from '../../src/shared/engine/Board';
import { GameEngine } from '../../src/shared/engine/GameEngine';

/**
 * Position helper - creates a 0-based position object
 */
export function pos(row: number, col: number): Position {
  return { row, col };
}

/**
 * Burn cells directly on the board, bypassing the rules.
 */
export function burn(board: Board, ...positions: Position[]): void {
  for (const p of positions) {
    board.set(p.row, p.col, BURNED_CELL);
  }
}

/**
 * Snapshot of every cell's kind, row by row. Cheap to compare with toEqual.
 */
export function cellKinds(board: ReadonlyBoard): CellKind[][] {
  const rows: CellKind[][] = [];
  for (let row = 0; row < board.rows; row++) {
    const kinds: CellKind[] = [];
    for (let col = 0; col < board.cols; col++) {
      kinds.push(board.get(row, col).kind);
    }
    rows.push(kinds);
  }
  return rows;
}

/**
 * Creates a fresh engine with both tokens on their starting cells and the
 * given cells already burned.
 */
export function createTestEngine(...burned: Position[]): GameEngine {
  return new GameEngine({ burned });
}

/**
 * Plays a full turn and fails the test if either half is rejected.
 */
export function playTurn(engine: GameEngine, direction: Direction, arrow: Position): void {
  const moved = engine.move(direction);
  if (!moved.valid) {
    throw new Error(`Move ${direction} rejected: ${moved.code}`);
  }
  const fired = engine.fireArrow(arrow);
  if (!fired.valid) {
    throw new Error(`Arrow at ${arrow.row},${arrow.col} rejected: ${fired.code}`);
  }
}
