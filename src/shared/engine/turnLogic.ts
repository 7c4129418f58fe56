import type { Player, Position } from '../types/game';
import type { ReadonlyBoard } from './Board';
import { getNeighborPositions } from './core';

/**
 * Cells the player could step onto right now. Recomputed from the board on
 * every call; the board changes every turn.
 */
export function getLegalDestinations(board: ReadonlyBoard, player: Player): Position[] {
  return getNeighborPositions(board, player.position).filter(
    (pos) => board.at(pos).kind === 'empty'
  );
}

/**
 * Loss condition: a player with no empty neighbour at the start of their turn
 * has lost.
 */
export function hasLegalMove(board: ReadonlyBoard, player: Player): boolean {
  return getNeighborPositions(board, player.position).some(
    (pos) => board.at(pos).kind === 'empty'
  );
}
