import { BURNED_CELL, occupiedBy, type Player, type Position } from '../../types/game';
import type { Board } from '../Board';
import { stepPosition } from '../core';
import { EngineErrorCode, InvalidState } from '../errors';
import type { MoveTokenAction } from '../types';

export interface MovementOutcome {
  from: Position;
  to: Position;
}

/**
 * Applies a validated step in place. The cell the token leaves is burned,
 * not emptied.
 */
export function mutateMovement(
  board: Board,
  player: Player,
  action: MoveTokenAction
): MovementOutcome {
  const from = player.position;
  const origin = board.at(from);

  if (origin.kind !== 'occupied' || origin.player !== player.id) {
    throw new InvalidState(
      EngineErrorCode.STATE_PLAYER_POSITION_MISMATCH,
      'MovementMutator: player token not found at recorded position',
      { player: player.id, position: from, cell: origin.kind },
      'MovementMutator'
    );
  }

  const to = stepPosition(from, action.direction);

  // 1. Kill the origin
  board.set(from.row, from.col, BURNED_CELL);

  // 2. Land
  board.set(to.row, to.col, occupiedBy(player.id));
  player.position = to;

  return { from, to };
}
