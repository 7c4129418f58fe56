import type { Player } from '../../types/game';
import type { ReadonlyBoard } from '../Board';
import { stepPosition } from '../core';
import type { MoveTokenAction, ValidationResult } from '../types';

export function validateMovement(
  board: ReadonlyBoard,
  player: Player,
  action: MoveTokenAction
): ValidationResult {
  // 1. Turn Check
  if (action.playerId !== player.id) {
    return { valid: false, reason: 'Not your turn', code: 'NOT_YOUR_TURN' };
  }

  const to = stepPosition(player.position, action.direction);

  // 2. Position Validity
  if (!board.isInBounds(to)) {
    return { valid: false, reason: 'Position off board', code: 'OUT_OF_BOUNDS' };
  }

  const landing = board.at(to);

  // 3. Burned Space Check
  if (landing.kind === 'burned') {
    return { valid: false, reason: 'Cannot move onto a burned cell', code: 'CELL_BURNED' };
  }

  // 4. Occupied Space Check (either token; own cell is unreachable with a nonzero delta)
  if (landing.kind === 'occupied') {
    return { valid: false, reason: 'Cell is occupied', code: 'CELL_OCCUPIED' };
  }

  return { valid: true };
}
