import type { ReadonlyBoard } from '../Board';
import type { FireArrowAction, ValidationResult } from '../types';

export function validateArrow(board: ReadonlyBoard, action: FireArrowAction): ValidationResult {
  if (!board.isInBounds(action.target)) {
    return { valid: false, reason: 'Position off board', code: 'OUT_OF_BOUNDS' };
  }

  // Covers burned cells and both tokens.
  if (board.at(action.target).kind !== 'empty') {
    return { valid: false, reason: 'Cell cannot be destroyed', code: 'CELL_NOT_EMPTY' };
  }

  return { valid: true };
}
