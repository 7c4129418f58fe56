import { BURNED_CELL } from '../../types/game';
import type { Board } from '../Board';
import type { FireArrowAction } from '../types';

export function mutateArrow(board: Board, action: FireArrowAction): void {
  board.set(action.target.row, action.target.col, BURNED_CELL);
}
