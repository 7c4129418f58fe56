import type { RejectionCode } from '../../shared/engine';

export const RULES_BANNER = [
  '********** Isola Game **********',
  'Each player has one piece.',
  'The Board has 7 by 7 positions, which initially contain',
  "free spaces ('+') except for the initial positions",
  'of the players. A Move consists of two subsequent actions:',
  '',
  "1. Moving one's piece to a neighboring (horizontally, vertically,",
  "diagonally) field that contains a '+' but not the opponents piece.",
  '',
  "2. Removing any '+' with no piece on it (Replacing it with an 'A').",
  '',
  'If a player cannot move at the beginning of their turn, that player loses the game.',
].join('\n');

export const START_PROMPT = 'Press any key to start...';
export const END_PROMPT = 'Press enter to continue...';

export const MOVE_PROMPT = 'Use the number pad to move in a direction 1-9, but not 5 (see key): ';
export const INVALID_INPUT = 'Invalid Input!';

export const ROW_PROMPT = 'Please select a row: ';
export const COLUMN_PROMPT = 'Please select a column: ';
export const INVALID_COORDINATE = 'Invalid coordinate!';

export const MOVE_REJECTIONS: Partial<Record<RejectionCode, string>> = {
  OUT_OF_BOUNDS: 'Invalid move, please try again: ',
  CELL_BURNED: 'That space is dead, please try again: ',
  CELL_OCCUPIED: 'That space is occupied by the opponent, please try again: ',
};

export const ARROW_REJECTION = 'That location cannot be destroyed.';

export function turnBanner(symbol: string): string {
  return `Turn: ${symbol}`;
}

export function arrowBanner(symbol: string): string {
  return `${symbol} time to fire an arrow!`;
}

export function loserMessage(symbol: string): string {
  return `${symbol} is no longer able to move.`;
}

export function winnerMessage(symbol: string): string {
  return `${symbol} is the winner!`;
}
