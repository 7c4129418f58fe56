import type { Position } from '../types/game';
import type { TurnRecord } from './types';

/**
 * Reminder of the digit for each direction, laid out like a numeric keypad.
 */
export const KEYPAD_LEGEND = ['7-8-9', '4---6', '1-2-3'].join('\n');

/**
 * Format a position the way players type it: 1-based "(row, col)".
 */
export function formatPosition(pos: Position): string {
  return `(${pos.row + 1}, ${pos.col + 1})`;
}

/**
 * Compact one-line summary of a completed turn, e.g.
 * "3. B (1, 4) -> (2, 4) x (1, 3)".
 */
export function formatTurnRecord(record: TurnRecord, symbol: string): string {
  return `${record.turn}. ${symbol} ${formatPosition(record.from)} -> ${formatPosition(
    record.to
  )} x ${formatPosition(record.arrow)}`;
}
