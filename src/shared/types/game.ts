/**
 * Core game types shared by the rules engine and the console front end.
 */

export type PlayerId = 1 | 2;

export const PLAYER_IDS: readonly PlayerId[] = [1, 2] as const;

/** 0-based board coordinate. */
export interface Position {
  row: number;
  col: number;
}

export type CellState =
  | { readonly kind: 'empty' }
  | { readonly kind: 'burned' }
  | { readonly kind: 'occupied'; readonly player: PlayerId };

export type CellKind = CellState['kind'];

export const EMPTY_CELL: CellState = { kind: 'empty' };
export const BURNED_CELL: CellState = { kind: 'burned' };

export function occupiedBy(player: PlayerId): CellState {
  return { kind: 'occupied', player };
}

export interface Player {
  readonly id: PlayerId;
  readonly symbol: string;
  position: Position;
}

/** Compass directions a token can step in. There is no "stay" direction. */
export type Direction = 'N' | 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW';

export const DIRECTIONS: readonly Direction[] = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'];

/** Digits accepted from the numeric keypad (5 is the centre and is not a move). */
export type KeypadDigit = 1 | 2 | 3 | 4 | 6 | 7 | 8 | 9;

export const KEYPAD_DIRECTIONS: Readonly<Record<KeypadDigit, Direction>> = {
  1: 'SW',
  2: 'S',
  3: 'SE',
  4: 'W',
  6: 'E',
  7: 'NW',
  8: 'N',
  9: 'NE',
};

export function isKeypadDigit(value: number): value is KeypadDigit {
  return Object.prototype.hasOwnProperty.call(KEYPAD_DIRECTIONS, value);
}

export interface BoardConfig {
  readonly rows: number;
  readonly cols: number;
  readonly startingPositions: Readonly<Record<PlayerId, Position>>;
  readonly symbols: Readonly<Record<PlayerId, string>>;
}

export const BOARD_CONFIG: BoardConfig = {
  rows: 7,
  cols: 7,
  startingPositions: {
    1: { row: 0, col: 3 },
    2: { row: 6, col: 3 },
  },
  symbols: {
    1: 'B',
    2: 'W',
  },
};

export const CELL_SYMBOLS = {
  empty: '+',
  burned: 'A',
} as const;

export function copyPosition(pos: Position): Position {
  return { row: pos.row, col: pos.col };
}

export function otherPlayer(player: PlayerId): PlayerId {
  return player === 1 ? 2 : 1;
}
