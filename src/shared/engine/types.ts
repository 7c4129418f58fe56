import type { Direction, PlayerId, Position } from '../types/game';

export type { Direction, PlayerId, Position };

/**
 * Both halves of a turn are modeled as actions validated against the board.
 */
export interface BaseAction {
  type: 'MOVE_TOKEN' | 'FIRE_ARROW';
  playerId: PlayerId;
}

export interface MoveTokenAction extends BaseAction {
  type: 'MOVE_TOKEN';
  direction: Direction;
}

export interface FireArrowAction extends BaseAction {
  type: 'FIRE_ARROW';
  /** 0-based target cell. */
  target: Position;
}

/**
 * Why an action was refused. Rule rejections come from the validators;
 * phase rejections come from the turn state machine.
 */
export type RejectionCode =
  | 'OUT_OF_BOUNDS'
  | 'CELL_BURNED'
  | 'CELL_OCCUPIED'
  | 'CELL_NOT_EMPTY'
  | 'INVALID_PHASE'
  | 'NOT_YOUR_TURN'
  | 'GAME_OVER';

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: string; code: RejectionCode };

/** One completed turn: the step and the arrow that followed it. */
export interface TurnRecord {
  readonly turn: number;
  readonly player: PlayerId;
  readonly from: Position;
  readonly to: Position;
  readonly arrow: Position;
}
