// =============================================================================
// ISOLA RULES ENGINE - PUBLIC API
// =============================================================================
// Front ends import from this file only.
// =============================================================================

// Core types
export type {
  CellKind,
  CellState,
  Direction,
  KeypadDigit,
  Player,
  PlayerId,
  Position,
} from '../types/game';
export {
  BOARD_CONFIG,
  DIRECTIONS,
  KEYPAD_DIRECTIONS,
  otherPlayer,
  copyPosition,
} from '../types/game';

// Board
export { Board } from './Board';
export type { ReadonlyBoard } from './Board';
export { DIRECTION_DELTAS, getNeighborPositions, stepPosition } from './core';

// Actions & validation
export type {
  FireArrowAction,
  MoveTokenAction,
  RejectionCode,
  TurnRecord,
  ValidationResult,
} from './types';
export { validateArrow, validateMovement } from './validators';
export { mutateArrow, mutateMovement } from './mutators';
export { getLegalDestinations, hasLegalMove } from './turnLogic';

// Turn state machine
export { TurnStateMachine, transition } from './fsm';
export type { TurnEvent, TurnPhase, TurnState, GameOverState } from './fsm';

// Session
export { GameEngine } from './GameEngine';
export type { ArrowResult, GameEngineOptions, GameResult, MoveResult, Rejection } from './GameEngine';

// Notation
export { KEYPAD_LEGEND, formatPosition, formatTurnRecord } from './notation';

// Errors
export {
  BoardConstraintViolation,
  EngineError,
  EngineErrorCode,
  InvalidState,
} from './errors';
