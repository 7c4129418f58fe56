/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Rule rejections (a move onto a burned cell, an arrow at an occupied cell)
 * are ordinary values returned as {@link ValidationResult}s. The classes in
 * this module are reserved for contract violations: a caller asking the board
 * for a cell that does not exist, or engine state that no longer satisfies
 * its invariants.
 *
 * Usage:
 * ```typescript
 * import { BoardConstraintViolation, EngineErrorCode } from './errors';
 *
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_INVALID_POSITION,
 *   'Position (7, 0) is outside the 7x7 board',
 *   { row: 7, col: 0 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes are prefixed by category:
 * - STATE_*: Game state corruption/inconsistency
 * - BOARD_*: Board geometry issues
 * - FSM_*: State machine transition errors
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Player position and board contents disagree */
  STATE_PLAYER_POSITION_MISMATCH = 'STATE_PLAYER_POSITION_MISMATCH',
  /** A turn ended without both its step and its arrow */
  STATE_TURN_INCOMPLETE = 'STATE_TURN_INCOMPLETE',

  /** Row/column outside the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Starting layout burns a cell a token starts on */
  BOARD_INVALID_SETUP = 'BOARD_INVALID_SETUP',

  /** Invalid FSM state transition */
  FSM_INVALID_TRANSITION = 'FSM_INVALID_TRANSITION',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Corrupted or unexpected game state',
  BOARD_: 'Board geometry constraint violation',
  FSM_: 'Invalid state machine transition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'Board', 'TurnStateMachine') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown when engine state no longer satisfies its invariants, e.g. a
 * player's recorded position does not hold that player's token.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Thrown when a board accessor is handed a coordinate outside the grid.
 * Callers are expected to bounds-check first.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

export function positionOutOfBounds(
  row: number,
  col: number,
  rows: number,
  cols: number
): BoardConstraintViolation {
  return new BoardConstraintViolation(
    EngineErrorCode.BOARD_INVALID_POSITION,
    `Position (${row}, ${col}) is outside the ${rows}x${cols} board`,
    { row, col, rows, cols }
  );
}
