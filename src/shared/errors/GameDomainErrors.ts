/**
 * Game Domain Errors - Structured error types for the game session
 *
 * Rule rejections never surface as exceptions; they are returned as values
 * and re-prompted. These errors cover what the session cannot recover from
 * on its own: the input stream ending mid-game, a session driven after it
 * finished, or a bad environment at startup.
 *
 * Usage:
 * ```typescript
 * import { GameError, InputClosedError } from './GameDomainErrors';
 *
 * throw new InputClosedError({ phase: 'awaiting_move' });
 *
 * if (error instanceof GameError) {
 *   logger.error(error.message, error.toJSON());
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum GameErrorCode {
  // Game State Errors
  GAME_NOT_ACTIVE = 'GAME_NOT_ACTIVE',

  // Console Errors
  INPUT_CLOSED = 'INPUT_CLOSED',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Process exit status for each error type.
 */
export const ERROR_EXIT_CODE: Record<GameErrorCode, number> = {
  [GameErrorCode.GAME_NOT_ACTIVE]: 1,
  [GameErrorCode.INPUT_CLOSED]: 1,
  [GameErrorCode.INTERNAL_ERROR]: 70,
  [GameErrorCode.CONFIGURATION_ERROR]: 78,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether the session had to be aborted */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODE[this.code] ?? 1;
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The input stream ended while the game was still waiting for a player.
 */
export class InputClosedError extends GameError {
  constructor(context: Record<string, unknown> = {}) {
    super(GameErrorCode.INPUT_CLOSED, 'Input closed before the game finished', context, true);
    this.name = 'InputClosedError';
    Object.setPrototypeOf(this, InputClosedError.prototype);
  }
}

/**
 * A finished session was asked to play again.
 */
export class GameNotActiveError extends GameError {
  constructor(status: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.GAME_NOT_ACTIVE,
      `Game is not active (status: ${status})`,
      { status, ...context },
      false
    );
    this.name = 'GameNotActiveError';
    Object.setPrototypeOf(this, GameNotActiveError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(
    GameErrorCode.INTERNAL_ERROR,
    message,
    { ...context, originalStack: stack },
    true
  );
}
