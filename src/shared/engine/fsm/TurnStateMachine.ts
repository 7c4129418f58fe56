/**
 * TurnStateMachine - Finite State Machine for Isola turn phases
 *
 * A turn is a step followed by an arrow. All valid (state, event) → nextState
 * transitions are declared here; anything else is rejected without touching
 * the state.
 *
 *   awaiting_move(p) --MOVE_TOKEN--> awaiting_arrow(p)
 *   awaiting_arrow(p) --FIRE_ARROW--> awaiting_move(other(p))
 *   awaiting_move(p) --NO_LEGAL_MOVE--> game_over(loser = p)
 *
 * The machine is board-agnostic: whether a step or an arrow is legal on the
 * board is decided by the validators before an event is sent. Entering
 * awaiting_move emits CHECK_LEGAL_MOVES so the owner can evaluate the loss
 * condition against the current board.
 *
 * @module TurnStateMachine
 */

import { otherPlayer, type Direction, type PlayerId, type Position } from '../../types/game';
import { EngineError, EngineErrorCode } from '../errors';

// ═══════════════════════════════════════════════════════════════════════════
// STATES
// ═══════════════════════════════════════════════════════════════════════════

export type TurnState = AwaitingMoveState | AwaitingArrowState | GameOverState;

export type TurnPhase = TurnState['phase'];

export interface AwaitingMoveState {
  readonly phase: 'awaiting_move';
  readonly player: PlayerId;
}

export interface AwaitingArrowState {
  readonly phase: 'awaiting_arrow';
  readonly player: PlayerId;
  /** Where the token landed this turn. */
  readonly movedTo: Position;
}

export interface GameOverState {
  readonly phase: 'game_over';
  readonly loser: PlayerId;
  readonly winner: PlayerId;
  readonly reason: 'no_legal_move';
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type TurnEvent =
  | {
      readonly type: 'MOVE_TOKEN';
      readonly player: PlayerId;
      readonly direction: Direction;
      readonly from: Position;
      readonly to: Position;
    }
  | { readonly type: 'FIRE_ARROW'; readonly player: PlayerId; readonly target: Position }
  | { readonly type: 'NO_LEGAL_MOVE'; readonly player: PlayerId };

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type TransitionResult =
  | { readonly ok: true; readonly state: TurnState; readonly actions: Action[] }
  | { readonly ok: false; readonly error: TransitionError };

export interface TransitionError {
  readonly code: 'INVALID_EVENT' | 'GUARD_FAILED';
  readonly message: string;
  readonly currentPhase: TurnPhase;
  readonly eventType: TurnEvent['type'];
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTIONS - Side effects to apply after transition
// ═══════════════════════════════════════════════════════════════════════════

export type Action =
  | { readonly type: 'MOVE_TOKEN'; readonly player: PlayerId; readonly direction: Direction }
  | { readonly type: 'BURN_CELL'; readonly player: PlayerId; readonly position: Position }
  | { readonly type: 'ADVANCE_PLAYER'; readonly player: PlayerId }
  | { readonly type: 'CHECK_LEGAL_MOVES'; readonly player: PlayerId }
  | { readonly type: 'DECLARE_RESULT'; readonly loser: PlayerId; readonly winner: PlayerId };

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Pure transition function.
 */
export function transition(state: TurnState, event: TurnEvent): TransitionResult {
  switch (state.phase) {
    case 'awaiting_move':
      return handleAwaitingMove(state, event);
    case 'awaiting_arrow':
      return handleAwaitingArrow(state, event);
    case 'game_over':
      return invalidTransition(state, event, 'Game is over - no transitions allowed');
  }
}

function handleAwaitingMove(state: AwaitingMoveState, event: TurnEvent): TransitionResult {
  switch (event.type) {
    case 'MOVE_TOKEN': {
      if (event.player !== state.player) {
        return guardFailed(state, event, `Player ${event.player} cannot move on turn of ${state.player}`);
      }
      return ok<AwaitingArrowState>(
        { phase: 'awaiting_arrow', player: state.player, movedTo: event.to },
        [{ type: 'MOVE_TOKEN', player: state.player, direction: event.direction }]
      );
    }

    case 'NO_LEGAL_MOVE': {
      if (event.player !== state.player) {
        return guardFailed(state, event, 'Only the active player can be out of moves');
      }
      const winner = otherPlayer(state.player);
      return ok<GameOverState>(
        { phase: 'game_over', loser: state.player, winner, reason: 'no_legal_move' },
        [{ type: 'DECLARE_RESULT', loser: state.player, winner }]
      );
    }

    default:
      return invalidTransition(state, event);
  }
}

function handleAwaitingArrow(state: AwaitingArrowState, event: TurnEvent): TransitionResult {
  if (event.type !== 'FIRE_ARROW') {
    return invalidTransition(state, event);
  }
  if (event.player !== state.player) {
    return guardFailed(state, event, `Player ${event.player} cannot fire on turn of ${state.player}`);
  }

  const next = otherPlayer(state.player);
  return ok<AwaitingMoveState>({ phase: 'awaiting_move', player: next }, [
    { type: 'BURN_CELL', player: state.player, position: event.target },
    { type: 'ADVANCE_PLAYER', player: state.player },
    { type: 'CHECK_LEGAL_MOVES', player: next },
  ]);
}

function ok<S extends TurnState>(state: S, actions: Action[]): TransitionResult {
  return { ok: true, state, actions };
}

function invalidTransition(state: TurnState, event: TurnEvent, message?: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'INVALID_EVENT',
      message: message || `Event '${event.type}' not valid in phase '${state.phase}'`,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

function guardFailed(state: TurnState, event: TurnEvent, message: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'GUARD_FAILED',
      message,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE CLASS WRAPPER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wraps the pure transition function with state management.
 */
export class TurnStateMachine {
  private _state: TurnState;
  private readonly history: Array<{ state: TurnState; event: TurnEvent }> = [];

  constructor(initialState: TurnState) {
    this._state = initialState;
  }

  get state(): TurnState {
    return this._state;
  }

  get phase(): TurnPhase {
    return this._state.phase;
  }

  /** Active player, or null once the game is over. */
  get currentPlayer(): PlayerId | null {
    if (this._state.phase === 'game_over') {
      return null;
    }
    return this._state.player;
  }

  /**
   * Send an event to the state machine.
   * Returns actions to apply if successful, or throws on invalid transition.
   */
  send(event: TurnEvent): Action[] {
    const result = transition(this._state, event);

    if (result.ok === false) {
      const { code, message, currentPhase, eventType } = result.error;
      throw new EngineError(
        EngineErrorCode.FSM_INVALID_TRANSITION,
        `[FSM] ${code}: ${message} (phase=${currentPhase}, event=${eventType})`,
        { code, currentPhase, eventType },
        'TurnStateMachine'
      );
    }

    this.history.push({ state: this._state, event });
    this._state = result.state;
    return result.actions;
  }

  getHistory(): ReadonlyArray<{ state: TurnState; event: TurnEvent }> {
    return this.history;
  }

  static createInitialState(startingPlayer: PlayerId = 1): AwaitingMoveState {
    return { phase: 'awaiting_move', player: startingPlayer };
  }
}
