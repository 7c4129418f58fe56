import {
  BOARD_CONFIG,
  PLAYER_IDS,
  BURNED_CELL,
  copyPosition,
  occupiedBy,
  type Direction,
  type Player,
  type PlayerId,
  type Position,
} from '../types/game';
import { Board, type ReadonlyBoard } from './Board';
import { stepPosition } from './core';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';
import { TurnStateMachine, type Action, type TurnState } from './fsm';
import { mutateArrow, mutateMovement, type MovementOutcome } from './mutators';
import { getLegalDestinations, hasLegalMove } from './turnLogic';
import type { FireArrowAction, MoveTokenAction, TurnRecord, ValidationResult } from './types';
import { validateArrow, validateMovement } from './validators';

export type Rejection = Extract<ValidationResult, { valid: false }>;

export type MoveResult = { valid: true; from: Position; to: Position } | Rejection;

export type ArrowResult = { valid: true; target: Position; gameOver: boolean } | Rejection;

export interface GameResult {
  loser: PlayerId;
  winner: PlayerId;
}

export interface GameEngineOptions {
  /** Cells that start the game already burned. */
  burned?: ReadonlyArray<Position>;
}

/**
 * A single game session. Owns the board, both players and the turn state
 * machine; every mutation goes through {@link move} or {@link fireArrow}.
 *
 * Rejected actions return a {@link Rejection} and leave the session exactly
 * as it was, so callers can simply ask the same player again. Players,
 * positions and turn records cross the boundary as copies.
 */
export class GameEngine {
  private readonly _board: Board;
  private readonly players: Record<PlayerId, Player>;
  private readonly fsm: TurnStateMachine;
  private readonly history: TurnRecord[] = [];
  private pendingStep: MovementOutcome | null = null;
  private result: GameResult | null = null;

  constructor(options: GameEngineOptions = {}) {
    this._board = new Board(BOARD_CONFIG.rows, BOARD_CONFIG.cols);
    this.players = {
      1: this.createPlayer(1),
      2: this.createPlayer(2),
    };
    for (const id of PLAYER_IDS) {
      const { position } = this.players[id];
      this._board.set(position.row, position.col, occupiedBy(id));
    }
    for (const cell of options.burned ?? []) {
      if (this._board.at(cell).kind === 'occupied') {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_SETUP,
          `Cannot burn starting cell (${cell.row}, ${cell.col})`,
          { row: cell.row, col: cell.col },
          'GameEngine'
        );
      }
      this._board.set(cell.row, cell.col, BURNED_CELL);
    }

    const initial = TurnStateMachine.createInitialState();
    this.fsm = new TurnStateMachine(initial);
    this.applyActions([{ type: 'CHECK_LEGAL_MOVES', player: initial.player }]);
  }

  get board(): ReadonlyBoard {
    return this._board;
  }

  get state(): TurnState {
    return this.fsm.state;
  }

  get activePlayer(): Player | null {
    const id = this.fsm.currentPlayer;
    return id === null ? null : this.getPlayer(id);
  }

  get isGameOver(): boolean {
    return this.fsm.phase === 'game_over';
  }

  getPlayer(id: PlayerId): Player {
    const player = this.players[id];
    return { id: player.id, symbol: player.symbol, position: copyPosition(player.position) };
  }

  getResult(): GameResult | null {
    return this.result && { ...this.result };
  }

  getHistory(): TurnRecord[] {
    return this.history.map((record) => ({
      ...record,
      from: copyPosition(record.from),
      to: copyPosition(record.to),
      arrow: copyPosition(record.arrow),
    }));
  }

  hasLegalMove(id: PlayerId): boolean {
    return hasLegalMove(this._board, this.players[id]);
  }

  getLegalDestinations(id: PlayerId): Position[] {
    return getLegalDestinations(this._board, this.players[id]);
  }

  /**
   * Step the active player's token one cell in `direction`.
   */
  move(direction: Direction): MoveResult {
    const state = this.fsm.state;
    if (state.phase === 'game_over') {
      return { valid: false, reason: 'Game is over', code: 'GAME_OVER' };
    }
    if (state.phase !== 'awaiting_move') {
      return { valid: false, reason: 'An arrow must be fired first', code: 'INVALID_PHASE' };
    }

    const player = this.players[state.player];
    const action: MoveTokenAction = { type: 'MOVE_TOKEN', playerId: player.id, direction };
    const validation = validateMovement(this._board, player, action);
    if (!validation.valid) {
      return validation;
    }

    const from = copyPosition(player.position);
    const to = stepPosition(from, direction);
    this.applyActions(this.fsm.send({ type: 'MOVE_TOKEN', player: player.id, direction, from, to }));

    return { valid: true, from: copyPosition(from), to: copyPosition(to) };
  }

  /**
   * Burn an empty cell. `target` is 0-based.
   */
  fireArrow(requested: Position): ArrowResult {
    const target = copyPosition(requested);
    const state = this.fsm.state;
    if (state.phase === 'game_over') {
      return { valid: false, reason: 'Game is over', code: 'GAME_OVER' };
    }
    if (state.phase !== 'awaiting_arrow') {
      return { valid: false, reason: 'The token must move first', code: 'INVALID_PHASE' };
    }

    const action: FireArrowAction = { type: 'FIRE_ARROW', playerId: state.player, target };
    const validation = validateArrow(this._board, action);
    if (!validation.valid) {
      return validation;
    }

    this.applyActions(this.fsm.send({ type: 'FIRE_ARROW', player: state.player, target }));

    return { valid: true, target: copyPosition(target), gameOver: this.isGameOver };
  }

  private applyActions(actions: Action[]): void {
    for (const action of actions) {
      switch (action.type) {
        case 'MOVE_TOKEN':
          this.pendingStep = mutateMovement(this._board, this.players[action.player], {
            type: 'MOVE_TOKEN',
            playerId: action.player,
            direction: action.direction,
          });
          break;

        case 'BURN_CELL':
          mutateArrow(this._board, {
            type: 'FIRE_ARROW',
            playerId: action.player,
            target: action.position,
          });
          break;

        case 'ADVANCE_PLAYER':
          this.recordTurn(action.player);
          break;

        case 'CHECK_LEGAL_MOVES':
          if (!this.hasLegalMove(action.player)) {
            this.applyActions(this.fsm.send({ type: 'NO_LEGAL_MOVE', player: action.player }));
          }
          break;

        case 'DECLARE_RESULT':
          this.result = { loser: action.loser, winner: action.winner };
          break;
      }
    }
  }

  private recordTurn(player: PlayerId): void {
    const step = this.pendingStep;
    const last = this.fsm.getHistory().at(-1);
    if (!step || !last || last.event.type !== 'FIRE_ARROW') {
      throw new InvalidState(
        EngineErrorCode.STATE_TURN_INCOMPLETE,
        'Turn completed without a recorded step and arrow',
        { player },
        'GameEngine'
      );
    }

    this.history.push({
      turn: this.history.length + 1,
      player,
      from: copyPosition(step.from),
      to: copyPosition(step.to),
      arrow: copyPosition(last.event.target),
    });
    this.pendingStep = null;
  }

  private createPlayer(id: PlayerId): Player {
    const start = BOARD_CONFIG.startingPositions[id];
    return {
      id,
      symbol: BOARD_CONFIG.symbols[id],
      position: { row: start.row, col: start.col },
    };
  }
}
