/**
 * GameEngine Unit Tests
 * Full-session behaviour: move application, arrows, alternation and the
 * loss condition.
 */

import { GameEngine } from '../../src/shared/engine/GameEngine';
import { BoardConstraintViolation, EngineErrorCode } from '../../src/shared/engine/errors';
import { cellKinds, createTestEngine, playTurn, pos } from '../utils/fixtures';

describe('GameEngine', () => {
  let engine: GameEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  describe('initial state', () => {
    it('should place both tokens on their starting cells', () => {
      expect(engine.getPlayer(1)).toEqual({ id: 1, symbol: 'B', position: pos(0, 3) });
      expect(engine.getPlayer(2)).toEqual({ id: 2, symbol: 'W', position: pos(6, 3) });
      expect(engine.board.get(0, 3)).toEqual({ kind: 'occupied', player: 1 });
      expect(engine.board.get(6, 3)).toEqual({ kind: 'occupied', player: 2 });
      expect(engine.board.countCells('empty')).toBe(47);
    });

    it('should await a move from player 1', () => {
      expect(engine.state).toEqual({ phase: 'awaiting_move', player: 1 });
      expect(engine.activePlayer?.id).toBe(1);
      expect(engine.isGameOver).toBe(false);
      expect(engine.getResult()).toBeNull();
    });

    it('should start with the requested cells burned', () => {
      const seeded = createTestEngine(pos(3, 3), pos(0, 0));

      expect(seeded.board.positionsOf('burned')).toEqual([pos(0, 0), pos(3, 3)]);
      expect(seeded.board.countCells('occupied')).toBe(2);
    });

    it('should refuse to burn a starting cell', () => {
      expect(() => createTestEngine(pos(6, 3))).toThrow(BoardConstraintViolation);
      expect(() => createTestEngine(pos(6, 3))).toThrow('Cannot burn starting cell (6, 3)');
    });

    it('should refuse a burned cell off the board', () => {
      let thrown: unknown;
      try {
        createTestEngine(pos(7, 0));
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(BoardConstraintViolation);
      expect(thrown).toMatchObject({ code: EngineErrorCode.BOARD_INVALID_POSITION });
    });

    it('should end at once if player 1 starts with no legal move', () => {
      const stuck = createTestEngine(pos(0, 2), pos(0, 4), pos(1, 2), pos(1, 3), pos(1, 4));

      expect(stuck.isGameOver).toBe(true);
      expect(stuck.getResult()).toEqual({ loser: 1, winner: 2 });
      expect(stuck.move('S')).toMatchObject({ valid: false, code: 'GAME_OVER' });
    });
  });

  describe('move', () => {
    it('should burn the vacated cell and occupy the destination', () => {
      const result = engine.move('S');

      expect(result).toEqual({ valid: true, from: pos(0, 3), to: pos(1, 3) });
      expect(engine.board.get(1, 3)).toEqual({ kind: 'occupied', player: 1 });
      expect(engine.board.get(0, 3)).toEqual({ kind: 'burned' });
      expect(engine.getPlayer(1).position).toEqual(pos(1, 3));
      expect(engine.state).toEqual({ phase: 'awaiting_arrow', player: 1, movedTo: pos(1, 3) });
    });

    it('should reject a step off the board without changing anything', () => {
      const before = cellKinds(engine.board);

      expect(engine.move('N')).toEqual({
        valid: false,
        reason: 'Position off board',
        code: 'OUT_OF_BOUNDS',
      });
      expect(cellKinds(engine.board)).toEqual(before);
      expect(engine.getPlayer(1).position).toEqual(pos(0, 3));
      expect(engine.state).toEqual({ phase: 'awaiting_move', player: 1 });
    });

    it('should reject a step back onto the burned cell it came from', () => {
      playTurn(engine, 'S', pos(0, 0));
      playTurn(engine, 'N', pos(0, 1));

      expect(engine.move('N')).toMatchObject({ valid: false, code: 'CELL_BURNED' });
      expect(engine.activePlayer?.id).toBe(1);
    });

    it('should reject a step onto the opponent', () => {
      playTurn(engine, 'S', pos(0, 0));
      playTurn(engine, 'N', pos(0, 1));
      playTurn(engine, 'S', pos(0, 2));
      playTurn(engine, 'N', pos(0, 4));
      playTurn(engine, 'S', pos(0, 5));

      expect(engine.getPlayer(1).position).toEqual(pos(3, 3));
      expect(engine.getPlayer(2).position).toEqual(pos(4, 3));
      expect(engine.move('N')).toMatchObject({ valid: false, code: 'CELL_OCCUPIED' });
      expect(engine.getPlayer(2).position).toEqual(pos(4, 3));
    });

    it('should refuse a second move before the arrow', () => {
      engine.move('S');
      expect(engine.move('S')).toMatchObject({ valid: false, code: 'INVALID_PHASE' });
      expect(engine.getPlayer(1).position).toEqual(pos(1, 3));
    });
  });

  describe('fireArrow', () => {
    it('should refuse an arrow before the move', () => {
      expect(engine.fireArrow(pos(3, 3))).toMatchObject({ valid: false, code: 'INVALID_PHASE' });
      expect(engine.board.countCells('burned')).toBe(0);
    });

    it('should burn an empty cell and hand the turn over', () => {
      engine.move('S');
      const result = engine.fireArrow(pos(0, 2));

      expect(result).toEqual({ valid: true, target: pos(0, 2), gameOver: false });
      expect(engine.board.get(0, 2)).toEqual({ kind: 'burned' });
      expect(engine.state).toEqual({ phase: 'awaiting_move', player: 2 });
    });

    it('should refuse burned, occupied and off-board targets and keep the turn', () => {
      engine.move('S');
      const before = cellKinds(engine.board);

      expect(engine.fireArrow(pos(0, 3))).toMatchObject({ valid: false, code: 'CELL_NOT_EMPTY' });
      expect(engine.fireArrow(pos(1, 3))).toMatchObject({ valid: false, code: 'CELL_NOT_EMPTY' });
      expect(engine.fireArrow(pos(6, 3))).toMatchObject({ valid: false, code: 'CELL_NOT_EMPTY' });
      expect(engine.fireArrow(pos(7, 7))).toMatchObject({ valid: false, code: 'OUT_OF_BOUNDS' });

      expect(cellKinds(engine.board)).toEqual(before);
      expect(engine.state.phase).toBe('awaiting_arrow');
      expect(engine.activePlayer?.id).toBe(1);
    });

    it('should never burn the same cell twice', () => {
      playTurn(engine, 'S', pos(3, 0));
      engine.move('N');
      expect(engine.fireArrow(pos(3, 0))).toMatchObject({ valid: false, code: 'CELL_NOT_EMPTY' });
      expect(engine.board.get(3, 0)).toEqual({ kind: 'burned' });
    });
  });

  describe('opening turn', () => {
    it('should leave two tokens and grow the burned count one cell per arrow', () => {
      engine.move('S');
      expect(engine.board.countCells('burned')).toBe(1);

      engine.fireArrow(pos(0, 2));
      expect(engine.board.countCells('occupied')).toBe(2);
      expect(engine.board.countCells('burned')).toBe(2);
      expect(engine.board.positionsOf('burned')).toEqual([pos(0, 2), pos(0, 3)]);

      playTurn(engine, 'N', pos(6, 0));
      expect(engine.board.countCells('occupied')).toBe(2);
      expect(engine.board.countCells('burned')).toBe(4);
    });

    it('should record each completed turn', () => {
      playTurn(engine, 'S', pos(0, 2));
      playTurn(engine, 'NE', pos(6, 6));

      expect(engine.getHistory()).toEqual([
        { turn: 1, player: 1, from: pos(0, 3), to: pos(1, 3), arrow: pos(0, 2) },
        { turn: 2, player: 2, from: pos(6, 3), to: pos(5, 4), arrow: pos(6, 6) },
      ]);
    });
  });

  describe('session boundary', () => {
    it('should hand out player copies that cannot move the token', () => {
      const player = engine.getPlayer(1);
      player.position = pos(3, 3);
      const active = engine.activePlayer;
      if (active) {
        active.position.row = 5;
      }

      expect(engine.getPlayer(1).position).toEqual(pos(0, 3));
      expect(engine.board.get(0, 3)).toEqual({ kind: 'occupied', player: 1 });
      expect(engine.move('S')).toEqual({ valid: true, from: pos(0, 3), to: pos(1, 3) });
    });

    it('should keep its own copy of the arrow target', () => {
      engine.move('S');
      const target = pos(0, 2);
      engine.fireArrow(target);
      target.row = 5;

      expect(engine.getHistory()[0].arrow).toEqual(pos(0, 2));
      expect(engine.board.get(0, 2)).toEqual({ kind: 'burned' });
      expect(engine.board.get(5, 2)).toEqual({ kind: 'empty' });
    });

    it('should not let results or history be edited from outside', () => {
      const moved = engine.move('S');
      if (moved.valid) {
        moved.from.row = 4;
      }
      engine.fireArrow(pos(0, 2));
      engine.getHistory()[0].to.col = 0;

      expect(engine.getHistory()).toEqual([
        { turn: 1, player: 1, from: pos(0, 3), to: pos(1, 3), arrow: pos(0, 2) },
      ]);
    });
  });

  describe('loss condition', () => {
    it('should end the game when player 2 is surrounded at the start of their turn', () => {
      engine = createTestEngine(pos(5, 2), pos(5, 4), pos(6, 2), pos(6, 4));
      expect(engine.hasLegalMove(2)).toBe(true);

      engine.move('S');
      const result = engine.fireArrow(pos(5, 3));

      expect(result).toEqual({ valid: true, target: pos(5, 3), gameOver: true });
      expect(engine.hasLegalMove(2)).toBe(false);
      expect(engine.getLegalDestinations(2)).toEqual([]);
      expect(engine.isGameOver).toBe(true);
      expect(engine.activePlayer).toBeNull();
      expect(engine.getResult()).toEqual({ loser: 2, winner: 1 });
      expect(engine.state).toEqual({
        phase: 'game_over',
        loser: 2,
        winner: 1,
        reason: 'no_legal_move',
      });
    });

    it('should count the opponent as a blocker', () => {
      engine = createTestEngine(pos(3, 2), pos(3, 4), pos(4, 2), pos(4, 4), pos(5, 2));
      playTurn(engine, 'S', pos(0, 0));
      playTurn(engine, 'N', pos(0, 1));
      playTurn(engine, 'S', pos(0, 2));
      playTurn(engine, 'N', pos(0, 4));
      expect(engine.getPlayer(1).position).toEqual(pos(2, 3));
      expect(engine.getPlayer(2).position).toEqual(pos(4, 3));

      engine.move('S');
      const result = engine.fireArrow(pos(5, 4));

      // Every neighbour of (4,3) is burned except (3,3), which holds player 1.
      expect(result).toEqual({ valid: true, target: pos(5, 4), gameOver: true });
      expect(engine.getResult()).toEqual({ loser: 2, winner: 1 });
    });

    it('should reject every action once the game is over', () => {
      engine = createTestEngine(pos(5, 2), pos(5, 4), pos(6, 2), pos(6, 4));
      playTurn(engine, 'S', pos(5, 3));

      expect(engine.move('S')).toMatchObject({ valid: false, code: 'GAME_OVER' });
      expect(engine.fireArrow(pos(3, 3))).toMatchObject({ valid: false, code: 'GAME_OVER' });
    });
  });
});
