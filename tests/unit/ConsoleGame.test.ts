/**
 * ConsoleGame Tests
 * Drives the interactive loop with scripted input and checks what the
 * players would see.
 */

import { GameEngine } from '../../src/shared/engine/GameEngine';
import { KEYPAD_LEGEND } from '../../src/shared/engine/notation';
import { GameNotActiveError, InputClosedError } from '../../src/shared/errors';
import { ConsoleGame } from '../../src/cli/game/ConsoleGame';
import {
  ARROW_REJECTION,
  MOVE_PROMPT,
  RULES_BANNER,
  START_PROMPT,
} from '../../src/cli/game/messages';
import { createTestEngine, playTurn, pos } from '../utils/fixtures';
import { ScriptedIO } from '../utils/ScriptedIO';

function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/** Player 2 boxed in; an arrow at row 6, column 4 takes its last free cell. */
function nearlyWonEngine(): GameEngine {
  return createTestEngine(pos(5, 2), pos(5, 4), pos(6, 2), pos(6, 4));
}

describe('ConsoleGame', () => {
  it('should show the rules and wait before the first board', async () => {
    const io = new ScriptedIO(['', '2', '6', '4', '']);
    await new ConsoleGame(io, nearlyWonEngine()).play();

    expect(io.output.startsWith(`${RULES_BANNER}\n${START_PROMPT}\n`)).toBe(true);
  });

  it('should play a scripted game through to the result', async () => {
    const io = new ScriptedIO(['', '2', '6', '4', '']);
    const engine = nearlyWonEngine();

    const result = await new ConsoleGame(io, engine).play();

    expect(result).toEqual({ loser: 2, winner: 1 });
    // Opening board, after the step, after the arrow.
    expect(io.clearCount).toBe(3);
    expect(io.lastScreen).toBe(
      [
        '  1234567',
        '1 +++A+++',
        '2 +++B+++',
        '3 +++++++',
        '4 +++++++',
        '5 +++++++',
        '6 ++AAA++',
        '7 ++AWA++',
        '',
        KEYPAD_LEGEND,
        '',
        'W is no longer able to move.',
        'B is the winner!',
        'Press enter to continue...',
        '',
      ].join('\n')
    );
  });

  it('should prompt for the arrow with the row and column prompts', async () => {
    const io = new ScriptedIO(['', '2', '6', '4', '']);
    await new ConsoleGame(io, nearlyWonEngine()).play();

    expect(io.output).toContain(
      `${KEYPAD_LEGEND}\n\nB time to fire an arrow!\nPlease select a row: Please select a column: `
    );
  });

  it('should accept several answers typed on one line', async () => {
    const io = new ScriptedIO(['', '2 6 4', '']);

    await expect(new ConsoleGame(io, nearlyWonEngine()).play()).resolves.toEqual({
      loser: 2,
      winner: 1,
    });
  });

  it('should re-prompt on bad input without advancing the game', async () => {
    const io = new ScriptedIO(['', 'abc', '5', '8', '2', '9', '1', '4', '1', '1']);
    const engine = createTestEngine();

    await expect(new ConsoleGame(io, engine).play()).rejects.toBeInstanceOf(InputClosedError);

    expect(countOf(io.output, 'Invalid Input!\n')).toBe(2);
    expect(countOf(io.output, 'Invalid move, please try again: \n')).toBe(1);
    expect(countOf(io.output, 'Invalid coordinate!\n')).toBe(1);
    expect(countOf(io.output, `${ARROW_REJECTION}\n`)).toBe(1);
    expect(countOf(io.output, `Turn: B\n${MOVE_PROMPT}`)).toBe(4);

    expect(engine.getHistory()).toEqual([
      { turn: 1, player: 1, from: pos(0, 3), to: pos(1, 3), arrow: pos(0, 0) },
    ]);
    expect(engine.activePlayer?.symbol).toBe('W');
    expect(io.lastScreen).toBe(
      [
        '  1234567',
        '1 A++A+++',
        '2 +++B+++',
        '3 +++++++',
        '4 +++++++',
        '5 +++++++',
        '6 +++++++',
        '7 +++W+++',
        '',
        KEYPAD_LEGEND,
        '',
        `Turn: W\n${MOVE_PROMPT}`,
      ].join('\n')
    );
  });

  it('should explain why a step onto a burned cell or the opponent fails', async () => {
    const engine = createTestEngine();
    playTurn(engine, 'S', pos(0, 0));
    playTurn(engine, 'N', pos(0, 1));
    playTurn(engine, 'S', pos(0, 2));
    playTurn(engine, 'N', pos(0, 4));
    // Player 1 now sits directly above player 2.
    playTurn(engine, 'S', pos(0, 5));
    const io = new ScriptedIO(['', '8']);

    await expect(new ConsoleGame(io, engine).play()).rejects.toBeInstanceOf(InputClosedError);
    expect(io.output).toContain(
      `Turn: W\n${MOVE_PROMPT}That space is occupied by the opponent, please try again: \n`
    );

    const burnedIo = new ScriptedIO(['', '8']);
    const second = createTestEngine();
    playTurn(second, 'S', pos(0, 0));
    playTurn(second, 'N', pos(0, 1));
    await expect(new ConsoleGame(burnedIo, second).play()).rejects.toBeInstanceOf(
      InputClosedError
    );
    expect(burnedIo.output).toContain('That space is dead, please try again: \n');
  });

  it('should report the phase it was waiting in when input ends', async () => {
    const io = new ScriptedIO(['', '2', '3']);

    const error = await new ConsoleGame(io, createTestEngine()).play().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InputClosedError);
    if (error instanceof InputClosedError) {
      expect(error.context).toEqual({ phase: 'awaiting_arrow' });
      expect(error.exitCode).toBe(1);
    }
  });

  it('should fail when input ends before the game starts', async () => {
    const io = new ScriptedIO([]);

    await expect(new ConsoleGame(io, createTestEngine()).play()).rejects.toBeInstanceOf(
      InputClosedError
    );
    expect(io.clearCount).toBe(1);
  });

  it('should refuse to replay a finished session', async () => {
    const engine = nearlyWonEngine();
    playTurn(engine, 'S', pos(5, 3));
    const io = new ScriptedIO(['']);

    await expect(new ConsoleGame(io, engine).play()).rejects.toBeInstanceOf(GameNotActiveError);
    expect(io.output).toBe('');
  });
});
