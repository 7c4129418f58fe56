import {
  GameEngine,
  KEYPAD_LEGEND,
  formatPosition,
  formatTurnRecord,
  type GameResult,
  type Player,
  type Position,
} from '../../shared/engine';
import { GameNotActiveError, InputClosedError } from '../../shared/errors';
import { parseCoordinateInput, parseDirectionInput } from '../../shared/validation/schemas';
import type { GameIO } from '../console/GameIO';
import { logger } from '../utils/logger';
import {
  ARROW_REJECTION,
  COLUMN_PROMPT,
  END_PROMPT,
  INVALID_COORDINATE,
  INVALID_INPUT,
  MOVE_PROMPT,
  MOVE_REJECTIONS,
  ROW_PROMPT,
  RULES_BANNER,
  START_PROMPT,
  arrowBanner,
  loserMessage,
  turnBanner,
  winnerMessage,
} from './messages';

/**
 * Interactive turn loop over a {@link GameIO}.
 *
 * Each turn: prompt for a direction until the step succeeds, then for a row
 * and a column until the arrow lands. Bad input and illegal targets are
 * reported and re-prompted; only the end of the input stream stops the loop
 * early.
 */
export class ConsoleGame {
  constructor(
    private readonly io: GameIO,
    private readonly engine: GameEngine = new GameEngine()
  ) {}

  async play(): Promise<GameResult> {
    if (this.engine.isGameOver) {
      throw new GameNotActiveError('game_over');
    }

    this.io.write(`${RULES_BANNER}\n`);
    await this.pause(START_PROMPT);
    this.drawBoard();
    logger.info('Game started', { rows: this.engine.board.rows, cols: this.engine.board.cols });

    let active = this.engine.activePlayer;
    while (active !== null) {
      await this.promptMove(active);
      await this.promptArrow(active);
      active = this.engine.activePlayer;
    }

    const result = this.engine.getResult();
    if (!result) {
      throw new GameNotActiveError(this.engine.state.phase);
    }

    const loser = this.engine.getPlayer(result.loser);
    const winner = this.engine.getPlayer(result.winner);
    this.io.write(`${loserMessage(loser.symbol)}\n${winnerMessage(winner.symbol)}\n`);
    logger.info('Game over', {
      loser: loser.symbol,
      winner: winner.symbol,
      turns: this.engine.getHistory().length,
    });

    await this.pause(END_PROMPT);
    return result;
  }

  private async promptMove(player: Player): Promise<void> {
    for (;;) {
      this.io.write(`${turnBanner(player.symbol)}\n${MOVE_PROMPT}`);

      const direction = parseDirectionInput(await this.readToken());
      if (!direction.ok) {
        this.io.write(`${INVALID_INPUT}\n`);
        logger.debug('Direction input rejected', { player: player.id, error: direction.error });
        continue;
      }

      const result = this.engine.move(direction.value);
      if (!result.valid) {
        this.io.write(`${MOVE_REJECTIONS[result.code] ?? result.reason}\n`);
        logger.debug('Move rejected', {
          player: player.id,
          direction: direction.value,
          code: result.code,
        });
        continue;
      }

      this.drawBoard();
      return;
    }
  }

  private async promptArrow(player: Player): Promise<void> {
    this.io.write(`${arrowBanner(player.symbol)}\n`);

    for (;;) {
      const target: Position = {
        row: await this.promptCoordinate(ROW_PROMPT, this.engine.board.rows),
        col: await this.promptCoordinate(COLUMN_PROMPT, this.engine.board.cols),
      };

      const result = this.engine.fireArrow(target);
      if (!result.valid) {
        this.io.write(`${ARROW_REJECTION}\n`);
        logger.debug('Arrow rejected', {
          player: player.id,
          target: formatPosition(target),
          code: result.code,
        });
        continue;
      }

      this.drawBoard();
      const record = this.engine.getHistory().at(-1);
      if (record) {
        logger.info('Turn completed', {
          turn: record.turn,
          notation: formatTurnRecord(record, player.symbol),
        });
      }
      return;
    }
  }

  /**
   * Reads one 1-based coordinate, re-prompting until it is in range.
   * Returns it 0-based.
   */
  private async promptCoordinate(prompt: string, size: number): Promise<number> {
    for (;;) {
      this.io.write(prompt);
      const coordinate = parseCoordinateInput(await this.readToken(), size);
      if (coordinate.ok) {
        return coordinate.value;
      }
      this.io.write(`${INVALID_COORDINATE}\n`);
    }
  }

  private drawBoard(): void {
    this.io.clear();
    this.io.write(`${this.engine.board.render()}\n${KEYPAD_LEGEND}\n\n`);
  }

  private async pause(message: string): Promise<void> {
    this.io.write(`${message}\n`);
    await this.io.waitForLine();
  }

  private async readToken(): Promise<string> {
    const token = await this.io.nextToken();
    if (token === null) {
      throw new InputClosedError({ phase: this.engine.state.phase });
    }
    return token;
  }
}
