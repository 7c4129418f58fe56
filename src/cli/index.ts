#!/usr/bin/env node
import { wrapError } from '../shared/errors';
import { ConsoleIO } from './console/ConsoleIO';
import { ConsoleGame } from './game/ConsoleGame';
import { logger } from './utils/logger';

/**
 * Play one game on stdin/stdout. Resolves to the process exit status.
 */
export async function main(): Promise<number> {
  const io = new ConsoleIO(process.stdin, process.stdout);

  try {
    await new ConsoleGame(io).play();
    return 0;
  } catch (error) {
    const gameError = wrapError(error);
    logger.error('Game aborted', { error: gameError.toJSON() });
    process.stderr.write(`${gameError.message}\n`);
    return gameError.exitCode;
  } finally {
    io.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
