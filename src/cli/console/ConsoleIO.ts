import readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { GameIO } from './GameIO';
import { TokenReader } from './TokenReader';

/** Erase the display and home the cursor. */
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export class ConsoleIO implements GameIO {
  private readonly rl: readline.Interface;
  private readonly reader: TokenReader;

  constructor(
    input: Readable,
    private readonly output: Writable
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    // Take the iterator up front so lines typed ahead of a prompt are buffered.
    this.reader = new TokenReader(this.rl[Symbol.asyncIterator]());
  }

  write(text: string): void {
    this.output.write(text);
  }

  clear(): void {
    this.output.write(CLEAR_SCREEN);
  }

  nextToken(): Promise<string | null> {
    return this.reader.nextToken();
  }

  async waitForLine(): Promise<void> {
    await this.reader.nextLine();
  }

  close(): void {
    this.rl.close();
  }
}
