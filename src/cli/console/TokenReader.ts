/**
 * Whitespace-delimited token reader over a stream of lines.
 *
 * Several tokens typed on one line are handed out one at a time; blank lines
 * are skipped. `null` means the underlying stream has ended.
 */
export class TokenReader {
  private pending: string[] = [];

  constructor(private readonly lines: AsyncIterator<string>) {}

  async nextToken(): Promise<string | null> {
    for (;;) {
      const token = this.pending.shift();
      if (token !== undefined) {
        return token;
      }

      const next = await this.lines.next();
      if (next.done) {
        return null;
      }
      this.pending = next.value.split(/\s+/).filter((part) => part.length > 0);
    }
  }

  /**
   * Discards whatever is left of the current line and waits for a fresh one.
   */
  async nextLine(): Promise<string | null> {
    this.pending = [];
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }
}
