/**
 * Text surface the console game talks to. The real implementation is backed
 * by stdin/stdout; tests drive the game through an in-memory script.
 */
export interface GameIO {
  /** Write text as-is; no newline is appended. */
  write(text: string): void;

  /** Wipe the screen before a full redraw. */
  clear(): void;

  /** Next whitespace-delimited token, or null once input has ended. */
  nextToken(): Promise<string | null>;

  /** Wait for the user to press enter. Resolves immediately once input has ended. */
  waitForLine(): Promise<void>;

  close(): void;
}
