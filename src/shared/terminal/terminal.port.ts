/**
 * Port for the console the agenda talks to.
 *
 * Input arrives in two ways: drained without waiting on every poll tick
 * (readAvailable), or awaited one line at a time for prompts (readLine).
 */
export interface TerminalPort {
  /**
   * Start collecting input without blocking the caller.
   * @throws TerminalSetupError if the terminal cannot be switched over
   */
  enableNonBlockingInput(): void;

  /** Put the terminal back the way it was found */
  restore(): void;

  /**
   * Lines finished since the last call, each ending in "\n", or an empty
   * string. A line still being typed stays with the terminal.
   */
  readAvailable(): string;

  /**
   * Write the prompt, then wait for one full line of input.
   * @throws InputClosedError if input ends before a line arrives
   */
  readLine(prompt: string): Promise<string>;

  write(text: string): void;

  clear(): void;
}

export const TERMINAL = Symbol('TERMINAL');
