/**
 * The subset of process.stdin the terminal adapter relies on.
 */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'end', listener: () => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutput {
  write(text: string): unknown;
}

export interface TerminalStreams {
  input: TerminalInput;
  output: TerminalOutput;
  /** Called on Ctrl-C while raw mode swallows the signal */
  interrupt: () => void;
}

export const TERMINAL_STREAMS = Symbol('TERMINAL_STREAMS');

export function processStreams(): TerminalStreams {
  return {
    input: process.stdin,
    output: process.stdout,
    interrupt: () => process.kill(process.pid, 'SIGINT'),
  };
}
