export { TERMINAL } from './terminal.port';
export type { TerminalPort } from './terminal.port';
export { TERMINAL_STREAMS, processStreams } from './terminal-streams';
export type {
  TerminalInput,
  TerminalOutput,
  TerminalStreams,
} from './terminal-streams';
export { StdinTerminal } from './stdin-terminal';
export { TerminalModule } from './terminal.module';
