import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { InputClosedError, TerminalSetupError } from '../domain/errors';
import type { TerminalPort } from './terminal.port';
import { TERMINAL_STREAMS } from './terminal-streams';
import type { TerminalStreams } from './terminal-streams';

const CTRL_C = '\u0003';
const BACKSPACE = '\b';
const DELETE = '\u007f';

interface LineWaiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

const CLEAR_SCREEN = '\x1b[2J';
const CURSOR_HOME = '\x1b[0;0H\n';

/**
 * Terminal adapter over stdin/stdout.
 *
 * On a TTY the input is switched to raw mode so keystrokes arrive as they are
 * typed; the adapter then does the echo and line editing the terminal no
 * longer does. Piped input is taken as it comes.
 */
@Injectable()
export class StdinTerminal implements TerminalPort, OnModuleDestroy {
  private readonly logger = new Logger(StdinTerminal.name);
  private pending = '';
  private lineWaiter: LineWaiter | null = null;
  private rawMode = false;
  private listening = false;
  private ended = false;

  constructor(
    @Inject(TERMINAL_STREAMS) private readonly streams: TerminalStreams,
  ) {}

  enableNonBlockingInput(): void {
    if (this.listening) {
      return;
    }

    const { input } = this.streams;
    input.setEncoding('utf8');

    if (input.isTTY) {
      if (!input.setRawMode) {
        throw new TerminalSetupError('raw mode is not supported');
      }
      try {
        input.setRawMode(true);
      } catch (error) {
        throw new TerminalSetupError(
          error instanceof Error ? error.message : String(error),
        );
      }
      this.rawMode = true;
    }

    input.on('data', this.onData);
    input.on('end', this.onEnd);
    input.resume();
    this.listening = true;
    this.logger.debug(`Listening for input (raw mode: ${this.rawMode})`);
  }

  restore(): void {
    if (!this.listening) {
      return;
    }

    const { input } = this.streams;
    input.off('data', this.onData);
    input.off('end', this.onEnd);
    if (this.rawMode && input.setRawMode) {
      input.setRawMode(false);
    }
    input.pause();
    this.rawMode = false;
    this.listening = false;
    this.logger.debug('Terminal restored');
  }

  onModuleDestroy(): void {
    this.restore();
  }

  readAvailable(): string {
    const cut = this.pending.lastIndexOf('\n') + 1;
    const text = this.pending.slice(0, cut);
    this.pending = this.pending.slice(cut);
    return text;
  }

  readLine(prompt: string): Promise<string> {
    this.write(prompt);

    const line = this.takeLine();
    if (line !== null) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.reject(new InputClosedError());
    }

    return new Promise((resolve, reject) => {
      this.lineWaiter = { resolve, reject };
    });
  }

  write(text: string): void {
    this.streams.output.write(text);
  }

  clear(): void {
    this.write(CLEAR_SCREEN);
    this.write(CURSOR_HOME);
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');

    if (this.rawMode) {
      for (const char of text) {
        this.handleKey(char);
      }
    } else {
      this.pending += text;
    }

    this.deliverLine();
  };

  /** A last unterminated line still counts; a waiting prompt then fails */
  private readonly onEnd = (): void => {
    this.ended = true;
    if (this.pending.length > 0 && !this.pending.endsWith('\n')) {
      this.pending += '\n';
    }
    this.deliverLine();

    const waiter = this.lineWaiter;
    if (waiter) {
      this.lineWaiter = null;
      waiter.reject(new InputClosedError());
    }
  };

  private handleKey(char: string): void {
    if (char === CTRL_C) {
      this.restore();
      this.streams.interrupt();
      return;
    }

    if (char === '\r' || char === '\n') {
      this.pending += '\n';
      this.write('\n');
      return;
    }

    if (char === BACKSPACE || char === DELETE) {
      if (this.pending.length > 0 && !this.pending.endsWith('\n')) {
        this.pending = this.pending.slice(0, -1);
        this.write('\b \b');
      }
      return;
    }

    this.pending += char;
    this.write(char);
  }

  private deliverLine(): void {
    if (!this.lineWaiter) {
      return;
    }
    const line = this.takeLine();
    if (line === null) {
      return;
    }
    const waiter = this.lineWaiter;
    this.lineWaiter = null;
    waiter.resolve(line);
  }

  private takeLine(): string | null {
    const newline = this.pending.indexOf('\n');
    if (newline === -1) {
      return null;
    }
    const line = this.pending.slice(0, newline);
    this.pending = this.pending.slice(newline + 1);
    return line.endsWith('\r') ? line.slice(0, -1) : line;
  }
}
