import { Inject, Injectable } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { agendaConfig } from '../../../config/agenda.config';
import type { AgendaConfig } from '../../../config/agenda.config';
import { TERMINAL } from '../../../shared/terminal/terminal.port';
import type { TerminalPort } from '../../../shared/terminal/terminal.port';

/**
 * What the reminder screen does: print a line, ask a question after a short
 * pause, and wipe the screen once a message has had time to be read.
 */
@Injectable()
export class AgendaConsole {
  constructor(
    @Inject(TERMINAL) private readonly terminal: TerminalPort,
    @Inject(agendaConfig.KEY) private readonly config: AgendaConfig,
  ) {}

  print(line: string): void {
    this.terminal.write(`${line}\n`);
  }

  /** Gives the notice printed before a question time to be read */
  async pauseBeforePrompt(): Promise<void> {
    await this.pause(this.config.promptDelayMs);
  }

  ask(question: string): Promise<string> {
    return this.terminal.readLine(question);
  }

  async clearAfterDelay(): Promise<void> {
    await this.pause(this.config.clearDelayMs);
    this.terminal.clear();
  }

  private async pause(ms: number): Promise<void> {
    if (ms > 0) {
      await sleep(ms);
    }
  }
}
