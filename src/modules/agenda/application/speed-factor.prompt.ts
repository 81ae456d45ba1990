import { Injectable } from '@nestjs/common';
import { AgendaConsole } from './agenda-console';

export const MIN_SPEED_FACTOR = 1;
export const MAX_SPEED_FACTOR = 30;

/**
 * Whole number in [MIN_SPEED_FACTOR, MAX_SPEED_FACTOR], or null.
 */
export function parseSpeedFactor(raw: string): number | null {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) {
    return null;
  }
  const value = Number(text);
  return value >= MIN_SPEED_FACTOR && value <= MAX_SPEED_FACTOR ? value : null;
}

@Injectable()
export class SpeedFactorPrompt {
  constructor(private readonly console: AgendaConsole) {}

  /**
   * Keeps asking until the answer is a valid speed factor.
   */
  async ask(): Promise<number> {
    let speedFactor: number | null = null;
    while (speedFactor === null) {
      speedFactor = parseSpeedFactor(
        await this.console.ask(
          `How many times would you like to speed it up? (${MIN_SPEED_FACTOR}...${MAX_SPEED_FACTOR})\t`,
        ),
      );
    }
    await this.console.clearAfterDelay();
    return speedFactor;
  }
}
