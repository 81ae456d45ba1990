import { registerAs } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';

export const DEFAULT_TICK_INTERVAL_MS = 100;
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_PROMPT_DELAY_MS = 3000;
export const DEFAULT_CLEAR_DELAY_MS = 2000;

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return parseInt(value, 10);
}

/**
 * Runtime settings of the agenda, read once at boot.
 * Values are range-checked beforehand by validateEnvironment.
 */
export const agendaConfig = registerAs('agenda', () => ({
  tickIntervalMs: intFromEnv(
    process.env.AGENDA_TICK_INTERVAL_MS,
    DEFAULT_TICK_INTERVAL_MS,
  ),
  pollIntervalMs: intFromEnv(
    process.env.AGENDA_POLL_INTERVAL_MS,
    DEFAULT_POLL_INTERVAL_MS,
  ),
  promptDelayMs: intFromEnv(
    process.env.AGENDA_PROMPT_DELAY_MS,
    DEFAULT_PROMPT_DELAY_MS,
  ),
  clearDelayMs: intFromEnv(
    process.env.AGENDA_CLEAR_DELAY_MS,
    DEFAULT_CLEAR_DELAY_MS,
  ),
  scheduleFile: process.env.AGENDA_SCHEDULE_FILE || null,
}));

export type AgendaConfig = ConfigType<typeof agendaConfig>;
