import type { LogLevel } from '@nestjs/common';

/** Most severe first */
export const LOG_LEVEL_NAMES = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export const DEFAULT_LOG_LEVEL: LogLevelName = 'warn';

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Levels to enable for a minimum level name: the level itself and every
 * more severe one. Unknown names fall back to the default.
 */
export function resolveLogLevels(minimum: string | undefined): LogLevel[] {
  const name =
    minimum !== undefined && isLogLevelName(minimum)
      ? minimum
      : DEFAULT_LOG_LEVEL;
  return LOG_LEVEL_NAMES.slice(0, LOG_LEVEL_NAMES.indexOf(name) + 1);
}
