import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { LOG_LEVEL_NAMES } from './log-levels';
import type { LogLevelName } from './log-levels';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(10)
  @Max(1000)
  AGENDA_TICK_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(10)
  @Max(1000)
  AGENDA_POLL_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  AGENDA_PROMPT_DELAY_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  AGENDA_CLEAR_DELAY_MS?: number;

  @IsOptional()
  @IsString()
  AGENDA_SCHEDULE_FILE?: string;

  @IsOptional()
  @IsIn(LOG_LEVEL_NAMES)
  AGENDA_LOG_LEVEL?: LogLevelName;
}

/**
 * Validate environment variables at startup.
 * Used as ConfigModule's `validate` hook; a failure aborts the boot.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}
