import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import type { ValidationError } from 'class-validator';
import { readFile } from 'node:fs/promises';
import { agendaConfig } from '../../../config/agenda.config';
import type { AgendaConfig } from '../../../config/agenda.config';
import { DomainError, ScheduleLoadError } from '../../../shared/domain/errors';
import { ScheduleFileDto } from '../application/dto/schedule-file.dto';
import { ActivityEntity } from '../domain/activity.entity';
import { ActivitySchedule } from '../domain/activity-schedule';
import type { ScheduleRepository } from '../domain/schedule.repository';
import defaultSchedule from './default-schedule.json';

export const DEFAULT_SCHEDULE_SOURCE = 'built-in schedule';

function describeErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...describeErrors(error.children ?? [], path)];
  });
}

/**
 * Turn parsed JSON into a schedule.
 * @throws ScheduleLoadError naming every problem found
 */
export function scheduleFromJson(
  parsed: unknown,
  source: string,
): ActivitySchedule {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ScheduleLoadError(source, ['expected a JSON object']);
  }

  const dto = plainToInstance(ScheduleFileDto, parsed);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new ScheduleLoadError(source, describeErrors(errors));
  }

  try {
    return new ActivitySchedule(
      dto.activities.map((entry) =>
        ActivityEntity.create(entry.name, entry.start, entry.end),
      ),
    );
  } catch (error) {
    if (error instanceof DomainError || error instanceof RangeError) {
      throw new ScheduleLoadError(source, [error.message]);
    }
    throw error;
  }
}

/**
 * Schedule from the JSON file named by AGENDA_SCHEDULE_FILE, or the built-in
 * day when none is configured. Every load returns fresh, not-done activities.
 */
@Injectable()
export class JsonScheduleRepository implements ScheduleRepository {
  private readonly logger = new Logger(JsonScheduleRepository.name);

  constructor(
    @Inject(agendaConfig.KEY) private readonly config: AgendaConfig,
  ) {}

  async load(): Promise<ActivitySchedule> {
    const file = this.config.scheduleFile;
    if (!file) {
      return scheduleFromJson(defaultSchedule, DEFAULT_SCHEDULE_SOURCE);
    }

    this.logger.log(`Loading schedule from ${file}`);
    return scheduleFromJson(await this.readJson(file), file);
  }

  private async readJson(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (error) {
      throw new ScheduleLoadError(file, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new ScheduleLoadError(file, [
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
  }
}
