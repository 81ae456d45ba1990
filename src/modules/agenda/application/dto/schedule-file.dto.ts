import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { MAX_ACTIVITY_NAME_LENGTH } from '../../domain/activity.entity';
import { MAX_ACTIVITIES } from '../../domain/activity-schedule';

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

export class ActivityEntryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_ACTIVITY_NAME_LENGTH)
  name!: string;

  @Matches(HHMM, { message: 'start must be a time formatted as HH:MM' })
  start!: string;

  @Matches(HHMM, { message: 'end must be a time formatted as HH:MM' })
  end!: string;
}

export class ScheduleFileDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_ACTIVITIES)
  @ValidateNested({ each: true })
  @Type(() => ActivityEntryDto)
  activities!: ActivityEntryDto[];
}
