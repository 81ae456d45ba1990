import type { ActivitySchedule } from './activity-schedule';

/**
 * Schedule Repository Interface (Port)
 *
 * The agenda defines WHAT it needs; infrastructure decides where the
 * activities come from.
 */
export interface ScheduleRepository {
  /**
   * Load a fresh schedule with every activity not done.
   * @throws ScheduleLoadError if the source is missing or invalid
   */
  load(): Promise<ActivitySchedule>;
}

export const SCHEDULE_REPOSITORY = Symbol('SCHEDULE_REPOSITORY');
